import { formatKes } from '../payments/payment.messages';
import { PaymentOutcome } from '../payments/payment.types';
import { Command } from './command-parser';

/**
 * Inline replies returned to whoever sent the inbound message.
 */
export const Replies = {
  forwarded: 'Message forwarded',
  forwardFailed: "Sorry, we couldn't forward your message. Please try again later.",
  partnerNotFound: 'Could not find your conversation partner. Please try again later.',
  noActiveCustomers: 'There are no active customer conversations. Wait for payment notifications.',
  help: 'To make a payment, send: !dm pesa [amount]',
  internalError: 'Sorry, something went wrong on our side. Please try again later.',
  paymentsUnavailable:
    'Failed to initiate payment: payments are not available right now. Please try again later.',
  invalidFormat: 'Invalid command format. Use: !dm pesa [amount]',
  invalidAmount: 'Invalid amount. Please enter a numeric value like: !dm pesa 100',
} as const;

export function invalidCommandReply(command: Extract<Command, { kind: 'invalid' }>): string {
  return command.reason === 'format' ? Replies.invalidFormat : Replies.invalidAmount;
}

export function paymentReply(outcome: PaymentOutcome): string {
  if (outcome.status === 'accepted') {
    return `Payment request of ${formatKes(outcome.amount)} sent to your phone. Please enter your PIN to complete.`;
  }

  switch (outcome.error.kind) {
    case 'validation':
      return outcome.reason;
    case 'configuration':
      return Replies.paymentsUnavailable;
    case 'persistence':
      return Replies.internalError;
    default:
      return `Failed to initiate payment: ${outcome.reason}`;
  }
}

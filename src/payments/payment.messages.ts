/**
 * Notifications sent to the parties as a payment progresses.
 */

export function formatKes(amount: number | string): string {
  return `KES ${amount}`;
}

export const PaymentMessages = {
  feedbackPaymentInitiated: (amount: number) =>
    `New payment of ${formatKes(amount)} initiated by customer. You can now chat directly with them.`,

  customerPaymentConfirmed: (amount: number | string, receipt: string) =>
    `Your payment of ${formatKes(amount)} (Receipt: ${receipt}) was successful. You can now communicate directly with our support team.`,

  feedbackPaymentConfirmed: (amount: number | string, receipt: string, customer: string) =>
    `Payment of ${formatKes(amount)} (Receipt: ${receipt}) was completed by customer ${customer}. You can now chat directly with them.`,
} as const;

import { RelayError } from '../common/errors';

export type PaymentOutcome =
  | {
      status: 'accepted';
      amount: number;
      correlationToken: string;
      checkoutRequestId?: string;
      /** False when the feedback number could not be told about the payment */
      feedbackNotified: boolean;
    }
  | {
      status: 'rejected';
      reason: string;
      error: RelayError;
    };

/** Fields pulled out of a gateway callback; absent values use the sentinels below. */
export interface CallbackDetails {
  amount: number | typeof UNKNOWN_AMOUNT;
  phoneNumber: string;
  receiptNumber: string;
  resultCode: number | null;
  resultDesc?: string;
  checkoutRequestId?: string;
  merchantRequestId?: string;
  accountReference?: string;
}

export const UNKNOWN_AMOUNT = 'unknown amount';
export const UNKNOWN_NUMBER = 'unknown number';
export const UNKNOWN_RECEIPT = 'unknown';

export type CallbackOutcome =
  | { status: 'confirmed'; customerNumber: string; notified: number }
  | { status: 'ignored'; reason: 'payment-failed' | 'unknown-number' };

export interface CallbackAck {
  ResultCode: 0 | 1;
  ResultDesc: string;
}

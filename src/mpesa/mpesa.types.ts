/**
 * Daraja (M-Pesa) wire shapes used by the relay.
 */

export interface AccessTokenResponse {
  access_token: string;
  /** Seconds, sent as a string */
  expires_in: string;
}

export interface StkPushRequest {
  BusinessShortCode: string;
  Password: string;
  Timestamp: string;
  TransactionType: 'CustomerBuyGoodsOnline' | 'CustomerPayBillOnline';
  Amount: number;
  PartyA: string;
  PartyB: string;
  PhoneNumber: string;
  CallBackURL: string;
  AccountReference: string;
  TransactionDesc: string;
}

/** Synchronous answer to an STK push. `ResponseCode` '0' means the prompt was sent. */
export interface StkPushAcknowledgement {
  MerchantRequestID?: string;
  CheckoutRequestID?: string;
  ResponseCode?: string;
  ResponseDescription?: string;
  CustomerMessage?: string;
  requestId?: string;
  errorCode?: string;
  errorMessage?: string;
}

export interface StkPushInput {
  phoneNumber: string;
  amount: number;
  accountReference: string;
  description?: string;
}

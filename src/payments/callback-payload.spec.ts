import { parseCallbackPayload } from './callback-payload';

describe('parseCallbackPayload', () => {
  it('should read the flat callback body', () => {
    const details = parseCallbackPayload({
      Amount: 250,
      PhoneNumber: 254712345678,
      MpesaReceiptNumber: 'RCP123',
      ResultCode: 0,
      AccountReference: 'ABCDEF123456',
    });

    expect(details).toEqual({
      amount: 250,
      phoneNumber: '254712345678',
      receiptNumber: 'RCP123',
      resultCode: 0,
      resultDesc: undefined,
      checkoutRequestId: undefined,
      merchantRequestId: undefined,
      accountReference: 'ABCDEF123456',
    });
  });

  it('should accept numeric fields sent as strings', () => {
    const details = parseCallbackPayload({ Amount: '99.5', ResultCode: '0', PhoneNumber: '254712345678' });

    expect(details.amount).toBe(99.5);
    expect(details.resultCode).toBe(0);
    expect(details.phoneNumber).toBe('254712345678');
  });

  it('should read the Daraja envelope and its metadata items', () => {
    const details = parseCallbackPayload({
      Body: {
        stkCallback: {
          MerchantRequestID: 'mr-1',
          CheckoutRequestID: 'ws_CO_1',
          ResultCode: 0,
          ResultDesc: 'The service request is processed successfully.',
          CallbackMetadata: {
            Item: [
              { Name: 'Amount', Value: 250 },
              { Name: 'MpesaReceiptNumber', Value: 'RCP999' },
              { Name: 'TransactionDate', Value: 20260301101530 },
              { Name: 'PhoneNumber', Value: 254712345678 },
            ],
          },
        },
      },
    });

    expect(details).toEqual({
      amount: 250,
      phoneNumber: '254712345678',
      receiptNumber: 'RCP999',
      resultCode: 0,
      resultDesc: 'The service request is processed successfully.',
      checkoutRequestId: 'ws_CO_1',
      merchantRequestId: 'mr-1',
      accountReference: undefined,
    });
  });

  it('should report a cancelled payment without metadata', () => {
    const details = parseCallbackPayload({
      Body: {
        stkCallback: {
          CheckoutRequestID: 'ws_CO_2',
          ResultCode: 1032,
          ResultDesc: 'Request cancelled by user',
        },
      },
    });

    expect(details.resultCode).toBe(1032);
    expect(details.resultDesc).toBe('Request cancelled by user');
    expect(details.amount).toBe('unknown amount');
    expect(details.phoneNumber).toBe('unknown number');
    expect(details.receiptNumber).toBe('unknown');
  });

  it('should fall back to sentinels for missing or malformed fields', () => {
    expect(parseCallbackPayload({ Amount: 'lots', PhoneNumber: '  ', ResultCode: 'ok' })).toEqual({
      amount: 'unknown amount',
      phoneNumber: 'unknown number',
      receiptNumber: 'unknown',
      resultCode: null,
      resultDesc: undefined,
      checkoutRequestId: undefined,
      merchantRequestId: undefined,
      accountReference: undefined,
    });
  });

  it('should treat a non-object payload as empty', () => {
    const details = parseCallbackPayload('not json');

    expect(details.phoneNumber).toBe('unknown number');
    expect(details.resultCode).toBeNull();
  });
});

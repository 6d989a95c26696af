import { Conversation } from '../conversations/entities/conversation.entity';
import { PaymentRequest } from '../payments/entities/payment-request.entity';

export const blankConversation = (): Conversation =>
  Object.assign(new Conversation(), { paymentAmount: null, active: true });

export const blankPaymentRequest = (): PaymentRequest =>
  Object.assign(new PaymentRequest(), {
    merchantRequestId: null,
    checkoutRequestId: null,
    receiptNumber: null,
    resultCode: null,
    resultDesc: null,
  });

import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { MessageRouter } from './messaging/message-router.service';
import { PaymentWorkflow } from './payments/payment-workflow.service';
import { CallbackCorrelator } from './payments/callback-correlator.service';
import { PaymentRequestsService } from './payments/payment-requests.service';
import { PaymentRequest } from './payments/entities/payment-request.entity';
import { ConversationStore } from './conversations/conversation.store';
import { Conversation } from './conversations/entities/conversation.entity';
import { WhatsappService } from './whatsapp/whatsapp.service';
import { TWILIO_CLIENT } from './whatsapp/twilio.provider';
import { MpesaService } from './mpesa/mpesa.service';
import { relayConfig } from './config/relay.config';
import { InMemoryRepository } from './testing/in-memory.repository';
import { blankConversation, blankPaymentRequest } from './testing/fixtures';
import { buildRelayConfig, CUSTOMER_NUMBER, FEEDBACK_NUMBER } from './testing/relay-config';

describe('relay flow', () => {
  let router: MessageRouter;
  let correlator: CallbackCorrelator;
  let conversationRepo: InMemoryRepository<Conversation>;
  let messagesCreate: jest.Mock;

  beforeEach(async () => {
    conversationRepo = new InMemoryRepository(blankConversation);
    messagesCreate = jest.fn().mockResolvedValue({ sid: 'SM1' });

    const module = await Test.createTestingModule({
      providers: [
        MessageRouter,
        PaymentWorkflow,
        CallbackCorrelator,
        PaymentRequestsService,
        ConversationStore,
        WhatsappService,
        { provide: TWILIO_CLIENT, useValue: { messages: { create: messagesCreate } } },
        {
          provide: MpesaService,
          useValue: {
            initiateStkPush: jest.fn().mockResolvedValue({
              MerchantRequestID: 'mr-1',
              CheckoutRequestID: 'ws_CO_1',
              ResponseCode: '0',
            }),
          },
        },
        { provide: getRepositoryToken(Conversation), useValue: conversationRepo },
        {
          provide: getRepositoryToken(PaymentRequest),
          useValue: new InMemoryRepository(blankPaymentRequest),
        },
        { provide: relayConfig.KEY, useValue: buildRelayConfig() },
      ],
    }).compile();

    router = module.get(MessageRouter);
    correlator = module.get(CallbackCorrelator);
  });

  function sent() {
    return messagesCreate.mock.calls.map(([message]) => message);
  }

  it('should connect a paying customer with the feedback number', async () => {
    await expect(router.route({ from: CUSTOMER_NUMBER, body: '!dm pesa 250' })).resolves.toBe(
      'Payment request of KES 250 sent to your phone. Please enter your PIN to complete.',
    );
    expect(conversationRepo.rows).toHaveLength(1);
    expect(conversationRepo.rows[0]).toMatchObject({ paymentAmount: 250, active: true });
    expect(sent()).toEqual([
      {
        body: 'New payment of KES 250 initiated by customer. You can now chat directly with them.',
        from: 'whatsapp:+14155238886',
        to: 'whatsapp:+254700000001',
      },
    ]);

    await expect(
      correlator.handle({
        Body: {
          stkCallback: {
            CheckoutRequestID: 'ws_CO_1',
            ResultCode: 0,
            CallbackMetadata: {
              Item: [
                { Name: 'Amount', Value: 250 },
                { Name: 'MpesaReceiptNumber', Value: 'RCP123' },
                { Name: 'PhoneNumber', Value: 254712345678 },
              ],
            },
          },
        },
      }),
    ).resolves.toEqual({ ResultCode: 0, ResultDesc: 'Callback received successfully' });
    expect(sent().slice(1).map(({ to }) => to)).toEqual([
      'whatsapp:+254712345678',
      'whatsapp:+254700000001',
    ]);

    await expect(router.route({ from: CUSTOMER_NUMBER, body: 'hello' })).resolves.toBe(
      'Message forwarded',
    );
    await expect(router.route({ from: FEEDBACK_NUMBER, body: 'Hi, how can we help?' })).resolves.toBe(
      'Message forwarded',
    );

    expect(sent().slice(3)).toEqual([
      { body: 'hello', from: 'whatsapp:+14155238886', to: 'whatsapp:+254700000001' },
      { body: 'Hi, how can we help?', from: 'whatsapp:+14155238886', to: 'whatsapp:+254712345678' },
    ]);
    expect(conversationRepo.rows).toHaveLength(1);
  });

  it('should leave a customer whose payment was rejected with the help text', async () => {
    await router.route({ from: CUSTOMER_NUMBER, body: '!dm pesa 0' });

    await expect(router.route({ from: CUSTOMER_NUMBER, body: 'hello' })).resolves.toBe(
      'To make a payment, send: !dm pesa [amount]',
    );
    expect(messagesCreate).not.toHaveBeenCalled();
  });
});

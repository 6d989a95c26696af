import { Test, TestingModule } from '@nestjs/testing';
import { MessageRouter } from './message-router.service';
import { PaymentWorkflow } from '../payments/payment-workflow.service';
import { ConversationStore } from '../conversations/conversation.store';
import { WhatsappService } from '../whatsapp/whatsapp.service';
import { relayConfig } from '../config/relay.config';
import {
  ConfigurationError,
  DeliveryError,
  GatewayAuthError,
  GatewayRequestError,
  PersistenceError,
  ValidationError,
} from '../common/errors';
import {
  buildRelayConfig,
  CUSTOMER_NUMBER,
  FEEDBACK_NUMBER,
} from '../testing/relay-config';

describe('MessageRouter', () => {
  let router: MessageRouter;
  let paymentWorkflow: { initiate: jest.Mock };
  let conversations: { isActive: jest.Mock; partnerOf: jest.Mock; touch: jest.Mock };
  let whatsappService: { send: jest.Mock };

  beforeEach(async () => {
    paymentWorkflow = {
      initiate: jest.fn().mockResolvedValue({
        status: 'accepted',
        amount: 250,
        correlationToken: 'ABCDEF123456',
        checkoutRequestId: 'ws_CO_1',
        feedbackNotified: true,
      }),
    };
    conversations = {
      isActive: jest.fn().mockResolvedValue(false),
      partnerOf: jest.fn().mockResolvedValue(null),
      touch: jest.fn().mockResolvedValue(undefined),
    };
    whatsappService = { send: jest.fn().mockResolvedValue('SM1') };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MessageRouter,
        { provide: PaymentWorkflow, useValue: paymentWorkflow },
        { provide: ConversationStore, useValue: conversations },
        { provide: WhatsappService, useValue: whatsappService },
        { provide: relayConfig.KEY, useValue: buildRelayConfig() },
      ],
    }).compile();

    router = module.get<MessageRouter>(MessageRouter);
  });

  describe('payment commands', () => {
    it('should start a payment and confirm the prompt was sent', async () => {
      const reply = await router.route({ from: CUSTOMER_NUMBER, body: '!dm pesa 250' });

      expect(paymentWorkflow.initiate).toHaveBeenCalledWith(CUSTOMER_NUMBER, 250);
      expect(reply).toBe(
        'Payment request of KES 250 sent to your phone. Please enter your PIN to complete.',
      );
    });

    it('should treat a command as a command even inside a conversation', async () => {
      conversations.isActive.mockResolvedValue(true);

      await router.route({ from: CUSTOMER_NUMBER, body: '!dm pesa 250' });

      expect(paymentWorkflow.initiate).toHaveBeenCalled();
      expect(whatsappService.send).not.toHaveBeenCalled();
    });

    it('should explain the command format', async () => {
      const reply = await router.route({ from: CUSTOMER_NUMBER, body: '!dm pesa' });

      expect(reply).toBe('Invalid command format. Use: !dm pesa [amount]');
      expect(paymentWorkflow.initiate).not.toHaveBeenCalled();
    });

    it('should explain the amount format', async () => {
      const reply = await router.route({ from: CUSTOMER_NUMBER, body: '!dm pesa lots' });

      expect(reply).toBe('Invalid amount. Please enter a numeric value like: !dm pesa 100');
      expect(paymentWorkflow.initiate).not.toHaveBeenCalled();
    });

    it.each([
      [
        new GatewayRequestError('Unable to lock subscriber'),
        'Failed to initiate payment: Unable to lock subscriber',
      ],
      [
        new GatewayAuthError('Failed to authenticate with M-Pesa API'),
        'Failed to initiate payment: Failed to authenticate with M-Pesa API',
      ],
      [
        new ValidationError('Invalid amount. The amount must be greater than zero.'),
        'Invalid amount. The amount must be greater than zero.',
      ],
      [
        new ConfigurationError('M-Pesa consumer key and secret must be set'),
        'Failed to initiate payment: payments are not available right now. Please try again later.',
      ],
      [
        new PersistenceError('Failed to upsert conversation'),
        'Sorry, something went wrong on our side. Please try again later.',
      ],
    ])('should reply to a %p rejection', async (error, expected) => {
      paymentWorkflow.initiate.mockResolvedValue({ status: 'rejected', reason: error.message, error });

      await expect(router.route({ from: CUSTOMER_NUMBER, body: '!dm pesa 250' })).resolves.toBe(
        expected,
      );
    });
  });

  describe('conversation traffic', () => {
    beforeEach(() => {
      conversations.isActive.mockResolvedValue(true);
    });

    it('should forward a customer message verbatim to the feedback number', async () => {
      conversations.partnerOf.mockResolvedValue(FEEDBACK_NUMBER);

      const reply = await router.route({ from: CUSTOMER_NUMBER, body: '  Hello, is anyone there?' });

      expect(reply).toBe('Message forwarded');
      expect(whatsappService.send).toHaveBeenCalledWith(FEEDBACK_NUMBER, '  Hello, is anyone there?');
      expect(conversations.touch).toHaveBeenCalledWith(CUSTOMER_NUMBER, FEEDBACK_NUMBER);
    });

    it('should forward a feedback reply to the customer', async () => {
      conversations.partnerOf.mockResolvedValue(CUSTOMER_NUMBER);

      const reply = await router.route({ from: FEEDBACK_NUMBER, body: 'How can we help?' });

      expect(reply).toBe('Message forwarded');
      expect(whatsappService.send).toHaveBeenCalledWith(CUSTOMER_NUMBER, 'How can we help?');
    });

    it('should still confirm a delivered message when the activity time cannot be refreshed', async () => {
      conversations.partnerOf.mockResolvedValue(FEEDBACK_NUMBER);
      conversations.touch.mockRejectedValue(new PersistenceError('Failed to touch conversation'));

      const reply = await router.route({ from: CUSTOMER_NUMBER, body: 'hello' });

      expect(reply).toBe('Message forwarded');
      expect(whatsappService.send).toHaveBeenCalledTimes(1);
    });

    it('should apologise when the partner is gone', async () => {
      const reply = await router.route({ from: CUSTOMER_NUMBER, body: 'hello' });

      expect(reply).toBe('Could not find your conversation partner. Please try again later.');
      expect(whatsappService.send).not.toHaveBeenCalled();
    });

    it('should apologise when delivery fails and leave the activity time alone', async () => {
      conversations.partnerOf.mockResolvedValue(FEEDBACK_NUMBER);
      whatsappService.send.mockRejectedValue(new DeliveryError('Failed to send WhatsApp message'));

      const reply = await router.route({ from: CUSTOMER_NUMBER, body: 'hello' });

      expect(reply).toBe("Sorry, we couldn't forward your message. Please try again later.");
      expect(conversations.touch).not.toHaveBeenCalled();
    });
  });

  describe('unsolicited messages', () => {
    it('should tell a stranger how to pay', async () => {
      const reply = await router.route({ from: CUSTOMER_NUMBER, body: 'hello' });

      expect(reply).toBe('To make a payment, send: !dm pesa [amount]');
      expect(whatsappService.send).not.toHaveBeenCalled();
    });

    it('should tell an idle feedback number to wait', async () => {
      const reply = await router.route({ from: FEEDBACK_NUMBER, body: 'anyone?' });

      expect(reply).toBe('There are no active customer conversations. Wait for payment notifications.');
    });
  });

  describe('failures', () => {
    it('should answer politely when storage is down', async () => {
      conversations.isActive.mockRejectedValue(new PersistenceError('Failed to check conversation'));

      const reply = await router.route({ from: CUSTOMER_NUMBER, body: 'hello' });

      expect(reply).toBe('Sorry, something went wrong on our side. Please try again later.');
    });

    it('should let unexpected faults through', async () => {
      conversations.isActive.mockRejectedValue(new TypeError('boom'));

      await expect(router.route({ from: CUSTOMER_NUMBER, body: 'hello' })).rejects.toThrow('boom');
    });
  });
});

import { Inject, Injectable, Logger } from '@nestjs/common';
import { relayConfig, RelayConfig } from '../config/relay.config';
import { ConversationStore } from '../conversations/conversation.store';
import { WhatsappService } from '../whatsapp/whatsapp.service';
import { PaymentRequestsService } from './payment-requests.service';
import { PaymentRequest } from './entities/payment-request.entity';
import { PaymentMessages } from './payment.messages';
import { parseCallbackPayload } from './callback-payload';
import { toGatewayMsisdn } from '../common/phone-number';
import { describeError } from '../common/errors';
import {
  CallbackAck,
  CallbackDetails,
  CallbackOutcome,
  UNKNOWN_AMOUNT,
  UNKNOWN_NUMBER,
} from './payment.types';

const SUCCESS_RESULT_CODE = 0;

/**
 * Callback Correlator
 *
 * Ties the gateway's asynchronous payment result back to the STK push that
 * caused it, finalizes the conversation and tells both parties.
 */
@Injectable()
export class CallbackCorrelator {
  private readonly logger = new Logger(CallbackCorrelator.name);

  constructor(
    private readonly conversations: ConversationStore,
    private readonly paymentRequests: PaymentRequestsService,
    private readonly whatsappService: WhatsappService,
    @Inject(relayConfig.KEY)
    private readonly config: RelayConfig,
  ) {}

  /**
   * Process a callback and build the acknowledgement for the gateway.
   * Only storage failures and unexpected faults produce `ResultCode: 1`.
   */
  async handle(payload: unknown): Promise<CallbackAck> {
    this.logger.log(`Received M-Pesa callback: ${JSON.stringify(payload)}`);

    try {
      const outcome = await this.correlate(parseCallbackPayload(payload));
      if (outcome.status === 'ignored') {
        this.logger.warn(`Callback ignored: ${outcome.reason}`);
      }
      return { ResultCode: 0, ResultDesc: 'Callback received successfully' };
    } catch (error) {
      this.logger.error(`Error processing callback: ${describeError(error)}`);
      return { ResultCode: 1, ResultDesc: `Error processing callback: ${describeError(error)}` };
    }
  }

  async correlate(details: CallbackDetails): Promise<CallbackOutcome> {
    const request = await this.paymentRequests.findForCallback({
      checkoutRequestId: details.checkoutRequestId,
      correlationToken: details.accountReference,
      gatewayNumber:
        details.phoneNumber === UNKNOWN_NUMBER
          ? undefined
          : toGatewayMsisdn(details.phoneNumber, this.config.mpesa.countryCode),
    });

    if (details.resultCode !== SUCCESS_RESULT_CODE) {
      if (request) {
        await this.paymentRequests.markFailed(request.id, {
          resultCode: details.resultCode ?? -1,
          resultDesc: details.resultDesc,
        });
      }
      this.logger.log(
        `Payment failed (code ${details.resultCode ?? 'missing'}): ${details.resultDesc ?? 'no description'}`,
      );
      return { status: 'ignored', reason: 'payment-failed' };
    }

    const customerNumber = this.customerNumberFor(details, request);
    if (customerNumber === null) {
      return { status: 'ignored', reason: 'unknown-number' };
    }

    if (request) {
      await this.paymentRequests.markCompleted(request.id, {
        resultCode: SUCCESS_RESULT_CODE,
        resultDesc: details.resultDesc,
        receiptNumber: details.receiptNumber,
      });
    }

    const amount = details.amount === UNKNOWN_AMOUNT ? request?.amount : details.amount;
    const feedbackNumber = this.config.feedbackNumber;
    await this.conversations.upsert(customerNumber, feedbackNumber, amount);

    const shownAmount = amount ?? UNKNOWN_AMOUNT;
    const deliveries = await Promise.all([
      this.notify(
        customerNumber,
        PaymentMessages.customerPaymentConfirmed(shownAmount, details.receiptNumber),
      ),
      this.notify(
        feedbackNumber,
        PaymentMessages.feedbackPaymentConfirmed(shownAmount, details.receiptNumber, customerNumber),
      ),
    ]);

    this.logger.log(`Payment confirmed for ${customerNumber} (receipt ${details.receiptNumber})`);
    return {
      status: 'confirmed',
      customerNumber,
      notified: deliveries.filter(Boolean).length,
    };
  }

  private customerNumberFor(
    details: CallbackDetails,
    request: PaymentRequest | null,
  ): string | null {
    if (request) return request.customerNumber;
    return details.phoneNumber === UNKNOWN_NUMBER ? null : details.phoneNumber;
  }

  private async notify(to: string, body: string): Promise<boolean> {
    try {
      await this.whatsappService.send(to, body);
      return true;
    } catch (error) {
      this.logger.error(`Failed to deliver confirmation to ${to}: ${describeError(error)}`);
      return false;
    }
  }
}

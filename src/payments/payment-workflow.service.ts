import { Inject, Injectable, Logger } from '@nestjs/common';
import { relayConfig, RelayConfig } from '../config/relay.config';
import { MpesaService } from '../mpesa/mpesa.service';
import { StkPushAcknowledgement } from '../mpesa/mpesa.types';
import { ConversationStore } from '../conversations/conversation.store';
import { WhatsappService } from '../whatsapp/whatsapp.service';
import { PaymentRequestsService } from './payment-requests.service';
import { PaymentMessages, formatKes } from './payment.messages';
import { PaymentOutcome } from './payment.types';
import { toGatewayMsisdn } from '../common/phone-number';
import {
  GatewayRequestError,
  RelayError,
  ValidationError,
  describeError,
  isRelayError,
} from '../common/errors';

const ACCEPTED_RESPONSE_CODE = '0';

/**
 * Payment Workflow
 *
 * Drives the synchronous half of the STK push handshake. An accepted push
 * opens (or refreshes) the customer's conversation with the feedback number
 * right away: the prompt reached the phone, the money has not moved yet. The
 * callback correlator finishes the job when the gateway reports back.
 *
 * Nothing is written unless the gateway accepts, and nothing is retried.
 */
@Injectable()
export class PaymentWorkflow {
  private readonly logger = new Logger(PaymentWorkflow.name);

  constructor(
    private readonly mpesaService: MpesaService,
    private readonly conversations: ConversationStore,
    private readonly paymentRequests: PaymentRequestsService,
    private readonly whatsappService: WhatsappService,
    @Inject(relayConfig.KEY)
    private readonly config: RelayConfig,
  ) {}

  async initiate(customerNumber: string, amount: number): Promise<PaymentOutcome> {
    this.logger.log(`Initiating STK push for ${customerNumber}, amount ${amount}`);

    const invalid = this.validateAmount(amount);
    if (invalid) {
      return this.reject(invalid);
    }

    const gatewayNumber = toGatewayMsisdn(customerNumber, this.config.mpesa.countryCode);
    const correlationToken = this.paymentRequests.generateCorrelationToken();

    let ack: StkPushAcknowledgement;
    try {
      ack = await this.mpesaService.initiateStkPush({
        phoneNumber: gatewayNumber,
        amount,
        accountReference: correlationToken,
      });
    } catch (error) {
      return this.reject(this.asRelayError(error));
    }

    if (ack.ResponseCode !== ACCEPTED_RESPONSE_CODE) {
      const reason = ack.errorMessage ?? ack.ResponseDescription ?? 'Unknown error';
      this.logger.warn(`STK push rejected for ${customerNumber}: ${reason}`);
      return this.reject(new GatewayRequestError(reason));
    }

    try {
      await this.conversations.upsert(customerNumber, this.config.feedbackNumber, amount);
    } catch (error) {
      return this.reject(this.asRelayError(error));
    }

    try {
      await this.paymentRequests.record({
        correlationToken,
        merchantRequestId: ack.MerchantRequestID,
        checkoutRequestId: ack.CheckoutRequestID,
        customerNumber,
        gatewayNumber,
        amount,
      });
    } catch (error) {
      // The prompt is already on the phone; the callback can still match by number
      this.logger.error(
        `Payment request ${correlationToken} for ${customerNumber} not recorded: ${describeError(error)}`,
      );
    }

    const feedbackNotified = await this.notifyFeedback(amount);

    this.logger.log(
      `STK push accepted for ${customerNumber} (checkout ${ack.CheckoutRequestID ?? 'n/a'}, ref ${correlationToken})`,
    );
    return {
      status: 'accepted',
      amount,
      correlationToken,
      checkoutRequestId: ack.CheckoutRequestID,
      feedbackNotified,
    };
  }

  private validateAmount(amount: number): ValidationError | null {
    if (!Number.isFinite(amount) || amount <= 0) {
      return new ValidationError('Invalid amount. The amount must be greater than zero.');
    }
    const { maxAmount } = this.config.mpesa;
    if (amount > maxAmount) {
      return new ValidationError(`Invalid amount. The maximum is ${formatKes(maxAmount)}.`);
    }
    return null;
  }

  private async notifyFeedback(amount: number): Promise<boolean> {
    try {
      await this.whatsappService.send(
        this.config.feedbackNumber,
        PaymentMessages.feedbackPaymentInitiated(amount),
      );
      this.logger.log(`Notification sent to ${this.config.feedbackNumber}`);
      return true;
    } catch (error) {
      // The conversation is already open; the representative just was not told
      this.logger.error(`Failed to notify feedback number: ${describeError(error)}`);
      return false;
    }
  }

  private reject(error: RelayError): PaymentOutcome {
    return { status: 'rejected', reason: error.message, error };
  }

  private asRelayError(error: unknown): RelayError {
    if (isRelayError(error)) return error;
    this.logger.error(`Unexpected payment failure: ${describeError(error)}`);
    return new GatewayRequestError(describeError(error), undefined, { cause: error });
  }
}

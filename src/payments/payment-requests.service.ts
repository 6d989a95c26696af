import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { randomUUID } from 'crypto';
import { PaymentRequest } from './entities/payment-request.entity';
import { PersistenceError, describeError } from '../common/errors';

// Daraja truncates AccountReference after 12 characters
const CORRELATION_TOKEN_LENGTH = 12;

export interface NewPaymentRequest {
  correlationToken: string;
  merchantRequestId?: string;
  checkoutRequestId?: string;
  customerNumber: string;
  gatewayNumber: string;
  amount: number;
}

export interface CallbackKeys {
  checkoutRequestId?: string;
  correlationToken?: string;
  gatewayNumber?: string;
}

export interface PaymentResult {
  resultCode: number;
  resultDesc?: string;
  receiptNumber?: string;
}

@Injectable()
export class PaymentRequestsService {
  private readonly logger = new Logger(PaymentRequestsService.name);

  constructor(
    @InjectRepository(PaymentRequest)
    private readonly paymentRequestRepo: Repository<PaymentRequest>,
  ) {}

  generateCorrelationToken(): string {
    return randomUUID().replace(/-/g, '').slice(0, CORRELATION_TOKEN_LENGTH).toUpperCase();
  }

  async record(data: NewPaymentRequest): Promise<PaymentRequest> {
    return this.persist('record payment request', () =>
      this.paymentRequestRepo.save(
        this.paymentRequestRepo.create({
          ...data,
          merchantRequestId: data.merchantRequestId ?? null,
          checkoutRequestId: data.checkoutRequestId ?? null,
          status: 'pending',
        }),
      ),
    );
  }

  /**
   * Find the request a callback belongs to: by checkout request id, then by
   * our correlation token, then the latest pending request for the number.
   */
  async findForCallback(keys: CallbackKeys): Promise<PaymentRequest | null> {
    return this.persist('look up payment request', async () => {
      if (keys.checkoutRequestId) {
        const byCheckout = await this.paymentRequestRepo.findOne({
          where: { checkoutRequestId: keys.checkoutRequestId },
        });
        if (byCheckout) return byCheckout;
      }

      if (keys.correlationToken) {
        const byToken = await this.paymentRequestRepo.findOne({
          where: { correlationToken: keys.correlationToken },
        });
        if (byToken) return byToken;
      }

      if (keys.gatewayNumber) {
        return this.paymentRequestRepo.findOne({
          where: { gatewayNumber: keys.gatewayNumber, status: 'pending' },
          order: { createdAt: 'DESC' },
        });
      }

      return null;
    });
  }

  async markCompleted(id: string, result: PaymentResult): Promise<void> {
    await this.persist('complete payment request', async () => {
      await this.paymentRequestRepo.update(
        { id },
        {
          status: 'completed',
          resultCode: result.resultCode,
          resultDesc: result.resultDesc ?? null,
          receiptNumber: result.receiptNumber ?? null,
        },
      );
    });
  }

  async markFailed(id: string, result: PaymentResult): Promise<void> {
    await this.persist('fail payment request', async () => {
      await this.paymentRequestRepo.update(
        { id },
        {
          status: 'failed',
          resultCode: result.resultCode,
          resultDesc: result.resultDesc ?? null,
        },
      );
    });
  }

  private async persist<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      this.logger.error(`Failed to ${operation}: ${describeError(error)}`);
      throw new PersistenceError(`Failed to ${operation}`, { cause: error });
    }
  }
}

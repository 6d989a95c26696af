import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { relayConfig, RelayConfig } from '../config/relay.config';
import {
  ConfigurationError,
  GatewayAuthError,
  GatewayRequestError,
  describeError,
} from '../common/errors';
import {
  AccessTokenResponse,
  StkPushAcknowledgement,
  StkPushInput,
  StkPushRequest,
} from './mpesa.types';

const TOKEN_PATH = '/oauth/v2/generate?grant_type=client_credentials';
const STK_PUSH_PATH = '/mpesa/stkpush/v1/processrequest';

// Refresh a cached token this long before the gateway expires it
const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;

/**
 * `YYYYMMDDHHmmss` in local time, the format Daraja signs passwords with.
 */
export function formatGatewayTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return (
    date.getFullYear().toString() +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

export function buildStkPassword(shortCode: string, passkey: string, timestamp: string): string {
  return Buffer.from(`${shortCode}${passkey}${timestamp}`).toString('base64');
}

/**
 * M-Pesa Daraja client
 *
 * OAuth token acquisition and STK push submission. Tokens are cached until
 * shortly before the gateway expires them; the STK password is recomputed on
 * every request since it is bound to the submission second.
 */
@Injectable()
export class MpesaService {
  private readonly logger = new Logger(MpesaService.name);
  private cachedToken: { value: string; expiresAt: number } | null = null;

  constructor(
    private readonly httpService: HttpService,
    @Inject(relayConfig.KEY)
    private readonly config: RelayConfig,
  ) {
    const { consumerKey, consumerSecret } = this.config.mpesa;
    if (!consumerKey || !consumerSecret) {
      this.logger.warn('M-Pesa credentials not configured; payment commands will fail');
    }
  }

  async getAccessToken(): Promise<string> {
    if (this.cachedToken && Date.now() < this.cachedToken.expiresAt) {
      return this.cachedToken.value;
    }

    const { baseUrl, consumerKey, consumerSecret } = this.config.mpesa;
    if (!consumerKey || !consumerSecret) {
      throw new ConfigurationError('M-Pesa consumer key and secret must be set');
    }

    const encoded = Buffer.from(`${consumerKey}:${consumerSecret}`).toString('base64');

    let data: Partial<AccessTokenResponse>;
    try {
      const response = await firstValueFrom(
        this.httpService.get<Partial<AccessTokenResponse>>(`${baseUrl}${TOKEN_PATH}`, {
          headers: { Authorization: `Basic ${encoded}` },
        }),
      );
      data = response.data;
    } catch (error) {
      this.logger.error(`M-Pesa authentication failed: ${this.describeHttpError(error)}`);
      throw new GatewayAuthError('Failed to authenticate with M-Pesa API', { cause: error });
    }

    if (typeof data?.access_token !== 'string' || data.access_token.length === 0) {
      this.logger.error(`No access token in M-Pesa response: ${JSON.stringify(data)}`);
      throw new GatewayAuthError('Invalid response format from M-Pesa API');
    }

    const lifetimeSeconds = Number.parseInt(data.expires_in ?? '', 10);
    if (Number.isFinite(lifetimeSeconds) && lifetimeSeconds > 0) {
      this.cachedToken = {
        value: data.access_token,
        expiresAt: Date.now() + lifetimeSeconds * 1000 - TOKEN_REFRESH_MARGIN_MS,
      };
    }

    this.logger.debug('Retrieved M-Pesa access token');
    return data.access_token;
  }

  invalidateToken(): void {
    this.cachedToken = null;
  }

  /**
   * Push a payment prompt to the customer's phone.
   *
   * Resolves with the gateway's acknowledgement whenever it answered with a
   * 2xx; the caller decides what the `ResponseCode` means. Error responses,
   * transport failures and timeouts throw a GatewayRequestError.
   */
  async initiateStkPush(input: StkPushInput): Promise<StkPushAcknowledgement> {
    const { baseUrl, shortCode, passkey, tillNumber, callbackUrl } = this.config.mpesa;
    if (!shortCode || !passkey || !tillNumber || !callbackUrl) {
      throw new ConfigurationError(
        'M-Pesa short code, passkey, till number and callback URL must be set',
      );
    }

    const accessToken = await this.getAccessToken();
    const timestamp = formatGatewayTimestamp(new Date());

    const payload: StkPushRequest = {
      BusinessShortCode: shortCode,
      Password: buildStkPassword(shortCode, passkey, timestamp),
      Timestamp: timestamp,
      TransactionType: 'CustomerBuyGoodsOnline',
      Amount: input.amount,
      PartyA: input.phoneNumber,
      PartyB: tillNumber,
      PhoneNumber: input.phoneNumber,
      CallBackURL: callbackUrl,
      AccountReference: input.accountReference,
      TransactionDesc: input.description ?? 'Payment via WhatsApp',
    };

    this.logger.log(
      `Initiating STK push of ${input.amount} to ${input.phoneNumber} (ref ${input.accountReference})`,
    );

    try {
      const response = await firstValueFrom(
        this.httpService.post<StkPushAcknowledgement>(`${baseUrl}${STK_PUSH_PATH}`, payload, {
          headers: {
            Authorization: `Bearer ${accessToken}`,
            'Content-Type': 'application/json',
          },
        }),
      );
      this.logger.log(`STK push response: ${JSON.stringify(response.data)}`);
      return response.data;
    } catch (error) {
      throw this.toRequestError(error);
    }
  }

  private toRequestError(error: unknown): GatewayRequestError {
    if (!isAxiosError<StkPushAcknowledgement>(error)) {
      return new GatewayRequestError(describeError(error), undefined, { cause: error });
    }

    const status = error.response?.status;
    if (status === 401) {
      this.invalidateToken();
    }

    this.logger.error(`STK push failed: ${this.describeHttpError(error)}`);

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new GatewayRequestError('M-Pesa request timed out', status, { cause: error });
    }

    const body = error.response?.data;
    const reason = body?.errorMessage ?? body?.ResponseDescription ?? error.message;
    return new GatewayRequestError(reason, status, { cause: error });
  }

  private describeHttpError(error: unknown): string {
    if (isAxiosError(error) && error.response) {
      return `${error.response.status} ${JSON.stringify(error.response.data)}`;
    }
    return describeError(error);
  }
}

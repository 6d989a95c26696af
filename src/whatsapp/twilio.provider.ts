import { Provider } from '@nestjs/common';
import twilio from 'twilio';
import { relayConfig, RelayConfig } from '../config/relay.config';

export const TWILIO_CLIENT = Symbol('TWILIO_CLIENT');

/**
 * The slice of the Twilio REST client the relay sends through.
 */
export interface MessagingClient {
  messages: {
    create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  };
}

/**
 * Builds the Twilio client once; null when credentials are absent so the
 * service can still boot.
 */
export const twilioClientProvider: Provider = {
  provide: TWILIO_CLIENT,
  useFactory: (config: RelayConfig): MessagingClient | null => {
    const { accountSid, authToken } = config.twilio;
    if (!accountSid || !authToken) {
      return null;
    }
    return twilio(accountSid, authToken, { timeout: config.httpTimeoutMs });
  },
  inject: [relayConfig.KEY],
};

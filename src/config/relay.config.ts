import { ConfigType, registerAs } from '@nestjs/config';
import { stripChannelPrefix } from '../common/phone-number';

const DEFAULT_MPESA_BASE_URL = 'https://api.safaricom.co.ke';

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function integer(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Relay settings, read once at start-up and frozen.
 *
 * Injected with `@Inject(relayConfig.KEY)` wherever a component needs
 * credentials or numbers; nothing else reads the environment.
 */
export const relayConfig = registerAs('relay', () =>
  Object.freeze({
    feedbackNumber: stripChannelPrefix(process.env.FEEDBACK_NUMBER ?? ''),
    conversationTtlMinutes: integer(process.env.CONVERSATION_TTL_MINUTES, 24 * 60),
    httpTimeoutMs: integer(process.env.HTTP_TIMEOUT_MS, 10_000),
    mpesa: Object.freeze({
      baseUrl: optional(process.env.MPESA_BASE_URL) ?? DEFAULT_MPESA_BASE_URL,
      consumerKey: optional(process.env.MPESA_CONSUMER_KEY),
      consumerSecret: optional(process.env.MPESA_CONSUMER_SECRET),
      shortCode: optional(process.env.MPESA_SHORT_CODE),
      passkey: optional(process.env.MPESA_PASSKEY),
      tillNumber: optional(process.env.MPESA_TILL_NUMBER),
      callbackUrl: optional(process.env.MPESA_CALLBACK_URL),
      countryCode: optional(process.env.MPESA_COUNTRY_CODE) ?? '254',
      maxAmount: integer(process.env.MPESA_MAX_AMOUNT, 250_000),
    }),
    twilio: Object.freeze({
      accountSid: optional(process.env.TWILIO_ACCOUNT_SID),
      authToken: optional(process.env.TWILIO_AUTH_TOKEN),
      whatsappNumber: optional(process.env.TWILIO_WHATSAPP_NUMBER),
      validateSignature: ['true', '1'].includes(process.env.TWILIO_VALIDATE_SIGNATURE ?? ''),
      publicUrl: optional(process.env.PUBLIC_URL),
    }),
  }),
);

export type RelayConfig = ConfigType<typeof relayConfig>;

import { Inject, Injectable, Logger } from '@nestjs/common';
import twilio from 'twilio';
import { relayConfig, RelayConfig } from '../config/relay.config';
import { stripChannelPrefix } from '../common/phone-number';
import { ConfigurationError, DeliveryError, describeError } from '../common/errors';
import { MessagingClient, TWILIO_CLIENT } from './twilio.provider';

const WHATSAPP_PREFIX = 'whatsapp:';

/**
 * Outbound WhatsApp delivery through Twilio, and TwiML for inline replies.
 */
@Injectable()
export class WhatsappService {
  private readonly logger = new Logger(WhatsappService.name);

  constructor(
    @Inject(TWILIO_CLIENT)
    private readonly client: MessagingClient | null,
    @Inject(relayConfig.KEY)
    private readonly config: RelayConfig,
  ) {
    if (!client) {
      this.logger.warn('Twilio credentials not configured; outbound messages will fail');
    }
  }

  /**
   * Send `body` to `to`. Resolves with the message SID; every failure,
   * including missing configuration, is a DeliveryError.
   */
  async send(to: string, body: string): Promise<string> {
    const sender = this.config.twilio.whatsappNumber;
    if (!this.client || !sender) {
      const cause = new ConfigurationError('Twilio account and WhatsApp number must be set');
      this.logger.error(`Cannot send WhatsApp message to ${to}: ${cause.message}`);
      throw new DeliveryError(`Failed to send WhatsApp message to ${to}`, { cause });
    }

    const from = `${WHATSAPP_PREFIX}${stripChannelPrefix(sender)}`;
    const recipient = `${WHATSAPP_PREFIX}${stripChannelPrefix(to)}`;
    this.logger.log(`Sending WhatsApp message from ${from} to ${recipient}`);

    try {
      const message = await this.client.messages.create({ body, from, to: recipient });
      this.logger.log(`Message sent successfully. SID: ${message.sid}`);
      return message.sid;
    } catch (error) {
      this.logger.error(`Failed to send WhatsApp message to ${recipient}: ${describeError(error)}`);
      throw new DeliveryError(`Failed to send WhatsApp message to ${to}`, { cause: error });
    }
  }

  /**
   * Render a single inline reply as a TwiML messaging document.
   */
  toReply(text: string): string {
    const response = new twilio.twiml.MessagingResponse();
    response.message(text);
    return response.toString();
  }
}

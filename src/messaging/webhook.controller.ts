import {
  Body,
  Controller,
  Header,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';
import { MessageRouter } from './message-router.service';
import { Replies } from './replies';
import { InboundMessageDto } from './dto/inbound-message.dto';
import { TwilioSignatureGuard } from './guards/twilio-signature.guard';
import { WhatsappService } from '../whatsapp/whatsapp.service';
import { stripChannelPrefix } from '../common/phone-number';
import { describeError } from '../common/errors';

@Controller()
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    private readonly messageRouter: MessageRouter,
    private readonly whatsappService: WhatsappService,
  ) {}

  /**
   * Inbound WhatsApp message
   * POST /webhook
   *
   * Form-encoded Twilio webhook; answers with a TwiML document holding the
   * single reply for the sender.
   */
  @Post('webhook')
  @UseGuards(TwilioSignatureGuard)
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/xml')
  async receive(@Body() message: InboundMessageDto): Promise<string> {
    const from = stripChannelPrefix(message.From ?? '').trim();
    if (from.length === 0) {
      this.logger.warn('Webhook call without a sender');
      return this.whatsappService.toReply(Replies.help);
    }

    try {
      const reply = await this.messageRouter.route({
        from,
        body: message.Body ?? '',
      });
      return this.whatsappService.toReply(reply);
    } catch (error) {
      this.logger.error(`Error processing message: ${describeError(error)}`);
      throw new InternalServerErrorException('Internal server error');
    }
  }
}

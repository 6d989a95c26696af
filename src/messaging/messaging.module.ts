import { Module } from '@nestjs/common';
import { ConversationsModule } from '../conversations/conversations.module';
import { PaymentsModule } from '../payments/payments.module';
import { WhatsappModule } from '../whatsapp/whatsapp.module';
import { MessageRouter } from './message-router.service';
import { WebhookController } from './webhook.controller';
import { TwilioSignatureGuard } from './guards/twilio-signature.guard';

@Module({
  imports: [ConversationsModule, PaymentsModule, WhatsappModule],
  controllers: [WebhookController],
  providers: [MessageRouter, TwilioSignatureGuard],
})
export class MessagingModule {}

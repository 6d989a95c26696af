import { Module } from '@nestjs/common';
import { twilioClientProvider } from './twilio.provider';
import { WhatsappService } from './whatsapp.service';

@Module({
  providers: [twilioClientProvider, WhatsappService],
  exports: [WhatsappService],
})
export class WhatsappModule {}

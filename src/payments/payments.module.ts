import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MpesaModule } from '../mpesa/mpesa.module';
import { ConversationsModule } from '../conversations/conversations.module';
import { WhatsappModule } from '../whatsapp/whatsapp.module';
import { PaymentRequest } from './entities/payment-request.entity';
import { PaymentRequestsService } from './payment-requests.service';
import { PaymentWorkflow } from './payment-workflow.service';
import { CallbackCorrelator } from './callback-correlator.service';
import { MpesaCallbackController } from './mpesa-callback.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([PaymentRequest]),
    MpesaModule,
    ConversationsModule,
    WhatsappModule,
  ],
  controllers: [MpesaCallbackController],
  providers: [PaymentRequestsService, PaymentWorkflow, CallbackCorrelator],
  exports: [PaymentWorkflow],
})
export class PaymentsModule {}

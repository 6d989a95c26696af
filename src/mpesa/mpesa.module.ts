import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { relayConfig, RelayConfig } from '../config/relay.config';
import { MpesaService } from './mpesa.service';

@Module({
  imports: [
    HttpModule.registerAsync({
      useFactory: (config: RelayConfig) => ({
        timeout: config.httpTimeoutMs,
      }),
      inject: [relayConfig.KEY],
    }),
  ],
  providers: [MpesaService],
  exports: [MpesaService],
})
export class MpesaModule {}

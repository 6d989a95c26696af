import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { CallbackCorrelator } from './callback-correlator.service';
import { CallbackAck } from './payment.types';

@SkipThrottle()
@Controller()
export class MpesaCallbackController {
  constructor(private readonly callbackCorrelator: CallbackCorrelator) {}

  /**
   * M-Pesa STK Callback Handler
   * POST /mpesa-callback
   *
   * Always answers 200 with the `{ ResultCode, ResultDesc }` envelope Daraja
   * expects, so the gateway does not retry.
   */
  @Post('mpesa-callback')
  @HttpCode(HttpStatus.OK)
  async handleCallback(@Body() payload: Record<string, unknown>): Promise<CallbackAck> {
    return this.callbackCorrelator.handle(payload);
  }
}

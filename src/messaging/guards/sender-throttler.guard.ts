import { Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { stripChannelPrefix } from '../../common/phone-number';

/**
 * Rate limit per chat sender rather than per IP: every webhook call comes
 * from the provider's servers.
 */
@Injectable()
export class SenderThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    const body = req.body;
    if (typeof body === 'object' && body !== null && 'From' in body && typeof body.From === 'string') {
      return stripChannelPrefix(body.From);
    }
    return typeof req.ip === 'string' ? req.ip : 'unknown';
  }
}

import { CanActivate, ExecutionContext, ForbiddenException, Inject, Injectable, Logger } from '@nestjs/common';
import { Request } from 'express';
import twilio from 'twilio';
import { relayConfig, RelayConfig } from '../../config/relay.config';

const SIGNATURE_HEADER = 'x-twilio-signature';

/**
 * Rejects webhook calls that Twilio did not sign. Only active when
 * TWILIO_VALIDATE_SIGNATURE is set; the signed URL is PUBLIC_URL plus the
 * request path.
 */
@Injectable()
export class TwilioSignatureGuard implements CanActivate {
  private readonly logger = new Logger(TwilioSignatureGuard.name);

  constructor(
    @Inject(relayConfig.KEY)
    private readonly config: RelayConfig,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const { validateSignature, authToken, publicUrl } = this.config.twilio;
    if (!validateSignature) return true;

    const request = context.switchToHttp().getRequest<Request>();
    const signature = request.header(SIGNATURE_HEADER);
    if (!authToken || !publicUrl || !signature) {
      this.logger.warn('Rejected unsigned webhook call');
      throw new ForbiddenException('Invalid signature');
    }

    const url = `${publicUrl.replace(/\/$/, '')}${request.originalUrl}`;
    const params: Record<string, unknown> =
      typeof request.body === 'object' && request.body !== null ? request.body : {};

    if (!twilio.validateRequest(authToken, signature, url, params)) {
      this.logger.warn(`Rejected webhook call with a bad signature for ${url}`);
      throw new ForbiddenException('Invalid signature');
    }
    return true;
  }
}

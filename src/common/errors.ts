/**
 * Relay error taxonomy
 *
 * Every failure the relay knows how to recover from is one of these.
 * They are caught at the handler boundary and turned into a chat reply or a
 * callback acknowledgment; anything else is an unexpected fault.
 */

export type RelayErrorKind =
  | 'configuration'
  | 'gateway-auth'
  | 'gateway-request'
  | 'validation'
  | 'delivery'
  | 'persistence';

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required credential or setting is missing. */
export class ConfigurationError extends RelayError {
  readonly kind = 'configuration';
}

/** OAuth token acquisition from the payment gateway failed. */
export class GatewayAuthError extends RelayError {
  readonly kind = 'gateway-auth';
}

/** STK push transport failure or non-success gateway response. */
export class GatewayRequestError extends RelayError {
  readonly kind = 'gateway-request';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationError extends RelayError {
  readonly kind = 'validation';
}

/** Outbound chat message could not be sent. */
export class DeliveryError extends RelayError {
  readonly kind = 'delivery';
}

export class PersistenceError extends RelayError {
  readonly kind = 'persistence';
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

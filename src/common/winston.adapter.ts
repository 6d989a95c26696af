import { LoggerService } from '@nestjs/common';
import { Logger } from 'winston';
import { logger } from './logger';

/**
 * Routes Nest's logger through winston. Installed with `app.useLogger()`.
 */
export class WinstonLoggerAdapter implements LoggerService {
  private readonly logger: Logger;

  constructor(target: Logger = logger) {
    this.logger = target;
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    this.call('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    this.call('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    this.call('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    this.call('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    this.call('verbose', message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]) {
    this.call('error', message, optionalParams);
  }

  private call(level: string, message: unknown, optionalParams: unknown[]) {
    // Nest passes the context as the last argument
    const last = optionalParams[optionalParams.length - 1];
    const context = typeof last === 'string' ? last : undefined;
    const meta = context ? optionalParams.slice(0, -1) : optionalParams;

    this.logger.log({
      level,
      message: typeof message === 'string' ? message : JSON.stringify(message),
      context,
      ...(meta.length > 0 && { meta }),
    });
  }
}

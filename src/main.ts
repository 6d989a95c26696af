import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import * as Sentry from '@sentry/node';

import { AppModule } from './app.module';
import { WinstonLoggerAdapter } from './common/winston.adapter';
import { describeError } from './common/errors';

async function bootstrap() {
  // Error tracking in production only
  if (process.env.NODE_ENV === 'production' && process.env.SENTRY_DSN) {
    Sentry.init({
      dsn: process.env.SENTRY_DSN,
      environment: process.env.NODE_ENV,
      tracesSampleRate: 0.1,
    });
    new WinstonLoggerAdapter().log('Sentry error tracking initialized', 'Bootstrap');
  }

  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(new WinstonLoggerAdapter());

  // Twilio posts many fields besides From and Body; strip rather than reject them
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  // Security headers
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  app.enableShutdownHooks();

  const port = process.env.PORT || 3001;
  await app.listen(port);

  new WinstonLoggerAdapter().log(`Payment relay running on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  const stack = error instanceof Error ? error.stack : undefined;
  new WinstonLoggerAdapter().error(`Failed to start application: ${describeError(error)}`, stack, 'Bootstrap');
  Sentry.captureException(error);
  process.exit(1);
});

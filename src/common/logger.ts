import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LoggerSettings {
  level: string;
  production: boolean;
  /** Where rotated files and crash logs go */
  directory: string;
}

export function loggerSettings(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const production = env.NODE_ENV === 'production';
  return {
    production,
    level: env.LOG_LEVEL || (production ? 'info' : 'debug'),
    directory: env.LOG_DIR || 'logs',
  };
}

// International (+254712345678) or national (0712345678) numbers; keeps the last four digits
const PHONE_NUMBER = /(?<!\d)(\+?)(\d{5,11})(\d{4})(?!\d)/g;

export function redactPhoneNumbers(text: string): string {
  return text.replace(
    PHONE_NUMBER,
    (_match, plus: string, hidden: string, tail: string) => `${plus}${'*'.repeat(hidden.length)}${tail}`,
  );
}

// Applied at the logger level, so every transport sees redacted messages
const redact = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactPhoneNumbers(info.message);
  }
  return info;
});

const fileFormat = winston.format.combine(
  redact(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    const contextStr = context ? `[${String(context)}]` : '';
    return `${String(timestamp)} ${level} ${contextStr} ${String(message)} ${metaStr}`;
  }),
);

/**
 * Daily files for production: everything for a week, errors for two.
 */
export function rotatedFileOptions(directory: string): DailyRotateFile.DailyRotateFileTransportOptions[] {
  return [
    {
      dirname: directory,
      filename: 'pesa-relay-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '7d',
      format: fileFormat,
    },
    {
      dirname: directory,
      filename: 'pesa-relay-error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '14d',
      format: fileFormat,
    },
  ];
}

export function createLogger(settings: LoggerSettings): winston.Logger {
  const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];
  if (!settings.production) {
    return winston.createLogger({ level: settings.level, format: fileFormat, transports });
  }

  for (const options of rotatedFileOptions(settings.directory)) {
    transports.push(new DailyRotateFile(options));
  }
  return winston.createLogger({
    level: settings.level,
    format: fileFormat,
    transports,
    exceptionHandlers: [
      new winston.transports.File({ dirname: settings.directory, filename: 'exceptions.log', format: fileFormat }),
    ],
    rejectionHandlers: [
      new winston.transports.File({ dirname: settings.directory, filename: 'rejections.log', format: fileFormat }),
    ],
  });
}

export const logger = createLogger(loggerSettings());

import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Min,
  validateSync,
} from 'class-validator';

// Reads the raw value: implicit conversion has already turned 'false' into true
const toBoolean = ({ obj, key }: TransformFnParams) => {
  const raw: unknown = obj[key];
  return raw === true || raw === 'true' || raw === '1';
};

/**
 * Environment accepted at start-up.
 *
 * Only the feedback number is mandatory: without gateway or Twilio
 * credentials the service still boots and the affected operations fail
 * with a configuration error instead.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsIn(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsString()
  LOG_DIR?: string;

  @IsOptional()
  @IsString()
  SENTRY_DSN?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  MPESA_BASE_URL?: string;

  @IsOptional()
  @IsString()
  MPESA_CONSUMER_KEY?: string;

  @IsOptional()
  @IsString()
  MPESA_CONSUMER_SECRET?: string;

  @IsOptional()
  @IsString()
  MPESA_SHORT_CODE?: string;

  @IsOptional()
  @IsString()
  MPESA_PASSKEY?: string;

  @IsOptional()
  @IsString()
  MPESA_TILL_NUMBER?: string;

  @IsOptional()
  @IsString()
  MPESA_CALLBACK_URL?: string;

  @IsOptional()
  @Matches(/^\d{1,4}$/)
  MPESA_COUNTRY_CODE?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  MPESA_MAX_AMOUNT?: number;

  @IsString()
  @IsNotEmpty()
  FEEDBACK_NUMBER!: string;

  @IsOptional()
  @IsString()
  TWILIO_ACCOUNT_SID?: string;

  @IsOptional()
  @IsString()
  TWILIO_AUTH_TOKEN?: string;

  @IsOptional()
  @IsString()
  TWILIO_WHATSAPP_NUMBER?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  TWILIO_VALIDATE_SIGNATURE?: boolean;

  @IsOptional()
  @IsString()
  PUBLIC_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  CONVERSATION_TTL_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  THROTTLE_LIMIT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  THROTTLE_TTL_MS?: number;
}

export function validateEnvironment(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}

import { IsOptional, IsString } from 'class-validator';

/**
 * The fields of Twilio's inbound message webhook the relay reads. Twilio
 * posts many more; the validation pipe strips them.
 */
export class InboundMessageDto {
  @IsOptional()
  @IsString()
  From?: string;

  @IsOptional()
  @IsString()
  Body?: string;
}

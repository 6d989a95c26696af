import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ConversationStore } from './conversation.store';
import { describeError } from '../common/errors';

/**
 * Hourly pass closing conversations that outlived their TTL, so idle pairs
 * are released even when neither party writes again.
 */
@Injectable()
export class ConversationSweeper {
  private readonly logger = new Logger(ConversationSweeper.name);

  constructor(private readonly conversations: ConversationStore) {}

  @Cron(CronExpression.EVERY_HOUR, { name: 'conversation-sweeper' })
  async sweep(): Promise<number> {
    try {
      return await this.conversations.deactivateStale();
    } catch (error) {
      this.logger.error(`Conversation sweep failed: ${describeError(error)}`);
      return 0;
    }
  }
}

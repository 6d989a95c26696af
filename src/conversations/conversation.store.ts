import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, LessThan, Repository } from 'typeorm';
import { Conversation } from './entities/conversation.entity';
import { relayConfig, RelayConfig } from '../config/relay.config';
import { PersistenceError, describeError } from '../common/errors';

export type ConversationRef = Readonly<Conversation>;

/**
 * Conversation Store
 *
 * Sole owner of conversation records. Other components read and mutate
 * conversations only through these methods.
 *
 * Conversations idle for longer than the configured TTL are treated as
 * closed: lookups deactivate them on the way past, and the sweeper does the
 * same in bulk.
 */
@Injectable()
export class ConversationStore {
  private readonly logger = new Logger(ConversationStore.name);

  private readonly ttlMs: number;

  constructor(
    @InjectRepository(Conversation)
    private readonly conversationRepo: Repository<Conversation>,
    @Inject(relayConfig.KEY)
    config: RelayConfig,
  ) {
    this.ttlMs = config.conversationTtlMinutes * 60 * 1000;
  }

  /**
   * Open or refresh the conversation for a pair.
   *
   * A single INSERT ... ON CONFLICT statement, so concurrent calls for the
   * same pair cannot produce two rows or lose an update. `paymentAmount`
   * is only overwritten when an amount is given.
   */
  async upsert(
    customerNumber: string,
    feedbackNumber: string,
    amount?: number,
  ): Promise<ConversationRef> {
    return this.persist('upsert conversation', async () => {
      await this.conversationRepo.upsert(
        {
          customerNumber,
          feedbackNumber,
          lastActivityAt: new Date(),
          active: true,
          ...(amount !== undefined && { paymentAmount: amount }),
        },
        {
          conflictPaths: ['customerNumber', 'feedbackNumber'],
          skipUpdateIfNoValuesChanged: false,
        },
      );

      const conversation = await this.conversationRepo.findOne({
        where: { customerNumber, feedbackNumber },
      });
      if (!conversation) {
        throw new Error(`Conversation ${customerNumber}/${feedbackNumber} missing after upsert`);
      }

      this.logger.log(
        `Conversation ${conversation.id} active between ${customerNumber} and ${feedbackNumber}`,
      );
      return conversation;
    });
  }

  /**
   * True when the number is either party of a live conversation.
   */
  async isActive(phoneNumber: string): Promise<boolean> {
    return this.persist('check conversation', async () => {
      const asCustomer = await this.findLive({ customerNumber: phoneNumber });
      if (asCustomer.length > 0) return true;

      const asFeedback = await this.findLive({ feedbackNumber: phoneNumber });
      return asFeedback.length > 0;
    });
  }

  /**
   * The other party of the number's live conversation.
   *
   * A customer-side match wins over a feedback-side one. The feedback number
   * may be in several conversations; the most recently active customer is
   * returned.
   */
  async partnerOf(phoneNumber: string): Promise<string | null> {
    return this.persist('resolve conversation partner', async () => {
      const [asCustomer] = await this.findLive({ customerNumber: phoneNumber });
      if (asCustomer) return asCustomer.feedbackNumber;

      const [asFeedback] = await this.findLive({ feedbackNumber: phoneNumber });
      return asFeedback?.customerNumber ?? null;
    });
  }

  /**
   * Refresh the activity timestamp of the live pair, in whichever
   * orientation it was stored.
   */
  async touch(first: string, second: string): Promise<void> {
    await this.persist('touch conversation', async () => {
      const lastActivityAt = new Date();
      await this.conversationRepo.update(
        { customerNumber: first, feedbackNumber: second, active: true },
        { lastActivityAt },
      );
      await this.conversationRepo.update(
        { customerNumber: second, feedbackNumber: first, active: true },
        { lastActivityAt },
      );
    });
  }

  async deactivate(customerNumber: string, feedbackNumber: string): Promise<void> {
    await this.persist('deactivate conversation', async () => {
      await this.conversationRepo.update(
        { customerNumber, feedbackNumber },
        { active: false },
      );
      this.logger.log(`Conversation closed between ${customerNumber} and ${feedbackNumber}`);
    });
  }

  /**
   * Deactivate every live conversation idle for longer than the TTL.
   * Returns the number of conversations closed.
   */
  async deactivateStale(now: Date = new Date()): Promise<number> {
    if (this.ttlMs <= 0) return 0;

    return this.persist('deactivate stale conversations', async () => {
      const cutoff = new Date(now.getTime() - this.ttlMs);
      const result = await this.conversationRepo.update(
        { active: true, lastActivityAt: LessThan(cutoff) },
        { active: false },
      );
      const closed = result.affected ?? 0;
      if (closed > 0) {
        this.logger.log(`Closed ${closed} idle conversation(s)`);
      }
      return closed;
    });
  }

  private async findLive(
    where: FindOptionsWhere<Conversation>,
  ): Promise<Conversation[]> {
    const candidates = await this.conversationRepo.find({
      where: { ...where, active: true },
      order: { lastActivityAt: 'DESC' },
    });

    const live: Conversation[] = [];
    for (const conversation of candidates) {
      if (this.isExpired(conversation)) {
        await this.conversationRepo.update({ id: conversation.id }, { active: false });
        this.logger.log(`Conversation ${conversation.id} expired after inactivity`);
      } else {
        live.push(conversation);
      }
    }
    return live;
  }

  private isExpired(conversation: Conversation): boolean {
    if (this.ttlMs <= 0) return false;
    return Date.now() - conversation.lastActivityAt.getTime() > this.ttlMs;
  }

  private async persist<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      this.logger.error(`Failed to ${operation}: ${describeError(error)}`);
      throw new PersistenceError(`Failed to ${operation}`, { cause: error });
    }
  }
}

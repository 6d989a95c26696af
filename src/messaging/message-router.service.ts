import { Inject, Injectable, Logger } from '@nestjs/common';
import { relayConfig, RelayConfig } from '../config/relay.config';
import { ConversationStore } from '../conversations/conversation.store';
import { PaymentWorkflow } from '../payments/payment-workflow.service';
import { WhatsappService } from '../whatsapp/whatsapp.service';
import { DeliveryError, PersistenceError, describeError } from '../common/errors';
import { parseCommand } from './command-parser';
import { Replies, invalidCommandReply, paymentReply } from './replies';

export interface InboundMessage {
  /** Sender number without the channel prefix */
  from: string;
  body: string;
}

/**
 * Message Router
 *
 * Decides what an inbound chat message is: a payment command, traffic for
 * the sender's conversation partner, or something that only gets help text
 * back. Always produces exactly one reply for the sender.
 */
@Injectable()
export class MessageRouter {
  private readonly logger = new Logger(MessageRouter.name);

  constructor(
    private readonly paymentWorkflow: PaymentWorkflow,
    private readonly conversations: ConversationStore,
    private readonly whatsappService: WhatsappService,
    @Inject(relayConfig.KEY)
    private readonly config: RelayConfig,
  ) {}

  async route(message: InboundMessage): Promise<string> {
    this.logger.log(`Received message from ${message.from}: ${message.body}`);

    try {
      return await this.dispatch(message);
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.logger.error(`Storage unavailable while routing: ${describeError(error)}`);
        return Replies.internalError;
      }
      throw error;
    }
  }

  private async dispatch({ from, body }: InboundMessage): Promise<string> {
    const command = parseCommand(body);

    switch (command.kind) {
      case 'pesa-payment': {
        const outcome = await this.paymentWorkflow.initiate(from, command.amount);
        if (outcome.status === 'rejected') {
          this.logger.warn(`Payment from ${from} rejected (${outcome.error.kind}): ${outcome.reason}`);
        }
        return paymentReply(outcome);
      }
      case 'invalid':
        return invalidCommandReply(command);
      case 'unrecognized':
        break;
    }

    if (await this.conversations.isActive(from)) {
      return this.forward(from, body);
    }

    if (from === this.config.feedbackNumber) {
      return Replies.noActiveCustomers;
    }
    return Replies.help;
  }

  private async forward(from: string, body: string): Promise<string> {
    const partner = await this.conversations.partnerOf(from);
    if (!partner) {
      this.logger.warn(`No conversation partner for ${from}`);
      return Replies.partnerNotFound;
    }

    try {
      await this.whatsappService.send(partner, body);
    } catch (error) {
      if (error instanceof DeliveryError) {
        return Replies.forwardFailed;
      }
      throw error;
    }

    this.logger.log(`Forwarded message from ${from} to ${partner}`);

    // Already delivered
    try {
      await this.conversations.touch(from, partner);
    } catch (error) {
      this.logger.error(`Failed to refresh conversation ${from}/${partner}: ${describeError(error)}`);
    }
    return Replies.forwarded;
  }
}

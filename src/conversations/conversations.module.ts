import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Conversation } from './entities/conversation.entity';
import { ConversationStore } from './conversation.store';
import { ConversationSweeper } from './conversation.sweeper';

@Module({
  imports: [TypeOrmModule.forFeature([Conversation])],
  providers: [ConversationStore, ConversationSweeper],
  exports: [ConversationStore],
})
export class ConversationsModule {}

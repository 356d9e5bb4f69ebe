import { Module } from '@nestjs/common';
import { CONVERSATION_STORE } from './conversation-store';
import { KyselyConversationStore } from './kysely-conversation-store';
import { RepliesSweepCron } from './replies-sweep.cron';
import { ThreadConversionService } from './thread-conversion.service';

@Module({
  providers: [
    { provide: CONVERSATION_STORE, useClass: KyselyConversationStore },
    ThreadConversionService,
    RepliesSweepCron,
  ],
  exports: [CONVERSATION_STORE, ThreadConversionService, RepliesSweepCron],
})
export class ConversationsModule {}

import { Module } from '@nestjs/common';
import { JobsModule } from './jobs.module';
import { JobsProcessor } from './jobs.processor';
import { StreamModule } from '../stream/stream.module';
import { UsersModule } from '../users/users.module';
import { ConversationsModule } from '../conversations/conversations.module';

/**
 * Worker-only module: the BullMQ processor lives here so API-only processes can
 * skip job consumption by not importing it (RUN_JOB_CONSUMERS=false).
 */
@Module({
  imports: [JobsModule, StreamModule, UsersModule, ConversationsModule],
  providers: [JobsProcessor],
})
export class JobsConsumersModule {}

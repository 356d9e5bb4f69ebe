import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { BullModule } from '@nestjs/bullmq';
import { AppController } from './app.controller';
import { envSchema, validateEnv } from './env';
import { AppConfigModule } from './app-config.module';
import { AppConfigService } from './app-config.service';
import { HealthModule } from '../health/health.module';
import { DatabaseModule } from '../database/database.module';
import { ConversationsModule } from '../conversations/conversations.module';
import { StreamModule } from '../stream/stream.module';
import { UsersModule } from '../users/users.module';
import { AdminModule } from '../admin/admin.module';
import { JobsModule } from '../jobs/jobs.module';
import { JobsConsumersModule } from '../jobs/jobs-consumers.module';

// Module wiring is static; use env flags as a pragmatic switch for which processes host consumers.
const RUN_JOB_CONSUMERS_RAW = (process.env.RUN_JOB_CONSUMERS ?? 'true').trim().toLowerCase();
const RUN_JOB_CONSUMERS = RUN_JOB_CONSUMERS_RAW === '' ? true : ['1', 'true', 'yes', 'on'].includes(RUN_JOB_CONSUMERS_RAW);

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv(envSchema),
    }),
    AppConfigModule,
    DatabaseModule,
    BullModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: (cfg: AppConfigService) => ({
        connection: { url: cfg.redisUrl() },
      }),
    }),
    JobsModule,
    HealthModule,
    ConversationsModule,
    StreamModule,
    UsersModule,
    AdminModule,
    ...(RUN_JOB_CONSUMERS ? [JobsConsumersModule] : []),
  ],
  controllers: [AppController],
})
export class AppModule {}

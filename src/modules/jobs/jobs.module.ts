import { Global, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { JobsService } from './jobs.service';
import { JobsStatusService } from './jobs-status.service';
import { CIVIC_BACKGROUND_QUEUE } from './jobs.constants';

@Global()
@Module({
  imports: [
    BullModule.registerQueue({
      name: CIVIC_BACKGROUND_QUEUE,
    }),
  ],
  providers: [JobsService, JobsStatusService],
  exports: [JobsService, JobsStatusService, BullModule],
})
export class JobsModule {}

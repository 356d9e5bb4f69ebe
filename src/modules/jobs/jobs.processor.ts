import { Processor, WorkerHost } from '@nestjs/bullmq';
import type { Job } from 'bullmq';
import { Logger } from '@nestjs/common';
import { CIVIC_BACKGROUND_QUEUE, JOBS } from './jobs.constants';
import { StreamListenerCron } from '../stream/stream-listener.cron';
import { UsersRefreshCron } from '../users/users-refresh.cron';
import { RepliesSweepCron } from '../conversations/replies-sweep.cron';

// The stream listener holds a worker slot for as long as the connection lives.
@Processor(CIVIC_BACKGROUND_QUEUE, { concurrency: 3 })
export class JobsProcessor extends WorkerHost {
  private readonly logger = new Logger(JobsProcessor.name);

  constructor(
    private readonly streamListener: StreamListenerCron,
    private readonly usersRefresh: UsersRefreshCron,
    private readonly repliesSweep: RepliesSweepCron,
  ) {
    super();
  }

  override async process(job: Job): Promise<unknown> {
    const name = String(job.name ?? '');
    const startedAt = Date.now();
    try {
      switch (name) {
        case JOBS.streamListen:
          return await this.streamListener.runListen();
        case JOBS.usersRefresh:
          return await this.usersRefresh.runRefresh();
        case JOBS.postsRepliesSweep:
          return await this.repliesSweep.runSweep();
        default:
          this.logger.warn(`Unknown job name: ${name}`);
          return { ok: false, reason: 'unknown_job' };
      }
    } finally {
      const ms = Date.now() - startedAt;
      this.logger.debug(`Job ${name} done (${ms}ms)`);
    }
  }
}

import { InjectQueue } from '@nestjs/bullmq';
import { Injectable } from '@nestjs/common';
import type { Job, JobsOptions, Queue } from 'bullmq';
import { JOBS, CIVIC_BACKGROUND_QUEUE, type JobName } from './jobs.constants';

export type JobPayload = Record<string, unknown>;

/** The slice of JobsService a cron class needs to schedule its own run. */
export type CronEnqueuer = {
  enqueueCron(name: JobName, payload: JobPayload, jobId: string): Promise<unknown>;
};

@Injectable()
export class JobsService {
  constructor(@InjectQueue(CIVIC_BACKGROUND_QUEUE) private readonly queue: Queue) {}

  async enqueue<TPayload extends JobPayload = JobPayload>(
    name: JobName,
    payload: TPayload,
    opts?: JobsOptions,
  ): Promise<Job<TPayload, unknown, string>> {
    return await this.queue.add(name, payload, opts);
  }

  /**
   * Cron-style enqueue with a stable jobId: while a job with that id is still
   * waiting or running, BullMQ keeps the existing one and this call is a no-op.
   */
  async enqueueCron(name: JobName, payload: JobPayload = {}, jobId: string, opts?: JobsOptions) {
    return await this.enqueue(name, payload, {
      jobId,
      removeOnComplete: true,
      removeOnFail: true,
      ...opts,
    });
  }

  jobNames() {
    return JOBS;
  }

  queueName() {
    return CIVIC_BACKGROUND_QUEUE;
  }
}

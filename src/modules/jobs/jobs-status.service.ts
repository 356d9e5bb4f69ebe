import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { Queue } from 'bullmq';
import { QueueEvents } from 'bullmq';
import { CIVIC_BACKGROUND_QUEUE } from './jobs.constants';
import { AppConfigService } from '../app/app-config.service';

const KNOWN_STATES = ['waiting', 'delayed', 'active', 'completed', 'failed', 'paused', 'prioritized', 'waiting-children'] as const;
type KnownState = (typeof KNOWN_STATES)[number];

function toKnownState(state: string): KnownState | 'unknown' {
  return KNOWN_STATES.find((s) => s === state) ?? 'unknown';
}

export type JobStatus =
  | { status: 'not_found' }
  | {
      status: KnownState | 'unknown';
      jobId: string;
      name: string;
      attemptsMade: number;
      processedOn: number | null;
      finishedOn: number | null;
      failedReason: string | null;
      returnValue: unknown;
    };

@Injectable()
export class JobsStatusService implements OnModuleDestroy {
  private readonly logger = new Logger(JobsStatusService.name);
  private readonly queueEvents: QueueEvents;

  constructor(
    @InjectQueue(CIVIC_BACKGROUND_QUEUE) private readonly queue: Queue,
    cfg: AppConfigService,
  ) {
    // QueueEvents is used only for optional admin `wait=true` flows.
    this.queueEvents = new QueueEvents(CIVIC_BACKGROUND_QUEUE, {
      connection: { url: cfg.redisUrl() },
    });
  }

  async onModuleDestroy() {
    await this.queueEvents
      .close()
      .catch((err: unknown) => this.logger.warn(`QueueEvents close failed: ${err instanceof Error ? err.message : String(err)}`));
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    const j = await this.queue.getJob(jobId);
    if (!j) return { status: 'not_found' };

    const state = await j.getState();
    return {
      status: toKnownState(state),
      jobId: String(j.id ?? jobId),
      name: String(j.name ?? ''),
      attemptsMade: j.attemptsMade ?? 0,
      processedOn: typeof j.processedOn === 'number' ? j.processedOn : null,
      finishedOn: typeof j.finishedOn === 'number' ? j.finishedOn : null,
      failedReason: j.failedReason ? String(j.failedReason) : null,
      returnValue: j.returnvalue ?? null,
    };
  }

  async waitForCompletion(jobId: string, timeoutMs: number): Promise<{ ok: true; result: unknown } | { ok: false; reason: string }> {
    const j = await this.queue.getJob(jobId);
    if (!j) return { ok: false, reason: 'not_found' };
    try {
      const result: unknown = await j.waitUntilFinished(this.queueEvents, timeoutMs);
      return { ok: true, result };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : 'wait_failed' };
    }
  }
}

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AppConfigService } from '../app/app-config.service';
import { JobsService } from '../jobs/jobs.service';
import { JOBS } from '../jobs/jobs.constants';
import { StreamListenerService } from './stream-listener.service';
import type { StreamRunOutcome } from './stream.types';

export type StreamListenJobResult =
  | { ok: false; reason: 'not_configured' | 'already_running' }
  | { ok: true; connections: number; outcome: StreamRunOutcome };

@Injectable()
export class StreamListenerCron implements OnModuleDestroy {
  private readonly logger = new Logger(StreamListenerCron.name);
  private running = false;

  constructor(
    private readonly listener: StreamListenerService,
    private readonly jobs: JobsService,
    private readonly appConfig: AppConfigService,
  ) {}

  /**
   * Reconnection policy lives here: the listener returns on a disconnect, and the
   * next tick starts it again. The stable job id keeps a single listener queued or running.
   */
  @Cron(CronExpression.EVERY_MINUTE)
  async ensureListening() {
    if (!this.appConfig.runSchedulers()) return;
    if (!this.appConfig.stream()) return;
    try {
      await this.jobs.enqueueCron(JOBS.streamListen, {}, 'cron:streamListen');
    } catch (err) {
      this.logger.warn(`Could not enqueue stream listener: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async runListen(): Promise<StreamListenJobResult> {
    if (!this.appConfig.stream()) {
      this.logger.warn('STREAM_BEARER_TOKEN is not set; not connecting');
      return { ok: false, reason: 'not_configured' };
    }
    if (this.running) return { ok: false, reason: 'already_running' };
    this.running = true;
    try {
      const { outcome, connections } = await this.listener.listen();
      return { ok: true, connections, outcome };
    } finally {
      this.running = false;
    }
  }

  onModuleDestroy() {
    this.listener.stop();
  }
}

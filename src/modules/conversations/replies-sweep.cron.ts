import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { AppConfigService } from '../app/app-config.service';
import { JobsService, type CronEnqueuer } from '../jobs/jobs.service';
import { JOBS } from '../jobs/jobs.constants';
import { CONVERSATION_STORE, type ConversationStore } from './conversation-store';
import { ThreadConversionService, type MakeRepliesResult } from './thread-conversion.service';

@Injectable()
export class RepliesSweepCron {
  private readonly logger = new Logger(RepliesSweepCron.name);
  private running = false;

  constructor(
    @Inject(CONVERSATION_STORE) private readonly store: ConversationStore,
    private readonly conversions: ThreadConversionService,
    @Inject(JobsService) private readonly jobs: CronEnqueuer,
    private readonly appConfig: AppConfigService,
  ) {}

  /**
   * Replies that arrived before their parent was promoted stay candidates.
   * This picks them up once the parent becomes a vision or a reply.
   */
  @Cron('*/15 * * * *')
  async sweep() {
    if (!this.appConfig.runSchedulers()) return;
    try {
      await this.jobs.enqueueCron(JOBS.postsRepliesSweep, {}, 'cron:postsRepliesSweep');
    } catch (err) {
      this.logger.warn(`Could not enqueue replies sweep: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async runSweep(): Promise<MakeRepliesResult | null> {
    if (this.running) return null;
    this.running = true;
    const startedAt = Date.now();
    try {
      const candidates = await this.store.listUnassignedReplies(this.appConfig.repliesSweepBatchSize());
      if (candidates.length === 0) return { succeeded: 0, failed: 0, failures: [] };

      const result = await this.conversions.makeReplies(candidates.map((p) => p.id));
      const ms = Date.now() - startedAt;
      this.logger.log(`Replies sweep: attached=${result.succeeded} waiting=${result.failed} (${ms}ms)`);
      return result;
    } finally {
      this.running = false;
    }
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AppConfigService } from '../app/app-config.service';
import { JobsService } from '../jobs/jobs.service';
import { JOBS } from '../jobs/jobs.constants';
import { UsersRefreshService, type UsersRefreshResult } from './users-refresh.service';

export type UsersRefreshJobResult = { ok: false; reason: 'not_configured' } | ({ ok: true } & UsersRefreshResult);

@Injectable()
export class UsersRefreshCron {
  private readonly logger = new Logger(UsersRefreshCron.name);

  constructor(
    private readonly refresher: UsersRefreshService,
    private readonly jobs: JobsService,
    private readonly appConfig: AppConfigService,
  ) {}

  @Cron(CronExpression.EVERY_DAY_AT_4AM)
  async refreshDaily() {
    if (!this.appConfig.runSchedulers()) return;
    if (!this.appConfig.profileApi()) return;
    try {
      await this.jobs.enqueueCron(JOBS.usersRefresh, {}, 'cron:usersRefresh');
    } catch (err) {
      this.logger.warn(`Could not enqueue users refresh: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  /** Remote failures are not caught here: the job fails and is retried on the next run. */
  async runRefresh(): Promise<UsersRefreshJobResult> {
    if (!this.appConfig.profileApi()) {
      this.logger.warn('PROFILE_API_BEARER_TOKEN is not set; skipping users refresh');
      return { ok: false, reason: 'not_configured' };
    }
    const startedAt = Date.now();
    const result = await this.refresher.refreshAll();
    this.logger.log(`Users refresh done users=${result.users} chunks=${result.chunks} (${Date.now() - startedAt}ms)`);
    return { ok: true, ...result };
  }
}

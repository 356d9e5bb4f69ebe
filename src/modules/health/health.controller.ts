import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { AppConfigService } from '../app/app-config.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly db: DatabaseService,
    private readonly appConfig: AppConfigService,
  ) {}

  @Get()
  async health() {
    const now = new Date();
    const uptimeSeconds = Math.max(0, Math.floor(process.uptime()));
    const config = {
      nodeEnv: this.appConfig.nodeEnv(),
      streamConfigured: Boolean(this.appConfig.stream()),
      trackedKeywords: this.appConfig.streamKeywords().length,
      profileApiConfigured: Boolean(this.appConfig.profileApi()),
      roles: {
        http: this.appConfig.runHttp(),
        jobConsumers: this.appConfig.runJobConsumers(),
        schedulers: this.appConfig.runSchedulers(),
      },
    };

    const startedAt = Date.now();
    try {
      // Readiness-style check: the pool can run a trivial query.
      await this.db.ping();
      return {
        data: {
          status: 'ok',
          nowIso: now.toISOString(),
          uptimeSeconds,
          service: 'civic-stream-api',
          config,
          db: { status: 'ok', latencyMs: Date.now() - startedAt },
        },
      };
    } catch (err) {
      return {
        data: {
          status: 'degraded',
          nowIso: now.toISOString(),
          uptimeSeconds,
          service: 'civic-stream-api',
          config,
          db: {
            status: 'down',
            latencyMs: Date.now() - startedAt,
            error: err instanceof Error ? err.message : String(err),
          },
        },
      };
    }
  }
}

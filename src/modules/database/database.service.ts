import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Kysely, Migrator, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';
import { AppConfigService } from '../app/app-config.service';
import type { DatabaseSchema } from './database.schema';
import { migrationProvider } from './migrations';

@Injectable()
export class DatabaseService extends Kysely<DatabaseSchema> implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  constructor(private readonly appConfig: AppConfigService) {
    super({
      dialect: new PostgresDialect({
        pool: new Pool({ connectionString: appConfig.databaseUrl(), max: 10 }),
      }),
    });
  }

  async ping(): Promise<void> {
    await sql`SELECT 1`.execute(this);
  }

  async onModuleInit() {
    const retries = this.appConfig.dbConnectRetries();
    const delayMs = this.appConfig.dbConnectRetryDelayMs();

    let lastError: unknown;
    let connected = false;
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        await this.ping();
        connected = true;
        break;
      } catch (err) {
        lastError = err;
        // Give Postgres a moment to come up (especially when using docker compose).
        await new Promise((r) => setTimeout(r, delayMs));
      }
    }

    if (!connected) {
      throw new Error(
        `Could not connect to the database after ${retries} attempts. ` +
          `Is Postgres running and is DATABASE_URL correct?\n` +
          `Last error: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      );
    }

    if (this.appConfig.runMigrations()) await this.migrateToLatest();
  }

  async migrateToLatest() {
    const migrator = new Migrator({ db: this, provider: migrationProvider });
    const { error, results } = await migrator.migrateToLatest();
    for (const r of results ?? []) {
      if (r.status === 'Success') this.logger.log(`Migration ${r.migrationName} applied`);
      else if (r.status === 'Error') this.logger.error(`Migration ${r.migrationName} failed`);
    }
    if (error) throw error;
  }

  async onModuleDestroy() {
    await this.destroy();
  }
}

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type NodeEnv = 'development' | 'test' | 'production';

export type StreamCredentials = {
  url: string;
  bearerToken: string;
};

export type ProfileApiCredentials = {
  url: string;
  bearerToken: string;
};

const DEFAULT_STREAM_URL = 'https://stream.twitter.com/1.1/statuses/filter.json';
const DEFAULT_PROFILE_API_URL = 'https://api.twitter.com/1.1/users/lookup.json';

export function parseKeywordList(raw: string | null | undefined): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const part of (raw ?? '').split(',')) {
    const kw = part.trim();
    if (!kw) continue;
    const key = kw.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(kw);
  }
  return out;
}

@Injectable()
export class AppConfigService {
  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number) {
    const raw = this.config.get<string>(key) ?? '';
    const n = Number(raw);
    return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  private readNonNegativeInt(key: string, fallback: number) {
    const raw = (this.config.get<string>(key) ?? '').trim();
    if (!raw) return fallback;
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
  }

  private readOptional(key: string): string | null {
    const v = this.config.get<string>(key)?.trim() ?? '';
    return v ? v : null;
  }

  nodeEnv(): NodeEnv {
    const v = (this.config.get<string>('NODE_ENV') ?? '').trim().toLowerCase();
    if (v === 'production' || v === 'test') return v;
    return 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    return this.readPositiveInt('PORT', 3001);
  }

  databaseUrl(): string {
    return (this.config.get<string>('DATABASE_URL') ?? '').trim();
  }

  redisUrl(): string {
    return (this.config.get<string>('REDIS_URL') ?? 'redis://localhost:6379').trim() || 'redis://localhost:6379';
  }

  runHttp(): boolean {
    return this.readBool('RUN_HTTP', true);
  }

  runSchedulers(): boolean {
    return this.readBool('RUN_SCHEDULERS', true);
  }

  runJobConsumers(): boolean {
    return this.readBool('RUN_JOB_CONSUMERS', true);
  }

  runMigrations(): boolean {
    return this.readBool('RUN_MIGRATIONS', true);
  }

  /** Number of connection retries on startup (default 20). */
  dbConnectRetries(): number {
    return this.readPositiveInt('DB_CONNECT_RETRIES', 20);
  }

  /** Delay in ms between connection retries (default 500). */
  dbConnectRetryDelayMs(): number {
    return this.readPositiveInt('DB_CONNECT_RETRY_DELAY_MS', 500);
  }

  /** Null when no credential is configured; the stream job is skipped in that case. */
  stream(): StreamCredentials | null {
    const bearerToken = this.readOptional('STREAM_BEARER_TOKEN');
    if (!bearerToken) return null;
    return { url: this.readOptional('STREAM_URL') ?? DEFAULT_STREAM_URL, bearerToken };
  }

  streamKeywords(): string[] {
    return parseKeywordList(this.config.get<string>('STREAM_KEYWORDS'));
  }

  /** How many recent posts seed the followed-author list. */
  streamRecentWindow(): number {
    return Math.min(100_000, this.readPositiveInt('STREAM_RECENT_WINDOW', 5000));
  }

  /** Minimum spacing between reconnects triggered by a restart request. 0 disables. */
  streamRestartMinIntervalMs(): number {
    return this.readNonNegativeInt('STREAM_RESTART_MIN_INTERVAL_MS', 0);
  }

  profileApi(): ProfileApiCredentials | null {
    const bearerToken = this.readOptional('PROFILE_API_BEARER_TOKEN');
    if (!bearerToken) return null;
    return { url: this.readOptional('PROFILE_API_URL') ?? DEFAULT_PROFILE_API_URL, bearerToken };
  }

  usersRefreshChunkSize(): number {
    return Math.min(1000, this.readPositiveInt('USERS_REFRESH_CHUNK_SIZE', 100));
  }

  usersRefreshDelayMs(): number {
    return this.readNonNegativeInt('USERS_REFRESH_DELAY_MS', 60_000);
  }

  repliesSweepBatchSize(): number {
    return Math.min(5_000, this.readPositiveInt('REPLIES_SWEEP_BATCH_SIZE', 500));
  }

  adminApiToken(): string | null {
    return this.readOptional('ADMIN_API_TOKEN');
  }
}

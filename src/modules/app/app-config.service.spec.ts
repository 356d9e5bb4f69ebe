import { ConfigService } from '@nestjs/config';
import { AppConfigService, parseKeywordList } from './app-config.service';

function configWith(values: Record<string, string>) {
  return new AppConfigService(new ConfigService(values));
}

describe('parseKeywordList', () => {
  it('trims, drops blanks and removes case-insensitive duplicates', () => {
    expect(parseKeywordList(' parks, Schools ,,PARKS , libraries')).toEqual(['parks', 'Schools', 'libraries']);
  });

  it('returns an empty list for missing input', () => {
    expect(parseKeywordList(undefined)).toEqual([]);
    expect(parseKeywordList('')).toEqual([]);
  });
});

describe('AppConfigService', () => {
  it('uses the reference refresh cadence by default', () => {
    const cfg = configWith({});
    expect(cfg.usersRefreshChunkSize()).toBe(100);
    expect(cfg.usersRefreshDelayMs()).toBe(60_000);
    expect(cfg.streamRecentWindow()).toBe(5000);
    expect(cfg.streamRestartMinIntervalMs()).toBe(0);
  });

  it('reads overrides and clamps the chunk size', () => {
    const cfg = configWith({
      USERS_REFRESH_CHUNK_SIZE: '5000',
      USERS_REFRESH_DELAY_MS: '0',
      STREAM_RECENT_WINDOW: '250',
      STREAM_RESTART_MIN_INTERVAL_MS: '1500',
    });
    expect(cfg.usersRefreshChunkSize()).toBe(1000);
    expect(cfg.usersRefreshDelayMs()).toBe(0);
    expect(cfg.streamRecentWindow()).toBe(250);
    expect(cfg.streamRestartMinIntervalMs()).toBe(1500);
  });

  it('reports the stream as unconfigured without a token', () => {
    expect(configWith({ STREAM_URL: 'https://stream.test/filter.json' }).stream()).toBeNull();
    expect(configWith({ STREAM_BEARER_TOKEN: 'test-token' }).stream()).toEqual({
      url: 'https://stream.twitter.com/1.1/statuses/filter.json',
      bearerToken: 'test-token',
    });
  });

  it('parses process role flags', () => {
    const cfg = configWith({ RUN_SCHEDULERS: 'off', RUN_MIGRATIONS: 'yes', RUN_HTTP: 'maybe' });
    expect(cfg.runSchedulers()).toBe(false);
    expect(cfg.runMigrations()).toBe(true);
    expect(cfg.runHttp()).toBe(true);
  });
});

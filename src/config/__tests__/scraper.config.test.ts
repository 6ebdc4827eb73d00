import { describe, expect, it } from 'vitest';
import { loadScraperConfig } from '../scraper.config';
import { ConfigurationError } from '../../utils/errors';

const baseEnv = {
  SUPABASE_URL: 'https://example.supabase.co',
  SUPABASE_KEY: 'test-key',
};

const issuesOf = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
};

describe('loadScraperConfig', () => {
  it('applies defaults and freezes the result', () => {
    const config = loadScraperConfig(baseEnv);

    expect(config.timeframes).toEqual(['hourly', '8hours', 'day', 'week', 'year']);
    expect(config.arbitrageThreshold).toBe(1.0);
    expect(config.runIntervalMinutes).toBe(60);
    expect(config.maxRetryAttempts).toBe(3);
    expect(config.retryDelayMs).toBe(5000);
    expect(config.batchInsertSize).toBe(50);
    expect(config.retentionDays).toBe(30);
    expect(config.pageLoadWaitMs).toBe(10000);
    expect(config.overallTimeoutMs).toBe(30000);
    expect(config.headless).toBe(true);
    expect(config.sourceUrl).toBe('https://api.hyperliquid.xyz');
    expect(config.telegram.enabled).toBe(false);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadScraperConfig({
      ...baseEnv,
      TIMEFRAMES: 'day, hourly,day',
      ARBITRAGE_THRESHOLD: '0.5',
      HEADLESS_MODE: 'false',
      RUN_INTERVAL_MINUTES: '15',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.timeframes).toEqual(['day', 'hourly']);
    expect(config.arbitrageThreshold).toBe(0.5);
    expect(config.headless).toBe(false);
    expect(config.runIntervalMinutes).toBe(15);
    expect(config.logLevel).toBe('debug');
  });

  it('accepts SUPABASE_ANON_KEY as the key', () => {
    const config = loadScraperConfig({ SUPABASE_URL: baseEnv.SUPABASE_URL, SUPABASE_ANON_KEY: 'test-anon-key' });
    expect(config.supabaseKey).toBe('test-anon-key');
  });

  it('requires database settings unless told otherwise', () => {
    expect(issuesOf(() => loadScraperConfig({}))).toEqual(['SUPABASE_URL is required', 'SUPABASE_KEY is required']);
    expect(loadScraperConfig({}, { requireDatabase: false }).supabaseUrl).toBe('');
  });

  it('collects every invalid value into one error', () => {
    const issues = issuesOf(() =>
      loadScraperConfig({
        ...baseEnv,
        TIMEFRAMES: 'monthly',
        MAX_RETRY_ATTEMPTS: '0',
        ARBITRAGE_THRESHOLD: '-1',
      })
    );

    expect(issues).toEqual([
      'TIMEFRAMES contains unknown timeframe "monthly"',
      'MAX_RETRY_ATTEMPTS must be an integer >= 1 (got "0")',
      'ARBITRAGE_THRESHOLD must be a number >= 0 (got "-1")',
    ]);
  });

  it('rejects an overall timeout shorter than the per-request wait', () => {
    expect(
      issuesOf(() => loadScraperConfig({ ...baseEnv, PAGE_LOAD_WAIT_MS: '5000', OVERALL_TIMEOUT_MS: '1000' }))
    ).toEqual(['OVERALL_TIMEOUT_MS must not be shorter than PAGE_LOAD_WAIT_MS']);
  });

  it('needs bot token and chat id when Telegram is enabled', () => {
    expect(issuesOf(() => loadScraperConfig({ ...baseEnv, TELEGRAM_ENABLED: 'true' }))).toEqual([
      'TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required when TELEGRAM_ENABLED=true',
    ]);

    const config = loadScraperConfig({
      ...baseEnv,
      TELEGRAM_ENABLED: 'true',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_ID: 'test-chat',
    });
    expect(config.telegram).toEqual({
      enabled: true,
      botToken: 'test-token',
      chatId: 'test-chat',
      maxMessagesPerMinute: 20,
    });
  });
});

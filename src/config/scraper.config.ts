import * as dotenv from 'dotenv';
import { TIMEFRAMES, Timeframe, isTimeframe } from '../types/common';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export interface TelegramConfig {
  enabled: boolean;
  botToken: string;
  chatId: string;
  maxMessagesPerMinute: number;
}

export interface ScraperConfig {
  // source
  sourceUrl: string;
  /** Read by browser-backed sources only; the API source has no page to render */
  headless: boolean;
  pageLoadWaitMs: number;
  overallTimeoutMs: number;
  diagnosticsDir: string;

  // scheduling
  timeframes: Timeframe[];
  runIntervalMinutes: number;
  maxRetryAttempts: number;
  retryDelayMs: number;

  // processing and storage
  arbitrageThreshold: number;
  batchInsertSize: number;
  retentionDays: number;
  cleanupIntervalHours: number;
  supabaseUrl: string;
  supabaseKey: string;

  logLevel: string;
  telegram: TelegramConfig;
}

export const defaultScraperConfig: ScraperConfig = {
  sourceUrl: 'https://api.hyperliquid.xyz',
  headless: true,
  pageLoadWaitMs: 10000,
  overallTimeoutMs: 30000,
  diagnosticsDir: 'diagnostics',
  timeframes: [...TIMEFRAMES],
  runIntervalMinutes: 60,
  maxRetryAttempts: 3,
  retryDelayMs: 5000,
  arbitrageThreshold: 1.0,
  batchInsertSize: 50,
  retentionDays: 30,
  cleanupIntervalHours: 24,
  supabaseUrl: '',
  supabaseKey: '',
  logLevel: 'info',
  telegram: {
    enabled: false,
    botToken: '',
    chatId: '',
    maxMessagesPerMinute: 20,
  },
};

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

type Env = Record<string, string | undefined>;

/**
 * Builds the configuration once from environment variables. Every problem
 * is collected and reported together in a single ConfigurationError.
 */
export const loadScraperConfig = (
  env: Env = process.env,
  options: { requireDatabase?: boolean } = {}
): Readonly<ScraperConfig> => {
  const { requireDatabase = true } = options;
  const issues: string[] = [];
  const defaults = defaultScraperConfig;

  const readInt = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      issues.push(`${name} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  const readFloat = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
      issues.push(`${name} must be a number >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  const readBool = (name: string, fallback: boolean): boolean => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const normalized = raw.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    issues.push(`${name} must be a boolean (got "${raw}")`);
    return fallback;
  };

  const timeframes = readTimeframes(env.TIMEFRAMES, defaults.timeframes, issues);

  const supabaseUrl = (env.SUPABASE_URL || '').trim();
  const supabaseKey = (env.SUPABASE_KEY || env.SUPABASE_ANON_KEY || '').trim();
  if (requireDatabase) {
    if (!supabaseUrl) {
      issues.push('SUPABASE_URL is required');
    } else if (!/^https?:\/\//.test(supabaseUrl)) {
      issues.push(`SUPABASE_URL must be an http(s) URL (got "${supabaseUrl}")`);
    }
    if (!supabaseKey) {
      issues.push('SUPABASE_KEY is required');
    }
  }

  const sourceUrl = (env.SOURCE_URL || defaults.sourceUrl).trim();
  if (!/^https?:\/\//.test(sourceUrl)) {
    issues.push(`SOURCE_URL must be an http(s) URL (got "${sourceUrl}")`);
  }

  const logLevel = (env.LOG_LEVEL || defaults.logLevel).trim().toLowerCase();
  if (!LOG_LEVELS.includes(logLevel)) {
    issues.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${logLevel}")`);
  }

  const pageLoadWaitMs = readInt('PAGE_LOAD_WAIT_MS', defaults.pageLoadWaitMs, 1);
  const overallTimeoutMs = readInt('OVERALL_TIMEOUT_MS', defaults.overallTimeoutMs, 1);
  if (overallTimeoutMs < pageLoadWaitMs) {
    issues.push('OVERALL_TIMEOUT_MS must not be shorter than PAGE_LOAD_WAIT_MS');
  }

  const telegram: TelegramConfig = {
    enabled: readBool('TELEGRAM_ENABLED', defaults.telegram.enabled),
    botToken: env.TELEGRAM_BOT_TOKEN || '',
    chatId: env.TELEGRAM_CHAT_ID || '',
    maxMessagesPerMinute: readInt(
      'TELEGRAM_MAX_MESSAGES_PER_MINUTE',
      defaults.telegram.maxMessagesPerMinute,
      1
    ),
  };
  if (telegram.enabled && (!telegram.botToken || !telegram.chatId)) {
    issues.push('TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required when TELEGRAM_ENABLED=true');
  }

  const config: ScraperConfig = {
    sourceUrl,
    headless: readBool('HEADLESS_MODE', defaults.headless),
    pageLoadWaitMs,
    overallTimeoutMs,
    diagnosticsDir: env.DIAGNOSTICS_DIR || defaults.diagnosticsDir,
    timeframes,
    runIntervalMinutes: readInt('RUN_INTERVAL_MINUTES', defaults.runIntervalMinutes, 1),
    maxRetryAttempts: readInt('MAX_RETRY_ATTEMPTS', defaults.maxRetryAttempts, 1),
    retryDelayMs: readInt('RETRY_DELAY_MS', defaults.retryDelayMs, 0),
    arbitrageThreshold: readFloat('ARBITRAGE_THRESHOLD', defaults.arbitrageThreshold, 0),
    batchInsertSize: readInt('BATCH_INSERT_SIZE', defaults.batchInsertSize, 1),
    retentionDays: readInt('RETENTION_DAYS', defaults.retentionDays, 1),
    cleanupIntervalHours: readInt('CLEANUP_INTERVAL_HOURS', defaults.cleanupIntervalHours, 0),
    supabaseUrl,
    supabaseKey,
    logLevel,
    telegram,
  };

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return Object.freeze({ ...config, timeframes: [...config.timeframes] });
};

const readTimeframes = (
  raw: string | undefined,
  fallback: Timeframe[],
  issues: string[]
): Timeframe[] => {
  if (raw === undefined || raw.trim() === '') return [...fallback];

  const timeframes: Timeframe[] = [];
  for (const part of raw.split(',')) {
    const value = part.trim();
    if (!value) continue;
    if (!isTimeframe(value)) {
      issues.push(`TIMEFRAMES contains unknown timeframe "${value}"`);
      continue;
    }
    if (!timeframes.includes(value)) {
      timeframes.push(value);
    }
  }

  if (timeframes.length === 0 && issues.length === 0) {
    issues.push('TIMEFRAMES must name at least one timeframe');
  }
  return timeframes;
};

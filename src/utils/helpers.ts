import { v4 as uuidv4 } from 'uuid';
import { logger } from './logger';

export class AbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

/**
 * Resolves after `ms`, or rejects with AbortedError as soon as `signal`
 * fires.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export const generateUUID = (): string => {
  return uuidv4();
};

export const roundToDecimals = (value: number, decimals: number): number => {
  const factor = Math.pow(10, decimals);
  const rounded = Math.round(value * factor) / factor;
  // avoid -0 in stored values
  return rounded === 0 ? 0 : rounded;
};

export const formatPercentage = (value: number, decimals = 4): string => {
  const sign = value > 0 ? '+' : '';
  return `${sign}${value.toFixed(decimals)}%`;
};

export const formatCurrency = (amount: number): string => {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
  }).format(amount);
};

export const truncateToSecond = (date: Date): Date => {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
};

export const getTimestamp = (hoursAgo: number, now: Date = new Date()): Date => {
  return new Date(now.getTime() - hoursAgo * 60 * 60 * 1000);
};

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer (got ${size})`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor?: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Calls `fn` up to `maxAttempts` times. `fn` receives the 1-based attempt
 * number. Backoff sleeps are interruptible through `signal`.
 */
export const retryWithBackoff = async <T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> => {
  const { maxAttempts, baseDelayMs, backoffFactor = 2, signal, shouldRetry, onRetry } = options;
  let lastError: unknown = new Error('No attempts made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new AbortedError();
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (error instanceof AbortedError || (shouldRetry && !shouldRetry(error))) {
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.error(`Function failed after ${maxAttempts} attempts`, {
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const delay = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
      if (onRetry) {
        onRetry(error, attempt, delay);
      } else {
        logger.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`);
      }
      await sleep(delay, signal);
    }
  }

  throw lastError;
};

export class RateLimiter {
  private timestamps: number[] = [];
  private readonly limit: number;
  private readonly windowMs: number;

  constructor(limit: number, windowMs: number) {
    this.limit = limit;
    this.windowMs = windowMs;
  }

  public tryAcquire(now: number = Date.now()): boolean {
    const windowStart = now - this.windowMs;

    // Remove old timestamps
    this.timestamps = this.timestamps.filter(ts => ts > windowStart);

    if (this.timestamps.length >= this.limit) {
      return false;
    }

    this.timestamps.push(now);
    return true;
  }
}

import { ScraperConfig } from '../config/scraper.config';
import { IFundingRepository } from '../database/interfaces/IFundingRepository';
import { ISourceClient } from '../sources/interfaces/ISourceClient';
import {
  ArbitrageAlert,
  Exchange,
  FundingSnapshot,
  RunStatus,
  ScrapeRun,
  TickOutcome,
  Timeframe,
} from '../types/common';
import { EmptyBatchError, describeError, isRetryable } from '../utils/errors';
import {
  AbortedError,
  generateUUID,
  retryWithBackoff,
  roundToDecimals,
  sleep,
  truncateToSecond,
} from '../utils/helpers';
import { logArbitrage, logError, logPerformance, logRun, logger } from '../utils/logger';
import { IAlertNotifier } from './AlertNotifier';
import { ArbitrageDetector } from './ArbitrageDetector';
import { normalizeDetailed } from './FundingNormalizer';

export type SchedulerStage =
  | 'Idle'
  | 'Fetching'
  | 'Normalizing'
  | 'Detecting'
  | 'Persisting'
  | 'Failed'
  | 'Logged';

export type SchedulerOptions = Pick<
  ScraperConfig,
  | 'timeframes'
  | 'runIntervalMinutes'
  | 'maxRetryAttempts'
  | 'retryDelayMs'
  | 'retentionDays'
  | 'cleanupIntervalHours'
>;

export interface SchedulerDependencies {
  source: ISourceClient;
  repository: IFundingRepository;
  detector: ArbitrageDetector;
  notifier?: IAlertNotifier | null;
  clock?: () => Date;
}

export interface TickResult {
  outcome: TickOutcome;
  runs: ScrapeRun[];
  cancelled: boolean;
}

export interface SchedulerStatus {
  running: boolean;
  stage: SchedulerStage;
  ticks: number;
  lastOutcome: TickOutcome | null;
  lastTickStartedAt: Date | null;
  lastPurgeAt: Date | null;
}

/** Normalized batch kept across attempts so a persistence retry does not refetch */
interface PendingBatch {
  snapshots: FundingSnapshot[];
  alerts: ArbitrageAlert[];
  rejected: number;
  totalRows: number;
  missingExchanges: Exchange[];
}

export const tickOutcome = (statuses: readonly RunStatus[]): TickOutcome => {
  if (statuses.includes('failed')) return 'failure';
  if (statuses.includes('partial')) return 'degraded';
  return 'success';
};

export class FundingScheduler {
  private readonly source: ISourceClient;
  private readonly repository: IFundingRepository;
  private readonly detector: ArbitrageDetector;
  private readonly notifier: IAlertNotifier | null;
  private readonly clock: () => Date;

  private stage: SchedulerStage = 'Idle';
  private running = false;
  private ticks = 0;
  private lastOutcome: TickOutcome | null = null;
  private lastTickStartedAt: Date | null = null;
  private lastPurgeAt: Date | null = null;
  private readonly lastScrapedAt = new Map<Timeframe, number>();
  private controller = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(
    private readonly options: SchedulerOptions,
    dependencies: SchedulerDependencies
  ) {
    this.source = dependencies.source;
    this.repository = dependencies.repository;
    this.detector = dependencies.detector;
    this.notifier = dependencies.notifier ?? null;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  /** Runs ticks until `stop()`; resolves once the loop has exited */
  public start(): Promise<void> {
    if (this.loop) {
      logger.warn('FundingScheduler is already running');
      return this.loop;
    }

    this.controller = new AbortController();
    this.running = true;
    logger.info('Starting FundingScheduler', {
      timeframes: this.options.timeframes,
      runIntervalMinutes: this.options.runIntervalMinutes,
    });

    this.loop = this.runLoop(this.controller.signal).finally(() => {
      this.running = false;
      this.loop = null;
      this.stage = 'Idle';
      logger.info('FundingScheduler stopped');
    });
    return this.loop;
  }

  public async stop(): Promise<void> {
    this.controller.abort();
    if (this.loop) {
      await this.loop;
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  public getStatus(): SchedulerStatus {
    return {
      running: this.running,
      stage: this.stage,
      ticks: this.ticks,
      lastOutcome: this.lastOutcome,
      lastTickStartedAt: this.lastTickStartedAt,
      lastPurgeAt: this.lastPurgeAt,
    };
  }

  /** Exactly one tick, outside the daemon loop */
  public async runOnce(): Promise<TickResult> {
    this.controller = new AbortController();
    return this.runTick(this.controller.signal);
  }

  public async runTick(signal: AbortSignal = this.controller.signal): Promise<TickResult> {
    const tickStarted = this.clock();
    this.lastTickStartedAt = tickStarted;
    this.ticks++;

    const runs: ScrapeRun[] = [];
    for (const timeframe of this.options.timeframes) {
      if (signal.aborted) {
        break;
      }
      runs.push(await this.runTimeframe(timeframe, signal));
    }

    const cancelled = signal.aborted;
    if (!cancelled) {
      await this.afterTick();
    }

    const outcome = tickOutcome(runs.map((run) => run.status));
    this.lastOutcome = outcome;
    this.stage = 'Idle';
    logPerformance({
      metric: 'tick_duration',
      value: (this.clock().getTime() - tickStarted.getTime()) / 1000,
      unit: 'seconds',
      timestamp: this.clock(),
    });
    logger.info(`Tick ${this.ticks} finished: ${outcome}`, {
      timeframes: runs.length,
      cancelled,
    });

    return { outcome, runs, cancelled };
  }

  /**
   * One scrape of one timeframe, retried with backoff. Always records and
   * returns a ScrapeRun, whatever the outcome.
   */
  public async runTimeframe(timeframe: Timeframe, signal: AbortSignal = this.controller.signal): Promise<ScrapeRun> {
    const runId = generateUUID();
    const startedAt = this.clock();
    let attempts = 0;
    let totalRows = 0;
    let pending: PendingBatch | null = null;

    const prepare = async (): Promise<PendingBatch> => {
      this.stage = 'Fetching';
      const fetched = await this.source.fetch(timeframe, signal);
      totalRows = fetched.rows.length;

      this.stage = 'Normalizing';
      const scrapedAt = this.nextScrapedAt(timeframe, fetched.fetchedAt);
      const details = normalizeDetailed(fetched.rows, timeframe, scrapedAt);
      if (details.issues.length > 0) {
        logger.debug(`${details.issues.length} cell issue(s) in ${timeframe} batch`, {
          issues: details.issues.slice(0, 10).map((issue) => issue.message),
        });
      }
      if (details.snapshots.length === 0) {
        throw new EmptyBatchError(fetched.rows.length);
      }

      this.stage = 'Detecting';
      return {
        snapshots: details.snapshots,
        alerts: this.detector.detect(details.snapshots),
        rejected: details.rejected,
        totalRows: fetched.rows.length,
        missingExchanges: details.missingExchanges,
      };
    };

    const attempt = async (attemptNumber: number): Promise<PendingBatch> => {
      attempts = attemptNumber;
      const batch = pending ?? (await prepare());
      pending = batch;

      this.stage = 'Persisting';
      const written = await this.repository.upsertSnapshots(batch.snapshots);
      const alertsWritten = await this.repository.insertAlerts(batch.alerts);
      logger.debug(`Persisted ${timeframe} batch`, {
        snapshotsInserted: written.inserted,
        snapshotsSkipped: written.skipped,
        alertsInserted: alertsWritten.inserted,
      });
      return batch;
    };

    let run: ScrapeRun;
    try {
      const batch = await retryWithBackoff(attempt, {
        maxAttempts: this.options.maxRetryAttempts,
        baseDelayMs: this.options.retryDelayMs,
        signal,
        shouldRetry: isRetryable,
        onRetry: (error, attemptNumber, delayMs) => {
          logger.warn(`${timeframe} attempt ${attemptNumber} failed, retrying in ${delayMs}ms`, {
            error: describeError(error),
          });
        },
      });

      for (const alert of batch.alerts) {
        logArbitrage({
          coin: alert.coin,
          exchange: alert.exchange,
          timeframe: alert.timeframe,
          arbitrageValue: alert.arbitrageValue,
          threshold: alert.thresholdAtGeneration,
        });
      }

      const status: RunStatus = batch.rejected > 0 || batch.missingExchanges.length > 0 ? 'partial' : 'success';
      const notes: string[] = [];
      if (batch.rejected > 0) notes.push(`${batch.rejected} row(s) rejected`);
      if (batch.missingExchanges.length > 0) notes.push(`missing exchanges: ${batch.missingExchanges.join(', ')}`);

      run = this.buildRun(runId, timeframe, startedAt, attempts, {
        status,
        coinsScraped: batch.snapshots.length,
        totalCoinsFound: batch.totalRows,
        arbitrageOpportunities: batch.alerts.length,
        ...(notes.length > 0 ? { errorMessage: notes.join('; ') } : {}),
      });
    } catch (error) {
      this.stage = 'Failed';
      const cancelled = error instanceof AbortedError;
      if (!cancelled && error instanceof Error) {
        logError(error, { timeframe, runId, attempts });
      }
      run = this.buildRun(runId, timeframe, startedAt, attempts, {
        status: 'failed',
        coinsScraped: 0,
        totalCoinsFound: totalRows,
        arbitrageOpportunities: 0,
        errorMessage: cancelled ? 'Run cancelled' : describeError(error),
      });
    }

    try {
      await this.repository.recordRun(run);
    } catch (error) {
      logger.error('Failed to record scrape run', { runId, error: describeError(error) });
    }
    logRun(run);
    this.stage = 'Logged';
    return run;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const intervalMs = this.options.runIntervalMinutes * 60 * 1000;

    while (!signal.aborted) {
      const tickStarted = this.clock().getTime();
      await this.runTick(signal);

      // overrun: start the next tick at once
      const waitMs = tickStarted + intervalMs - this.clock().getTime();
      if (waitMs <= 0 || signal.aborted) {
        continue;
      }
      logger.info(`Next tick in ${Math.round(waitMs / 1000)}s`);
      try {
        await sleep(waitMs, signal);
      } catch (error) {
        if (error instanceof AbortedError) {
          break;
        }
        throw error;
      }
    }
  }

  private async afterTick(): Promise<void> {
    const now = this.clock();
    const { cleanupIntervalHours, retentionDays } = this.options;
    const purgeDue =
      cleanupIntervalHours > 0 &&
      (this.lastPurgeAt === null || now.getTime() - this.lastPurgeAt.getTime() >= cleanupIntervalHours * 3600 * 1000);

    if (purgeDue) {
      try {
        const cutoff = new Date(now.getTime() - retentionDays * 24 * 3600 * 1000);
        const purged = await this.repository.purgeOlderThan(cutoff);
        this.lastPurgeAt = now;
        logger.info('Retention purge finished', { cutoff: cutoff.toISOString(), ...purged });
      } catch (error) {
        logger.error('Retention purge failed', { error: describeError(error) });
      }
    }

    if (this.notifier) {
      try {
        await this.notifier.notifyPending();
      } catch (error) {
        logger.error('Alert notification failed', { error: describeError(error) });
      }
    }
  }

  /** Whole seconds, strictly increasing per timeframe */
  private nextScrapedAt(timeframe: Timeframe, fetchedAt: Date): Date {
    let scrapedAt = truncateToSecond(fetchedAt).getTime();
    const previous = this.lastScrapedAt.get(timeframe);
    if (previous !== undefined && scrapedAt <= previous) {
      scrapedAt = previous + 1000;
    }
    this.lastScrapedAt.set(timeframe, scrapedAt);
    return new Date(scrapedAt);
  }

  private buildRun(
    runId: string,
    timeframe: Timeframe,
    startedAt: Date,
    attempts: number,
    result: Pick<ScrapeRun, 'status' | 'coinsScraped' | 'totalCoinsFound' | 'arbitrageOpportunities' | 'errorMessage'>
  ): ScrapeRun {
    return {
      runId,
      timeframe,
      startedAt,
      attempts,
      durationSeconds: roundToDecimals((this.clock().getTime() - startedAt.getTime()) / 1000, 2),
      ...result,
    };
  }
}

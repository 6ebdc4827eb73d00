import {
  ArbitrageAlert,
  CoinStats,
  FundingSnapshot,
  PurgeResult,
  RunStats,
  ScrapeRun,
  Timeframe,
  TopMover,
  WriteResult,
} from '../types/common';
import { getTimestamp } from '../utils/helpers';
import { computeCoinStats, computeRunStats, computeTopMovers, latestPerCoin } from '../utils/stats';
import {
  AlertQuery,
  IFundingRepository,
  RunQuery,
  SnapshotQuery,
  StatsOptions,
  TopMoversOptions,
} from './interfaces/IFundingRepository';

const DEFAULT_STATS_THRESHOLD = 1.0;
const CURRENT_WINDOW_HOURS = 2;
const PREVIOUS_WINDOW = { fromHours: 25, toHours: 23 };

/**
 * Read-side aggregates shared by every store. Subclasses provide the
 * primitive reads and writes; stats and movers are computed from them the
 * same way everywhere.
 */
export abstract class BaseFundingRepository implements IFundingRepository {
  abstract testConnection(): Promise<boolean>;
  abstract upsertSnapshots(batch: readonly FundingSnapshot[]): Promise<WriteResult>;
  abstract insertAlerts(alerts: readonly ArbitrageAlert[]): Promise<WriteResult>;
  abstract recordRun(run: ScrapeRun): Promise<void>;
  abstract findSnapshots(query: SnapshotQuery): Promise<FundingSnapshot[]>;
  abstract listAlerts(query?: AlertQuery): Promise<ArbitrageAlert[]>;
  abstract markAlertsNotified(ids: readonly number[], at: Date): Promise<number>;
  abstract findRuns(query?: RunQuery): Promise<ScrapeRun[]>;
  abstract purgeOlderThan(cutoff: Date, batchSize?: number): Promise<PurgeResult>;

  /** Newest snapshot per coin; `since` only narrows the scan */
  public async latestByCoin(timeframe: Timeframe, since?: Date): Promise<FundingSnapshot[]> {
    return latestPerCoin(await this.findSnapshots(since ? { timeframe, from: since } : { timeframe }));
  }

  public async statsForCoin(
    coin: string,
    timeframe: Timeframe,
    windowHours: number,
    options: StatsOptions = {}
  ): Promise<CoinStats> {
    if (!(windowHours > 0)) {
      throw new RangeError(`windowHours must be positive (got ${windowHours})`);
    }
    const now = options.now ?? new Date();
    const normalizedCoin = coin.trim().toUpperCase();
    const rows = await this.findSnapshots({
      coin: normalizedCoin,
      timeframe,
      from: getTimestamp(windowHours, now),
      to: new Date(now.getTime() + 1),
    });
    return computeCoinStats(
      normalizedCoin,
      timeframe,
      windowHours,
      rows,
      options.arbitrageThreshold ?? DEFAULT_STATS_THRESHOLD
    );
  }

  public async topMovers(timeframe: Timeframe, options: TopMoversOptions = {}): Promise<TopMover[]> {
    const { limit = 10, direction = 'both' } = options;
    const now = options.now ?? new Date();

    const [current, previous] = await Promise.all([
      this.findSnapshots({
        timeframe,
        from: getTimestamp(CURRENT_WINDOW_HOURS, now),
        to: new Date(now.getTime() + 1),
      }),
      this.findSnapshots({
        timeframe,
        from: getTimestamp(PREVIOUS_WINDOW.fromHours, now),
        to: getTimestamp(PREVIOUS_WINDOW.toHours, now),
      }),
    ]);

    return computeTopMovers(current, previous, direction, limit);
  }

  public async recentRuns(limit: number): Promise<ScrapeRun[]> {
    return this.findRuns({ limit });
  }

  public async runStats(hoursBack: number, now: Date = new Date()): Promise<RunStats> {
    const runs = await this.findRuns({ since: getTimestamp(hoursBack, now) });
    return computeRunStats(runs, hoursBack);
  }

  public async close(): Promise<void> {
    return;
  }
}

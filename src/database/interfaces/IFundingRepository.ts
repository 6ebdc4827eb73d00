import {
  ArbitrageAlert,
  CoinStats,
  FundingSnapshot,
  MoverDirection,
  PurgeResult,
  RunStats,
  ScrapeRun,
  Timeframe,
  TopMover,
  WriteResult,
} from '../../types/common';

export interface SnapshotQuery {
  timeframe?: Timeframe;
  coin?: string;
  /** Inclusive lower bound on scrapedAt */
  from?: Date;
  /** Exclusive upper bound on scrapedAt */
  to?: Date;
}

export interface AlertQuery {
  timeframe?: Timeframe;
  onlyUnnotified?: boolean;
  since?: Date;
  limit?: number;
}

export interface RunQuery {
  since?: Date;
  limit?: number;
}

export interface StatsOptions {
  now?: Date;
  /** Spread, in percentage points, a snapshot needs to count as an opportunity */
  arbitrageThreshold?: number;
}

export interface TopMoversOptions {
  limit?: number;
  direction?: MoverDirection;
  now?: Date;
}

export interface IFundingRepository {
  testConnection(): Promise<boolean>;

  /** Idempotent on (coin, timeframe, scrapedAt): repeats are skipped, never duplicated */
  upsertSnapshots(batch: readonly FundingSnapshot[]): Promise<WriteResult>;
  /** Idempotent on (snapshot, exchange); alerts whose snapshot is not stored are skipped */
  insertAlerts(alerts: readonly ArbitrageAlert[]): Promise<WriteResult>;
  recordRun(run: ScrapeRun): Promise<void>;

  /** Rows ordered by scrapedAt ascending */
  findSnapshots(query: SnapshotQuery): Promise<FundingSnapshot[]>;
  /** Newest snapshot per coin for `timeframe`, sorted by coin */
  latestByCoin(timeframe: Timeframe, since?: Date): Promise<FundingSnapshot[]>;
  statsForCoin(coin: string, timeframe: Timeframe, windowHours: number, options?: StatsOptions): Promise<CoinStats>;
  topMovers(timeframe: Timeframe, options?: TopMoversOptions): Promise<TopMover[]>;

  /** Newest first */
  listAlerts(query?: AlertQuery): Promise<ArbitrageAlert[]>;
  markAlertsNotified(ids: readonly number[], at: Date): Promise<number>;

  /** Newest first */
  findRuns(query?: RunQuery): Promise<ScrapeRun[]>;
  recentRuns(limit: number): Promise<ScrapeRun[]>;
  runStats(hoursBack: number, now?: Date): Promise<RunStats>;

  /** Deletes rows strictly older than `cutoff` in id-bounded batches */
  purgeOlderThan(cutoff: Date, batchSize?: number): Promise<PurgeResult>;

  close(): Promise<void>;
}

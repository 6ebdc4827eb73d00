// Common types for the funding-rate collector

export const TIMEFRAMES = ['hourly', '8hours', 'day', 'week', 'year'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const EXCHANGES = ['binance', 'bybit'] as const;
export type Exchange = (typeof EXCHANGES)[number];

export type Sentiment = 'positive' | 'negative' | 'neutral';

export type RunStatus = 'success' | 'partial' | 'failed';

export type TickOutcome = 'success' | 'degraded' | 'failure';

export const isTimeframe = (value: unknown): value is Timeframe =>
  typeof value === 'string' && (TIMEFRAMES as readonly string[]).includes(value);

export const isExchange = (value: unknown): value is Exchange =>
  typeof value === 'string' && (EXCHANGES as readonly string[]).includes(value);

/**
 * One row of the source table, before any validation. Keys mirror the
 * table columns; values are whatever the source rendered.
 */
export type RawCell = string | number | boolean | null | undefined;
export type RawRow = Record<string, RawCell>;

export interface FetchResult {
  rows: RawRow[];
  fetchedAt: Date;
}

/**
 * One observation of one coin at one timeframe. Funding and arbitrage values
 * are percentage points: 0.0125 means 0.0125%.
 */
export interface FundingSnapshot {
  coin: string;
  timeframe: Timeframe;
  referenceOpenInterest: number | null;
  referenceFunding: number | null;
  sentiment: Sentiment;
  exchangeFunding: Partial<Record<Exchange, number | null>>;
  arbitrage: Partial<Record<Exchange, number>>;
  rankByOpenInterest: number | null;
  isFavorited: boolean;
  scrapedAt: Date;
}

export interface SnapshotKey {
  coin: string;
  timeframe: Timeframe;
  scrapedAt: Date;
}

export interface NormalizeResult {
  snapshots: FundingSnapshot[];
  rejected: number;
}

export interface ArbitrageAlert {
  id?: number;
  coin: string;
  exchange: Exchange;
  referenceFunding: number;
  exchangeFunding: number;
  arbitrageValue: number;
  timeframe: Timeframe;
  thresholdAtGeneration: number;
  sourceSnapshotRef: SnapshotKey;
  notified: boolean;
  notifiedAt?: Date | null;
  createdAt?: Date;
}

export interface ScrapeRun {
  runId: string;
  timeframe: Timeframe;
  status: RunStatus;
  coinsScraped: number;
  totalCoinsFound: number;
  arbitrageOpportunities: number;
  durationSeconds: number;
  errorMessage?: string;
  attempts: number;
  startedAt: Date;
}

export interface WriteResult {
  inserted: number;
  skipped: number;
}

export interface PurgeResult {
  snapshots: number;
  alerts: number;
  runs: number;
}

export interface CoinStats {
  coin: string;
  timeframe: Timeframe;
  windowHours: number;
  count: number;
  mean: number | null;
  max: number | null;
  min: number | null;
  stdDev: number | null;
  latest: number | null;
  latestOpenInterest: number | null;
  arbitrageCount: number;
  lastUpdated: Date | null;
}

export type MoverDirection = 'positive' | 'negative' | 'both';

export interface TopMover {
  coin: string;
  timeframe: Timeframe;
  currentFunding: number;
  previousFunding: number | null;
  fundingChange: number;
  changePercentage: number;
  currentOpenInterest: number | null;
}

export interface RunStats {
  hoursBack: number;
  totalRuns: number;
  byStatus: Record<RunStatus, number>;
  averageDurationSeconds: number | null;
  coinsScraped: number;
  arbitrageOpportunities: number;
}

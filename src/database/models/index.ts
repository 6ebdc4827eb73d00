// Database row shapes (snake_case, as stored) and their domain mappings

import {
  ArbitrageAlert,
  EXCHANGES,
  Exchange,
  FundingSnapshot,
  RunStatus,
  ScrapeRun,
  Sentiment,
  isExchange,
  isTimeframe,
} from '../../types/common';

export interface FundingRateModel {
  id?: number;
  coin: string;
  hyperliquid_oi: number | null;
  hyperliquid_funding: number | null;
  hyperliquid_sentiment: Sentiment;
  binance_funding: number | null;
  bybit_funding: number | null;
  binance_hl_arb: number | null;
  bybit_hl_arb: number | null;
  timeframe: string;
  rank_by_oi: number | null;
  is_favorited: boolean;
  scraped_at: string;
  created_at?: string;
}

export interface ScrapingLogModel {
  id?: number;
  status: RunStatus;
  coins_scraped: number;
  duration_seconds: number;
  error_message: string | null;
  timeframe: string;
  total_coins_found: number;
  arbitrage_opportunities: number;
  created_at: string;
  metadata: {
    run_id: string;
    attempts: number;
    started_at: string;
  };
}

export interface ArbitrageAlertModel {
  id?: number;
  coin: string;
  exchange: string;
  hyperliquid_funding: number;
  exchange_funding: number;
  arbitrage_value: number;
  timeframe: string;
  alert_threshold: number;
  is_notified: boolean;
  notified_at: string | null;
  created_at?: string;
  funding_rate_id: number;
}

const SENTIMENTS: readonly Sentiment[] = ['positive', 'negative', 'neutral'];
const STATUSES: readonly RunStatus[] = ['success', 'partial', 'failed'];

const isSentiment = (value: unknown): value is Sentiment => SENTIMENTS.some((sentiment) => sentiment === value);
const isRunStatus = (value: unknown): value is RunStatus => STATUSES.some((status) => status === value);

const fundingColumn = (exchange: Exchange): 'binance_funding' | 'bybit_funding' =>
  exchange === 'binance' ? 'binance_funding' : 'bybit_funding';

const arbitrageColumn = (exchange: Exchange): 'binance_hl_arb' | 'bybit_hl_arb' =>
  exchange === 'binance' ? 'binance_hl_arb' : 'bybit_hl_arb';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** PostgREST returns numeric columns as numbers, or as strings for large precision */
export const toNullableNumber = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const toDate = (value: unknown): Date | null => {
  if (typeof value !== 'string' && !(value instanceof Date)) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

export const snapshotToModel = (snapshot: FundingSnapshot): FundingRateModel => ({
  coin: snapshot.coin,
  hyperliquid_oi: snapshot.referenceOpenInterest,
  hyperliquid_funding: snapshot.referenceFunding,
  hyperliquid_sentiment: snapshot.sentiment,
  binance_funding: snapshot.exchangeFunding.binance ?? null,
  bybit_funding: snapshot.exchangeFunding.bybit ?? null,
  binance_hl_arb: snapshot.arbitrage.binance ?? null,
  bybit_hl_arb: snapshot.arbitrage.bybit ?? null,
  timeframe: snapshot.timeframe,
  rank_by_oi: snapshot.rankByOpenInterest,
  is_favorited: snapshot.isFavorited,
  scraped_at: snapshot.scrapedAt.toISOString(),
});

/** Domain snapshot from a stored row; null when the row breaks the wire contract */
export const modelToSnapshot = (row: unknown): (FundingSnapshot & { id?: number }) | null => {
  if (!isRecord(row) || typeof row.coin !== 'string' || !isTimeframe(row.timeframe)) {
    return null;
  }
  const scrapedAt = toDate(row.scraped_at);
  if (!scrapedAt) {
    return null;
  }

  const exchangeFunding: Partial<Record<Exchange, number | null>> = {};
  const arbitrage: Partial<Record<Exchange, number>> = {};
  for (const exchange of EXCHANGES) {
    exchangeFunding[exchange] = toNullableNumber(row[fundingColumn(exchange)]);
    const spread = toNullableNumber(row[arbitrageColumn(exchange)]);
    if (spread !== null) {
      arbitrage[exchange] = spread;
    }
  }

  const sentiment = isSentiment(row.hyperliquid_sentiment) ? row.hyperliquid_sentiment : 'neutral';
  const id = toNullableNumber(row.id);
  const rank = toNullableNumber(row.rank_by_oi);

  return {
    ...(id !== null ? { id } : {}),
    coin: row.coin,
    timeframe: row.timeframe,
    referenceOpenInterest: toNullableNumber(row.hyperliquid_oi),
    referenceFunding: toNullableNumber(row.hyperliquid_funding),
    sentiment,
    exchangeFunding,
    arbitrage,
    rankByOpenInterest: rank,
    isFavorited: row.is_favorited === true,
    scrapedAt,
  };
};

export const runToModel = (run: ScrapeRun): ScrapingLogModel => ({
  status: run.status,
  coins_scraped: run.coinsScraped,
  duration_seconds: run.durationSeconds,
  error_message: run.status === 'success' ? null : run.errorMessage ?? null,
  timeframe: run.timeframe,
  total_coins_found: run.totalCoinsFound,
  arbitrage_opportunities: run.arbitrageOpportunities,
  created_at: new Date(run.startedAt.getTime() + run.durationSeconds * 1000).toISOString(),
  metadata: {
    run_id: run.runId,
    attempts: run.attempts,
    started_at: run.startedAt.toISOString(),
  },
});

export const modelToRun = (row: unknown): ScrapeRun | null => {
  if (!isRecord(row) || !isRunStatus(row.status) || !isTimeframe(row.timeframe)) {
    return null;
  }
  const metadata = isRecord(row.metadata) ? row.metadata : {};
  const createdAt = toDate(row.created_at) ?? new Date(0);
  const durationSeconds = toNullableNumber(row.duration_seconds) ?? 0;
  const startedAt = toDate(metadata.started_at) ?? new Date(createdAt.getTime() - durationSeconds * 1000);

  return {
    runId: typeof metadata.run_id === 'string' ? metadata.run_id : String(row.id ?? ''),
    timeframe: row.timeframe,
    status: row.status,
    coinsScraped: toNullableNumber(row.coins_scraped) ?? 0,
    totalCoinsFound: toNullableNumber(row.total_coins_found) ?? 0,
    arbitrageOpportunities: toNullableNumber(row.arbitrage_opportunities) ?? 0,
    durationSeconds,
    ...(typeof row.error_message === 'string' ? { errorMessage: row.error_message } : {}),
    attempts: toNullableNumber(metadata.attempts) ?? 1,
    startedAt,
  };
};

export const alertToModel = (alert: ArbitrageAlert, fundingRateId: number): ArbitrageAlertModel => ({
  coin: alert.coin,
  exchange: alert.exchange,
  hyperliquid_funding: alert.referenceFunding,
  exchange_funding: alert.exchangeFunding,
  arbitrage_value: alert.arbitrageValue,
  timeframe: alert.timeframe,
  alert_threshold: alert.thresholdAtGeneration,
  is_notified: alert.notified,
  notified_at: alert.notifiedAt ? alert.notifiedAt.toISOString() : null,
  funding_rate_id: fundingRateId,
});

/**
 * Domain alert from a stored row. `scrapedAt` comes from the embedded
 * funding_rates row when the query selected it.
 */
export const modelToAlert = (row: unknown): ArbitrageAlert | null => {
  if (!isRecord(row) || typeof row.coin !== 'string' || !isExchange(row.exchange) || !isTimeframe(row.timeframe)) {
    return null;
  }
  const arbitrageValue = toNullableNumber(row.arbitrage_value);
  const referenceFunding = toNullableNumber(row.hyperliquid_funding);
  const exchangeFunding = toNullableNumber(row.exchange_funding);
  if (arbitrageValue === null || referenceFunding === null || exchangeFunding === null) {
    return null;
  }

  const createdAt = toDate(row.created_at) ?? undefined;
  const embedded = isRecord(row.funding_rates) ? row.funding_rates : {};
  const scrapedAt = toDate(embedded.scraped_at) ?? createdAt ?? new Date(0);
  const id = toNullableNumber(row.id);

  return {
    ...(id !== null ? { id } : {}),
    coin: row.coin,
    exchange: row.exchange,
    referenceFunding,
    exchangeFunding,
    arbitrageValue,
    timeframe: row.timeframe,
    thresholdAtGeneration: toNullableNumber(row.alert_threshold) ?? 0,
    sourceSnapshotRef: { coin: row.coin, timeframe: row.timeframe, scrapedAt },
    notified: row.is_notified === true,
    notifiedAt: toDate(row.notified_at),
    ...(createdAt ? { createdAt } : {}),
  };
};

export const snapshotKey = (coin: string, timeframe: string, scrapedAt: Date): string =>
  `${coin}|${timeframe}|${scrapedAt.toISOString()}`;

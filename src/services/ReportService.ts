import * as fs from 'fs';
import * as path from 'path';
import { IFundingRepository } from '../database/interfaces/IFundingRepository';
import {
  ArbitrageAlert,
  CoinStats,
  FundingSnapshot,
  MoverDirection,
  RunStats,
  ScrapeRun,
  Timeframe,
  TopMover,
} from '../types/common';
import { databaseConfig } from '../config/database.config';
import { formatCurrency, formatPercentage, getTimestamp } from '../utils/helpers';
import { logger } from '../utils/logger';
import { detect, topOpportunityByCoin } from './ArbitrageDetector';

export interface ExportDocument {
  exportedAt: string;
  timeframe: Timeframe;
  arbitrageThreshold: number;
  snapshots: Array<{
    coin: string;
    rank: number | null;
    openInterest: number | null;
    funding: number | null;
    sentiment: string;
    exchangeFunding: Record<string, number | null>;
    arbitrage: Record<string, number>;
    scrapedAt: string;
  }>;
  opportunities: Array<{
    coin: string;
    exchange: string;
    arbitrageValue: number;
    referenceFunding: number;
    exchangeFunding: number;
  }>;
  runStats: RunStats;
}

const orDash = (value: number | null, format: (value: number) => string): string =>
  value === null ? '-' : format(value);

/** Read-only summaries over stored data, for the CLI */
export class ReportService {
  constructor(
    private readonly repository: IFundingRepository,
    private readonly arbitrageThreshold: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  public async coinStats(coin: string, timeframe: Timeframe, windowHours = 24): Promise<CoinStats> {
    return this.repository.statsForCoin(coin, timeframe, windowHours, {
      now: this.clock(),
      arbitrageThreshold: this.arbitrageThreshold,
    });
  }

  /** Stats for the `limit` largest coins by open interest in the latest batch */
  public async topCoinStats(timeframe: Timeframe, limit = 10, windowHours = 24): Promise<CoinStats[]> {
    const latest = await this.latest(timeframe);
    const coins = latest
      .sort((a, b) => (a.rankByOpenInterest ?? Infinity) - (b.rankByOpenInterest ?? Infinity))
      .slice(0, limit)
      .map((snapshot) => snapshot.coin);

    const stats: CoinStats[] = [];
    for (const coin of coins) {
      stats.push(await this.coinStats(coin, timeframe, windowHours));
    }
    return stats;
  }

  public async topMovers(timeframe: Timeframe, limit = 10, direction: MoverDirection = 'both'): Promise<TopMover[]> {
    return this.repository.topMovers(timeframe, { limit, direction, now: this.clock() });
  }

  /** Opportunities in the newest snapshot of each coin, best per coin */
  public async currentOpportunities(timeframe: Timeframe): Promise<ArbitrageAlert[]> {
    const latest = await this.latest(timeframe);
    return topOpportunityByCoin(detect(latest, this.arbitrageThreshold));
  }

  public async recentRuns(limit = 20): Promise<ScrapeRun[]> {
    return this.repository.recentRuns(limit);
  }

  public async runStats(hoursBack = 24): Promise<RunStats> {
    return this.repository.runStats(hoursBack, this.clock());
  }

  public async exportJson(filepath: string, timeframe: Timeframe): Promise<ExportDocument> {
    const latest = await this.latest(timeframe);
    const opportunities = topOpportunityByCoin(detect(latest, this.arbitrageThreshold));

    const document: ExportDocument = {
      exportedAt: this.clock().toISOString(),
      timeframe,
      arbitrageThreshold: this.arbitrageThreshold,
      snapshots: latest.map((snapshot) => ({
        coin: snapshot.coin,
        rank: snapshot.rankByOpenInterest,
        openInterest: snapshot.referenceOpenInterest,
        funding: snapshot.referenceFunding,
        sentiment: snapshot.sentiment,
        exchangeFunding: { ...snapshot.exchangeFunding },
        arbitrage: { ...snapshot.arbitrage },
        scrapedAt: snapshot.scrapedAt.toISOString(),
      })),
      opportunities: opportunities.map((alert) => ({
        coin: alert.coin,
        exchange: alert.exchange,
        arbitrageValue: alert.arbitrageValue,
        referenceFunding: alert.referenceFunding,
        exchangeFunding: alert.exchangeFunding,
      })),
      runStats: await this.runStats(24),
    };

    await fs.promises.mkdir(path.dirname(path.resolve(filepath)), { recursive: true });
    await fs.promises.writeFile(filepath, JSON.stringify(document, null, 2), 'utf-8');
    logger.info(`Exported ${document.snapshots.length} snapshots to ${filepath}`);
    return document;
  }

  private latest(timeframe: Timeframe): Promise<FundingSnapshot[]> {
    return this.repository.latestByCoin(timeframe, getTimestamp(databaseConfig.latestLookbackHours, this.clock()));
  }
}

export const formatCoinStats = (stats: CoinStats): string => {
  const pct = (value: number): string => formatPercentage(value);
  return [
    `${stats.coin} (${stats.timeframe}, last ${stats.windowHours}h, ${stats.count} samples)`,
    `  latest ${orDash(stats.latest, pct)}  mean ${orDash(stats.mean, pct)}  stddev ${orDash(stats.stdDev, (v) => v.toFixed(4))}`,
    `  min ${orDash(stats.min, pct)}  max ${orDash(stats.max, pct)}  OI ${orDash(stats.latestOpenInterest, formatCurrency)}`,
    `  opportunities ${stats.arbitrageCount}`,
  ].join('\n');
};

export const formatMover = (mover: TopMover, index: number): string =>
  `${index + 1}. ${mover.coin}: ${formatPercentage(mover.currentFunding)} ` +
  `(was ${orDash(mover.previousFunding, (v) => formatPercentage(v))}, change ${formatPercentage(mover.fundingChange)})`;

export const formatOpportunity = (alert: ArbitrageAlert, index: number): string =>
  `${index + 1}. ${alert.coin} vs ${alert.exchange}: ${formatPercentage(alert.arbitrageValue)} ` +
  `(hyperliquid ${formatPercentage(alert.referenceFunding)}, ${alert.exchange} ${formatPercentage(alert.exchangeFunding)})`;

export const formatRun = (run: ScrapeRun): string =>
  `${run.startedAt.toISOString()} ${run.timeframe.padEnd(7)} ${run.status.padEnd(7)} ` +
  `${run.coinsScraped}/${run.totalCoinsFound} coins, ${run.arbitrageOpportunities} alerts, ` +
  `${run.durationSeconds}s${run.errorMessage ? ` (${run.errorMessage})` : ''}`;

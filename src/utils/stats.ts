import {
  CoinStats,
  FundingSnapshot,
  MoverDirection,
  RunStats,
  ScrapeRun,
  Timeframe,
  TopMover,
} from '../types/common';
import { roundToDecimals } from './helpers';

export const mean = (values: readonly number[]): number | null => {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

/** Sample standard deviation (n - 1), null below two values */
export const sampleStdDev = (values: readonly number[]): number | null => {
  if (values.length < 2) return null;
  const avg = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + Math.pow(value - avg, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
};

export const byScrapedAtAsc = (a: FundingSnapshot, b: FundingSnapshot): number =>
  a.scrapedAt.getTime() - b.scrapedAt.getTime();

/** Snapshot with the greatest scrapedAt per coin, sorted by coin */
export const latestPerCoin = (snapshots: readonly FundingSnapshot[]): FundingSnapshot[] => {
  const latest = new Map<string, FundingSnapshot>();
  for (const snapshot of snapshots) {
    const current = latest.get(snapshot.coin);
    if (!current || snapshot.scrapedAt.getTime() > current.scrapedAt.getTime()) {
      latest.set(snapshot.coin, snapshot);
    }
  }
  return [...latest.values()].sort((a, b) => (a.coin < b.coin ? -1 : a.coin > b.coin ? 1 : 0));
};

export const computeCoinStats = (
  coin: string,
  timeframe: Timeframe,
  windowHours: number,
  snapshots: readonly FundingSnapshot[],
  arbitrageThreshold: number
): CoinStats => {
  const rows = snapshots
    .filter((snapshot) => snapshot.coin === coin && snapshot.timeframe === timeframe)
    .sort(byScrapedAtAsc);

  const fundings = rows
    .map((snapshot) => snapshot.referenceFunding)
    .filter((value): value is number => value !== null);
  const newest = rows.length > 0 ? rows[rows.length - 1] : null;
  const avg = mean(fundings);
  const stdDev = sampleStdDev(fundings);

  return {
    coin,
    timeframe,
    windowHours,
    count: rows.length,
    mean: avg === null ? null : roundToDecimals(avg, 6),
    max: fundings.length > 0 ? Math.max(...fundings) : null,
    min: fundings.length > 0 ? Math.min(...fundings) : null,
    stdDev: stdDev === null ? null : roundToDecimals(stdDev, 6),
    latest: newest ? newest.referenceFunding : null,
    latestOpenInterest: newest ? newest.referenceOpenInterest : null,
    arbitrageCount: rows.filter((snapshot) =>
      Object.values(snapshot.arbitrage).some((value) => Math.abs(value) >= arbitrageThreshold)
    ).length,
    lastUpdated: newest ? newest.scrapedAt : null,
  };
};

export const computeTopMovers = (
  current: readonly FundingSnapshot[],
  previous: readonly FundingSnapshot[],
  direction: MoverDirection,
  limit: number
): TopMover[] => {
  const previousByCoin = new Map(latestPerCoin(previous).map((snapshot) => [snapshot.coin, snapshot]));

  const movers: TopMover[] = [];
  for (const snapshot of latestPerCoin(current)) {
    if (snapshot.referenceFunding === null) continue;

    const previousFunding = previousByCoin.get(snapshot.coin)?.referenceFunding ?? null;
    const baseline = previousFunding ?? 0;
    const fundingChange = roundToDecimals(snapshot.referenceFunding - baseline, 6);

    if (direction === 'positive' && !(snapshot.referenceFunding > baseline)) continue;
    if (direction === 'negative' && !(snapshot.referenceFunding < baseline)) continue;

    movers.push({
      coin: snapshot.coin,
      timeframe: snapshot.timeframe,
      currentFunding: snapshot.referenceFunding,
      previousFunding,
      fundingChange,
      changePercentage:
        previousFunding !== null && previousFunding !== 0
          ? roundToDecimals((fundingChange / Math.abs(previousFunding)) * 100, 4)
          : 0,
      currentOpenInterest: snapshot.referenceOpenInterest,
    });
  }

  return movers
    .sort((a, b) => Math.abs(b.fundingChange) - Math.abs(a.fundingChange) || (a.coin < b.coin ? -1 : 1))
    .slice(0, limit);
};

export const computeRunStats = (runs: readonly ScrapeRun[], hoursBack: number): RunStats => {
  const byStatus = { success: 0, partial: 0, failed: 0 };
  let coinsScraped = 0;
  let arbitrageOpportunities = 0;

  for (const run of runs) {
    byStatus[run.status]++;
    coinsScraped += run.coinsScraped;
    arbitrageOpportunities += run.arbitrageOpportunities;
  }

  const avgDuration = mean(runs.map((run) => run.durationSeconds));

  return {
    hoursBack,
    totalRuns: runs.length,
    byStatus,
    averageDurationSeconds: avgDuration === null ? null : roundToDecimals(avgDuration, 2),
    coinsScraped,
    arbitrageOpportunities,
  };
};

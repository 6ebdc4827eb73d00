import { EXCHANGES, ArbitrageAlert, FundingSnapshot } from '../types/common';
import { computeSpread } from './FundingNormalizer';

/**
 * Alerts for every snapshot/exchange pair whose spread against the
 * reference venue reaches `threshold` percentage points. Pure: same input,
 * same alerts, in snapshot then exchange order.
 */
export const detect = (snapshots: readonly FundingSnapshot[], threshold: number): ArbitrageAlert[] => {
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new RangeError(`Arbitrage threshold must be a non-negative number (got ${threshold})`);
  }

  const alerts: ArbitrageAlert[] = [];

  for (const snapshot of snapshots) {
    const referenceFunding = snapshot.referenceFunding;
    if (referenceFunding === null) {
      continue;
    }

    for (const exchange of EXCHANGES) {
      const exchangeFunding = snapshot.exchangeFunding[exchange];
      const arbitrageValue = computeSpread(referenceFunding, exchangeFunding);
      if (arbitrageValue === null || exchangeFunding === null || exchangeFunding === undefined) {
        continue;
      }
      if (Math.abs(arbitrageValue) < threshold) {
        continue;
      }

      alerts.push({
        coin: snapshot.coin,
        exchange,
        referenceFunding,
        exchangeFunding,
        arbitrageValue,
        timeframe: snapshot.timeframe,
        thresholdAtGeneration: threshold,
        sourceSnapshotRef: {
          coin: snapshot.coin,
          timeframe: snapshot.timeframe,
          scrapedAt: snapshot.scrapedAt,
        },
        notified: false,
      });
    }
  }

  return alerts;
};

export const compareOpportunities = (a: ArbitrageAlert, b: ArbitrageAlert): number => {
  const bySize = Math.abs(b.arbitrageValue) - Math.abs(a.arbitrageValue);
  if (bySize !== 0) return bySize;
  if (a.exchange !== b.exchange) return a.exchange < b.exchange ? -1 : 1;
  if (a.coin !== b.coin) return a.coin < b.coin ? -1 : 1;
  return 0;
};

/** Largest absolute spread first; ties by exchange name, then coin */
export const rankOpportunities = (alerts: readonly ArbitrageAlert[]): ArbitrageAlert[] => {
  return [...alerts].sort(compareOpportunities);
};

/** Best-ranked alert per coin, in rank order */
export const topOpportunityByCoin = (alerts: readonly ArbitrageAlert[]): ArbitrageAlert[] => {
  const best = new Map<string, ArbitrageAlert>();
  for (const alert of rankOpportunities(alerts)) {
    if (!best.has(alert.coin)) {
      best.set(alert.coin, alert);
    }
  }
  return [...best.values()];
};

export class ArbitrageDetector {
  constructor(private readonly threshold: number) {
    if (!Number.isFinite(threshold) || threshold < 0) {
      throw new RangeError(`Arbitrage threshold must be a non-negative number (got ${threshold})`);
    }
  }

  public getThreshold(): number {
    return this.threshold;
  }

  public detect(snapshots: readonly FundingSnapshot[]): ArbitrageAlert[] {
    return detect(snapshots, this.threshold);
  }
}

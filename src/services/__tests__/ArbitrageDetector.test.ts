import { describe, expect, it } from 'vitest';
import {
  ArbitrageDetector,
  detect,
  rankOpportunities,
  topOpportunityByCoin,
} from '../ArbitrageDetector';
import { makeAlert, makeSnapshot } from '../../__tests__/factories';

describe('ArbitrageDetector', () => {
  it('emits one alert when the spread reaches the threshold', () => {
    const snapshot = makeSnapshot({ referenceFunding: 2.0, exchangeFunding: { binance: 0.5 } });

    const alerts = detect([snapshot], 1.0);

    expect(alerts).toEqual([
      {
        coin: 'BTC',
        exchange: 'binance',
        referenceFunding: 2.0,
        exchangeFunding: 0.5,
        arbitrageValue: 1.5,
        timeframe: 'hourly',
        thresholdAtGeneration: 1.0,
        sourceSnapshotRef: { coin: 'BTC', timeframe: 'hourly', scrapedAt: snapshot.scrapedAt },
        notified: false,
      },
    ]);
  });

  it('is deterministic for the same input', () => {
    const snapshots = [
      makeSnapshot({ referenceFunding: 2.0, exchangeFunding: { binance: 0.5, bybit: -1.0 } }),
      makeSnapshot({ coin: 'ETH', referenceFunding: -1.5, exchangeFunding: { binance: 0.1 } }),
    ];
    expect(detect(snapshots, 1.0)).toEqual(detect(snapshots, 1.0));
  });

  it('includes spreads equal to the threshold and negative spreads', () => {
    const alerts = detect(
      [
        makeSnapshot({ coin: 'AAA', referenceFunding: 1.5, exchangeFunding: { binance: 0.5 } }),
        makeSnapshot({ coin: 'BBB', referenceFunding: -1.0, exchangeFunding: { bybit: 0.2 } }),
        makeSnapshot({ coin: 'CCC', referenceFunding: 0.5, exchangeFunding: { binance: 0.1 } }),
      ],
      1.0
    );

    expect(alerts.map((alert) => [alert.coin, alert.exchange, alert.arbitrageValue])).toEqual([
      ['AAA', 'binance', 1],
      ['BBB', 'bybit', -1.2],
    ]);
  });

  it('skips missing funding on either side', () => {
    const alerts = detect(
      [
        makeSnapshot({ referenceFunding: null, exchangeFunding: { binance: 5 } }),
        makeSnapshot({ coin: 'ETH', referenceFunding: 5, exchangeFunding: { binance: null } }),
      ],
      1.0
    );
    expect(alerts).toEqual([]);
  });

  it('rejects a negative threshold', () => {
    expect(() => detect([], -1)).toThrow(RangeError);
    expect(() => new ArbitrageDetector(Number.NaN)).toThrow(RangeError);
  });

  it('ranks by absolute spread, then exchange, then coin', () => {
    const ranked = rankOpportunities([
      makeAlert({ coin: 'ETH', exchange: 'bybit', arbitrageValue: 1.5 }),
      makeAlert({ coin: 'SOL', exchange: 'binance', arbitrageValue: -3 }),
      makeAlert({ coin: 'BTC', exchange: 'bybit', arbitrageValue: 1.5 }),
      makeAlert({ coin: 'BTC', exchange: 'binance', arbitrageValue: 1.5 }),
    ]);

    expect(ranked.map((alert) => `${alert.coin}/${alert.exchange}`)).toEqual([
      'SOL/binance',
      'BTC/binance',
      'BTC/bybit',
      'ETH/bybit',
    ]);
  });

  it('keeps the best opportunity per coin', () => {
    const best = topOpportunityByCoin([
      makeAlert({ coin: 'BTC', exchange: 'binance', arbitrageValue: 1.1 }),
      makeAlert({ coin: 'BTC', exchange: 'bybit', arbitrageValue: 2.2 }),
      makeAlert({ coin: 'ETH', exchange: 'binance', arbitrageValue: 1.5 }),
    ]);

    expect(best.map((alert) => `${alert.coin}/${alert.exchange}`)).toEqual(['BTC/bybit', 'ETH/binance']);
  });

  it('uses its configured threshold', () => {
    const detector = new ArbitrageDetector(2);
    const snapshot = makeSnapshot({ referenceFunding: 2.0, exchangeFunding: { binance: 0.5 } });
    expect(detector.getThreshold()).toBe(2);
    expect(detector.detect([snapshot])).toEqual([]);
  });
});

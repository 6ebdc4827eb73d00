import { describe, expect, it } from 'vitest';
import {
  computeSpread,
  deriveSentiment,
  normalize,
  normalizeDetailed,
  parseCoin,
  parseMoney,
  parsePercentage,
} from '../FundingNormalizer';
import { RawRow } from '../../types/common';

const scrapedAt = new Date('2024-05-01T10:00:00Z');

describe('FundingNormalizer', () => {
  describe('parsePercentage', () => {
    it('reads bare numbers as fractions', () => {
      expect(parsePercentage(0.015)).toBe(1.5);
      expect(parsePercentage('0.003')).toBe(0.3);
    });

    it('reads percent strings as percentage points', () => {
      expect(parsePercentage('0.0125%')).toBe(0.0125);
      expect(parsePercentage('1,234.5%')).toBe(1234.5);
      expect(parsePercentage(' -0.25 % ')).toBe(-0.25);
    });

    it('treats parentheses as negative', () => {
      expect(parsePercentage('(0.5%)')).toBe(-0.5);
    });

    it('returns null for empty and unreadable cells', () => {
      for (const cell of ['', '-', '--', 'N/A', 'abc', '1.2.3%', null, undefined, true]) {
        expect(parsePercentage(cell)).toBeNull();
      }
      expect(parsePercentage(Number.NaN)).toBeNull();
    });

    it('returns null outside the storable range', () => {
      expect(parsePercentage(200)).toBeNull();
      expect(parsePercentage('10000%')).toBeNull();
      expect(parsePercentage('9999.5%')).toBe(9999.5);
    });

    it('rounds to six decimals', () => {
      expect(parsePercentage('0.12345678%')).toBe(0.123457);
    });
  });

  describe('parseMoney', () => {
    it('reads currency strings with separators and suffixes', () => {
      expect(parseMoney('$1,234.5')).toBe(1234.5);
      expect(parseMoney('$1.5M')).toBe(1_500_000);
      expect(parseMoney('2.5k')).toBe(2500);
      expect(parseMoney(1234.567)).toBe(1234.57);
    });

    it('rejects negative and oversized amounts', () => {
      expect(parseMoney(-5)).toBeNull();
      expect(parseMoney(1e18)).toBeNull();
      expect(parseMoney('lots')).toBeNull();
    });
  });

  describe('parseCoin', () => {
    it('trims and upper-cases symbols', () => {
      expect(parseCoin(' btc ')).toBe('BTC');
      expect(parseCoin('kPEPE')).toBe('KPEPE');
      expect(parseCoin('BTC-USD')).toBe('BTC-USD');
    });

    it('rejects malformed symbols', () => {
      expect(parseCoin('A'.repeat(21))).toBeNull();
      expect(parseCoin('BTC/USD')).toBeNull();
      expect(parseCoin('')).toBeNull();
      expect(parseCoin(5)).toBeNull();
    });
  });

  it('derives sentiment from the reference funding sign', () => {
    expect(deriveSentiment(0.5)).toBe('positive');
    expect(deriveSentiment(-0.5)).toBe('negative');
    expect(deriveSentiment(0)).toBe('neutral');
    expect(deriveSentiment(null)).toBe('neutral');
  });

  it('computes spreads only when both sides are known', () => {
    expect(computeSpread(1.5, 0.3)).toBe(1.2);
    expect(computeSpread(null, 0.3)).toBeNull();
    expect(computeSpread(1.5, null)).toBeNull();
    expect(computeSpread(1.5, undefined)).toBeNull();
  });

  it('drops spreads too large for the store column', () => {
    expect(computeSpread(9000, -9000)).toBeNull();
    expect(computeSpread(5000, -4999.5)).toBe(9999.5);

    const { snapshots } = normalize(
      [{ coin: 'BTC', hyperliquid_funding: '9000%', binance_funding: '-9000%' }],
      'year',
      scrapedAt
    );
    expect(snapshots[0].referenceFunding).toBe(9000);
    expect(snapshots[0].exchangeFunding).toEqual({ binance: -9000 });
    expect(snapshots[0].arbitrage).toEqual({});
  });

  describe('normalize', () => {
    const rows: RawRow[] = [
      { coin: 'BTC', hyperliquid_oi: 1_000_000, hyperliquid_funding: 0.015, binance_funding: 0.003, bybit_funding: null, is_favorited: 'true' },
      { coin: '', hyperliquid_funding: 0.01, binance_funding: 0.01, bybit_funding: 0.01 },
      { coin: 'eth', hyperliquid_oi: '$500K', hyperliquid_funding: '0.01%', binance_funding: '0.02%', bybit_funding: '0.01%' },
      { coin: 'BTC', hyperliquid_oi: 5, hyperliquid_funding: 0.5, binance_funding: 0.5, bybit_funding: 0.5 },
    ];

    it('builds snapshots and counts rejected rows', () => {
      const result = normalize(rows, 'hourly', scrapedAt);

      expect(result.rejected).toBe(2);
      expect(result.snapshots).toEqual([
        {
          coin: 'BTC',
          timeframe: 'hourly',
          referenceOpenInterest: 1_000_000,
          referenceFunding: 1.5,
          sentiment: 'positive',
          exchangeFunding: { binance: 0.3, bybit: null },
          arbitrage: { binance: 1.2 },
          rankByOpenInterest: 1,
          isFavorited: true,
          scrapedAt,
        },
        {
          coin: 'ETH',
          timeframe: 'hourly',
          referenceOpenInterest: 500_000,
          referenceFunding: 0.01,
          sentiment: 'positive',
          exchangeFunding: { binance: 0.02, bybit: 0.01 },
          arbitrage: { binance: -0.01, bybit: 0 },
          rankByOpenInterest: 3,
          isFavorited: false,
          scrapedAt,
        },
      ]);
    });

    it('keeps the first occurrence of a repeated coin', () => {
      const { snapshots } = normalize(rows, 'hourly', scrapedAt);
      expect(snapshots.filter((snapshot) => snapshot.coin === 'BTC')).toHaveLength(1);
      expect(snapshots[0].referenceFunding).toBe(1.5);
    });

    it('reports exchanges absent from every row', () => {
      const details = normalizeDetailed(
        [
          { coin: 'SOL', hyperliquid_funding: 0.001, binance_funding: 0.001 },
          { coin: 'DOGE', hyperliquid_funding: 0.002, binance_funding: null },
        ],
        'day',
        scrapedAt
      );

      expect(details.missingExchanges).toEqual(['bybit']);
      expect(details.snapshots[0].exchangeFunding).toEqual({ binance: 0.1 });
      expect(details.snapshots[1].exchangeFunding).toEqual({ binance: null });
    });

    it('records unreadable cells as issues and stores null', () => {
      const details = normalizeDetailed(
        [{ coin: 'ARB', hyperliquid_funding: 'soon', binance_funding: 0.001, bybit_funding: 0.001, hyperliquid_oi: 'many' }],
        'hourly',
        scrapedAt
      );

      expect(details.rejected).toBe(0);
      expect(details.snapshots[0].referenceFunding).toBeNull();
      expect(details.snapshots[0].referenceOpenInterest).toBeNull();
      expect(details.snapshots[0].arbitrage).toEqual({});
      expect(details.snapshots[0].sentiment).toBe('neutral');
      expect(details.issues.map((issue) => issue.field)).toEqual(['hyperliquid_funding', 'hyperliquid_oi']);
    });

    it('handles an empty batch', () => {
      expect(normalizeDetailed([], 'hourly', scrapedAt)).toEqual({
        snapshots: [],
        rejected: 0,
        issues: [],
        missingExchanges: [],
      });
    });
  });
});

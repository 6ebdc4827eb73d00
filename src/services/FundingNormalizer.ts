import {
  COIN_MAX_LENGTH,
  COIN_PATTERN,
  FUNDING_ABS_LIMIT,
  FUNDING_DECIMALS,
  OPEN_INTEREST_DECIMALS,
  OPEN_INTEREST_LIMIT,
  sourceColumns,
} from '../config/table.config';
import {
  EXCHANGES,
  Exchange,
  FundingSnapshot,
  NormalizeResult,
  RawCell,
  RawRow,
  Sentiment,
  Timeframe,
} from '../types/common';
import { ValidationError } from '../utils/errors';
import { roundToDecimals } from '../utils/helpers';

const MONEY_MULTIPLIERS: Record<string, number> = {
  K: 1e3,
  M: 1e6,
  B: 1e9,
  T: 1e12,
};

const EMPTY_MARKERS = new Set(['', '-', '--', '—', 'n/a', 'na', 'null']);

const isEmptyCell = (cell: RawCell): cell is null | undefined | '' =>
  cell === null || cell === undefined || (typeof cell === 'string' && EMPTY_MARKERS.has(cell.trim().toLowerCase()));

/**
 * Percentage points from a table cell. Bare numbers are fractions
 * (0.015 is 1.5%), strings ending in `%` are already percentages and
 * `(0.5%)` is negative.
 */
export const parsePercentage = (cell: RawCell): number | null => {
  if (isEmptyCell(cell) || typeof cell === 'boolean') {
    return null;
  }

  let value: number;
  if (typeof cell === 'number') {
    value = cell * 100;
  } else {
    let text = cell.trim().replace(/,/g, '').replace(/−/g, '-');
    let negative = false;
    if (text.startsWith('(') && text.endsWith(')')) {
      negative = true;
      text = text.slice(1, -1).trim();
    }

    const isPercent = text.endsWith('%');
    if (isPercent) {
      text = text.slice(0, -1).trim();
    }
    if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(text)) {
      return null;
    }

    const parsed = Number(text);
    value = isPercent ? parsed : parsed * 100;
    if (negative) {
      value = -Math.abs(value);
    }
  }

  if (!Number.isFinite(value) || Math.abs(value) >= FUNDING_ABS_LIMIT) {
    return null;
  }
  return roundToDecimals(value, FUNDING_DECIMALS);
};

/** USD amount from a cell such as `$1,234.5`, `$1.5M` or a plain number */
export const parseMoney = (cell: RawCell): number | null => {
  if (isEmptyCell(cell) || typeof cell === 'boolean') {
    return null;
  }

  let value: number;
  if (typeof cell === 'number') {
    value = cell;
  } else {
    const text = cell.trim().replace(/[$,\s]/g, '').toUpperCase();
    const match = /^([+-]?(?:\d+\.?\d*|\.\d+))([KMBT])?$/.exec(text);
    if (!match) {
      return null;
    }
    const multiplier = match[2] ? MONEY_MULTIPLIERS[match[2]] : 1;
    value = Number(match[1]) * multiplier;
  }

  if (!Number.isFinite(value) || value < 0 || value >= OPEN_INTEREST_LIMIT) {
    return null;
  }
  return roundToDecimals(value, OPEN_INTEREST_DECIMALS);
};

export const parseCoin = (cell: RawCell): string | null => {
  if (typeof cell !== 'string') {
    return null;
  }
  const coin = cell.trim().toUpperCase();
  if (!coin || coin.length > COIN_MAX_LENGTH || !COIN_PATTERN.test(coin)) {
    return null;
  }
  return coin;
};

const parseFlag = (cell: RawCell): boolean => {
  if (typeof cell === 'boolean') return cell;
  if (typeof cell === 'number') return cell === 1;
  if (typeof cell === 'string') return ['true', '1', 'yes'].includes(cell.trim().toLowerCase());
  return false;
};

export const deriveSentiment = (referenceFunding: number | null): Sentiment => {
  if (referenceFunding === null || referenceFunding === 0) return 'neutral';
  return referenceFunding > 0 ? 'positive' : 'negative';
};

/**
 * Spread of the reference venue over `exchangeFunding`. Null if either side
 * is missing or the spread does not fit the store column.
 */
export const computeSpread = (
  referenceFunding: number | null,
  exchangeFunding: number | null | undefined
): number | null => {
  if (referenceFunding === null || exchangeFunding === null || exchangeFunding === undefined) {
    return null;
  }
  const spread = roundToDecimals(referenceFunding - exchangeFunding, FUNDING_DECIMALS);
  return Math.abs(spread) >= FUNDING_ABS_LIMIT ? null : spread;
};

export interface NormalizeDetails extends NormalizeResult {
  issues: ValidationError[];
  /** Exchanges whose column is absent from every row of the batch */
  missingExchanges: Exchange[];
}

/**
 * Turns raw table rows into snapshots. Never throws: a row is dropped only
 * when its coin cannot be read (or repeats an earlier coin); any other bad
 * cell becomes null.
 */
export const normalizeDetailed = (
  rawRows: readonly RawRow[],
  timeframe: Timeframe,
  scrapedAt: Date
): NormalizeDetails => {
  const snapshots: FundingSnapshot[] = [];
  const issues: ValidationError[] = [];
  const seenCoins = new Set<string>();
  const presentColumns = new Set<string>();
  let rejected = 0;

  rawRows.forEach((row, index) => {
    for (const key of Object.keys(row)) {
      presentColumns.add(key);
    }

    const coin = parseCoin(row[sourceColumns.coin]);
    if (!coin) {
      rejected++;
      issues.push(new ValidationError(sourceColumns.coin, row[sourceColumns.coin], `row ${index + 1} has no readable coin`));
      return;
    }
    if (seenCoins.has(coin)) {
      rejected++;
      issues.push(new ValidationError(sourceColumns.coin, coin, `row ${index + 1} repeats ${coin}`));
      return;
    }
    seenCoins.add(coin);

    const referenceFunding = readPercentage(row, sourceColumns.referenceFunding, coin, issues);
    const exchangeFunding: Partial<Record<Exchange, number | null>> = {};
    const arbitrage: Partial<Record<Exchange, number>> = {};

    for (const exchange of EXCHANGES) {
      const column = sourceColumns.exchangeFunding(exchange);
      if (!(column in row)) {
        continue;
      }
      const value = readPercentage(row, column, coin, issues);
      exchangeFunding[exchange] = value;

      const spread = computeSpread(referenceFunding, value);
      if (spread !== null) {
        arbitrage[exchange] = spread;
      }
    }

    const oiCell = row[sourceColumns.openInterest];
    const referenceOpenInterest = parseMoney(oiCell);
    if (referenceOpenInterest === null && !isEmptyCell(oiCell)) {
      issues.push(new ValidationError(sourceColumns.openInterest, oiCell, `${coin} open interest unreadable`));
    }

    snapshots.push({
      coin,
      timeframe,
      referenceOpenInterest,
      referenceFunding,
      sentiment: deriveSentiment(referenceFunding),
      exchangeFunding,
      arbitrage,
      rankByOpenInterest: index + 1,
      isFavorited: parseFlag(row[sourceColumns.favorited]),
      scrapedAt,
    });
  });

  const missingExchanges =
    rawRows.length === 0
      ? []
      : EXCHANGES.filter((exchange) => !presentColumns.has(sourceColumns.exchangeFunding(exchange)));

  return { snapshots, rejected, issues, missingExchanges };
};

export const normalize = (
  rawRows: readonly RawRow[],
  timeframe: Timeframe,
  scrapedAt: Date
): NormalizeResult => {
  const { snapshots, rejected } = normalizeDetailed(rawRows, timeframe, scrapedAt);
  return { snapshots, rejected };
};

const readPercentage = (
  row: RawRow,
  column: string,
  coin: string,
  issues: ValidationError[]
): number | null => {
  const cell = row[column];
  const value = parsePercentage(cell);
  if (value === null && !isEmptyCell(cell)) {
    issues.push(new ValidationError(column, cell, `${coin} value unreadable`));
  }
  return value;
};

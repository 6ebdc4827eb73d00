import { Exchange, Timeframe } from '../../types/common';

export const hyperliquidEndpoints = {
  info: '/info',
};

export const hyperliquidInfoTypes = {
  metaAndAssetCtxs: 'metaAndAssetCtxs',
  predictedFundings: 'predictedFundings',
} as const;

/** Venue labels used by predictedFundings */
export const referenceVenue = 'HlPerp';

export const venueToExchange: Record<string, Exchange> = {
  BinPerp: 'binance',
  BybitPerp: 'bybit',
};

/** Funding interval assumed when a venue entry does not state one */
export const defaultFundingIntervalHours: Record<string, number> = {
  HlPerp: 1,
  BinPerp: 8,
  BybitPerp: 8,
};

/** Hours covered by each timeframe; rates are scaled from hourly */
export const timeframeHours: Record<Timeframe, number> = {
  hourly: 1,
  '8hours': 8,
  day: 24,
  week: 24 * 7,
  year: 24 * 365,
};

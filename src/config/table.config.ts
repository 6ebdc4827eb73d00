import { Exchange } from '../types/common';

/** Column names of the source funding table, as carried by RawRow */
export const sourceColumns = {
  coin: 'coin',
  openInterest: 'hyperliquid_oi',
  referenceFunding: 'hyperliquid_funding',
  favorited: 'is_favorited',
  exchangeFunding: (exchange: Exchange): string => `${exchange}_funding`,
};

export const COIN_MAX_LENGTH = 20;
export const COIN_PATTERN = /^[A-Z0-9]{1,20}(-[A-Z0-9]{1,10})?$/;

/** Limits of the DECIMAL(10,6) and DECIMAL(20,2) store columns */
export const FUNDING_DECIMALS = 6;
export const FUNDING_ABS_LIMIT = 10_000;
export const OPEN_INTEREST_DECIMALS = 2;
export const OPEN_INTEREST_LIMIT = 1e18;

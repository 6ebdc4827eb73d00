export const tableNames = {
  fundingRates: 'funding_rates',
  scrapingLogs: 'scraping_logs',
  arbitrageAlerts: 'arbitrage_alerts',
} as const;

export const conflictTargets = {
  fundingRates: 'coin,timeframe,scraped_at',
  arbitrageAlerts: 'funding_rate_id,exchange',
} as const;

export const databaseConfig = {
  // PostgREST caps a single response at 1000 rows by default
  pageSize: 1000,
  purgeBatchSize: 500,
  latestLookbackHours: 48,
};

/** Postgres error codes the repository classifies */
export const pgErrorCodes = {
  uniqueViolation: '23505',
  foreignKeyViolation: '23503',
  checkViolation: '23514',
  notNullViolation: '23502',
  numericOverflow: '22003',
} as const;

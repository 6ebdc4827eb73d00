import { createClient, PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { BaseFundingRepository } from './BaseFundingRepository';
import { AlertQuery, RunQuery, SnapshotQuery } from './interfaces/IFundingRepository';
import {
  alertToModel,
  modelToAlert,
  modelToRun,
  modelToSnapshot,
  runToModel,
  snapshotToModel,
  toNullableNumber,
} from './models';
import { conflictTargets, databaseConfig, pgErrorCodes, tableNames } from '../config/database.config';
import { ScraperConfig } from '../config/scraper.config';
import {
  ArbitrageAlert,
  FundingSnapshot,
  PurgeResult,
  ScrapeRun,
  WriteResult,
} from '../types/common';
import { PersistenceError } from '../utils/errors';
import { chunk } from '../utils/helpers';
import { logger } from '../utils/logger';

const CONSTRAINT_CODES: readonly string[] = Object.values(pgErrorCodes);

export const createSupabaseClient = (config: Pick<ScraperConfig, 'supabaseUrl' | 'supabaseKey'>): SupabaseClient => {
  return createClient(config.supabaseUrl, config.supabaseKey, {
    auth: {
      persistSession: false,
    },
  });
};

/** Maps a PostgREST error (or a thrown fetch failure) to a PersistenceError */
export const toPersistenceError = (action: string, error: PostgrestError | unknown): PersistenceError => {
  if (error instanceof PersistenceError) {
    return error;
  }
  const code = typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : '';
  const message = typeof error === 'object' && error !== null && 'message' in error ? String(error.message) : String(error);
  const kind = CONSTRAINT_CODES.includes(code) ? 'ConstraintViolation' : 'ConnectivityFailure';
  return new PersistenceError(kind, `${action} failed${code ? ` (${code})` : ''}: ${message}`, error);
};

const extractIds = (rows: unknown): number[] => {
  if (!Array.isArray(rows)) return [];
  return rows
    .map((row: unknown) => (typeof row === 'object' && row !== null && 'id' in row ? toNullableNumber(row.id) : null))
    .filter((id): id is number => id !== null);
};

/**
 * Supabase/PostgREST store. Writes rely on the unique constraints
 * (coin, timeframe, scraped_at) and (funding_rate_id, exchange) with
 * ignore-duplicates upserts, so re-persisting a batch inserts nothing new.
 */
export class SupabaseFundingRepository extends BaseFundingRepository {
  constructor(
    private readonly client: SupabaseClient,
    private readonly batchSize: number = 50
  ) {
    super();
  }

  public async testConnection(): Promise<boolean> {
    try {
      const { error } = await this.client
        .from(tableNames.fundingRates)
        .select('id')
        .limit(1);

      if (error) {
        logger.error('Database connection test failed:', { error: error.message });
        return false;
      }

      logger.info('Database connection successful');
      return true;
    } catch (error) {
      logger.error('Database connection test error:', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  public async upsertSnapshots(batch: readonly FundingSnapshot[]): Promise<WriteResult> {
    let inserted = 0;

    for (const rows of chunk(batch.map(snapshotToModel), this.batchSize)) {
      const data = await this.run('Upsert funding rates', () =>
        this.client
          .from(tableNames.fundingRates)
          .upsert(rows, { onConflict: conflictTargets.fundingRates, ignoreDuplicates: true })
          .select('id')
      );
      inserted += extractIds(data).length;
    }

    return { inserted, skipped: batch.length - inserted };
  }

  public async insertAlerts(alerts: readonly ArbitrageAlert[]): Promise<WriteResult> {
    if (alerts.length === 0) {
      return { inserted: 0, skipped: 0 };
    }

    const snapshotIds = await this.resolveSnapshotIds(alerts);
    const rows = alerts.flatMap((alert) => {
      const id = snapshotIds.get(this.refKey(alert));
      if (id === undefined) {
        logger.warn(`No stored snapshot for ${alert.coin} ${alert.timeframe} alert, skipping`);
        return [];
      }
      return [alertToModel(alert, id)];
    });

    let inserted = 0;
    for (const part of chunk(rows, this.batchSize)) {
      const data = await this.run('Insert arbitrage alerts', () =>
        this.client
          .from(tableNames.arbitrageAlerts)
          .upsert(part, { onConflict: conflictTargets.arbitrageAlerts, ignoreDuplicates: true })
          .select('id')
      );
      inserted += extractIds(data).length;
    }

    return { inserted, skipped: alerts.length - inserted };
  }

  public async recordRun(run: ScrapeRun): Promise<void> {
    await this.run('Record scrape run', () =>
      this.client.from(tableNames.scrapingLogs).insert(runToModel(run)).select('id')
    );
  }

  public async findSnapshots(query: SnapshotQuery): Promise<FundingSnapshot[]> {
    const snapshots: FundingSnapshot[] = [];
    const { pageSize } = databaseConfig;

    for (let offset = 0; ; offset += pageSize) {
      let builder = this.client.from(tableNames.fundingRates).select('*');
      if (query.timeframe) builder = builder.eq('timeframe', query.timeframe);
      if (query.coin) builder = builder.eq('coin', query.coin);
      if (query.from) builder = builder.gte('scraped_at', query.from.toISOString());
      if (query.to) builder = builder.lt('scraped_at', query.to.toISOString());

      const page = builder
        .order('scraped_at', { ascending: true })
        .order('id', { ascending: true })
        .range(offset, offset + pageSize - 1);
      const data = await this.run('Read funding rates', () => page);
      const rows: unknown[] = Array.isArray(data) ? data : [];

      for (const row of rows) {
        const snapshot = modelToSnapshot(row);
        if (snapshot) {
          snapshots.push(snapshot);
        }
      }
      if (rows.length < pageSize) {
        break;
      }
    }

    return snapshots;
  }

  public async listAlerts(query: AlertQuery = {}): Promise<ArbitrageAlert[]> {
    let builder = this.client
      .from(tableNames.arbitrageAlerts)
      .select(`*, ${tableNames.fundingRates}(scraped_at)`);
    if (query.timeframe) builder = builder.eq('timeframe', query.timeframe);
    if (query.onlyUnnotified) builder = builder.eq('is_notified', false);
    if (query.since) builder = builder.gte('created_at', query.since.toISOString());

    let ordered = builder.order('created_at', { ascending: false }).order('id', { ascending: false });
    if (query.limit !== undefined) ordered = ordered.limit(query.limit);

    const data = await this.run('Read arbitrage alerts', () => ordered);
    return (Array.isArray(data) ? data : [])
      .map((row: unknown) => modelToAlert(row))
      .filter((alert): alert is ArbitrageAlert => alert !== null);
  }

  public async markAlertsNotified(ids: readonly number[], at: Date): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const data = await this.run('Mark alerts notified', () =>
      this.client
        .from(tableNames.arbitrageAlerts)
        .update({ is_notified: true, notified_at: at.toISOString() })
        .in('id', [...ids])
        .eq('is_notified', false)
        .select('id')
    );
    return extractIds(data).length;
  }

  public async findRuns(query: RunQuery = {}): Promise<ScrapeRun[]> {
    let builder = this.client.from(tableNames.scrapingLogs).select('*');
    if (query.since) builder = builder.gte('created_at', query.since.toISOString());

    let ordered = builder.order('created_at', { ascending: false });
    if (query.limit !== undefined) ordered = ordered.limit(query.limit);

    const data = await this.run('Read scrape runs', () => ordered);
    return (Array.isArray(data) ? data : [])
      .map((row: unknown) => modelToRun(row))
      .filter((run): run is ScrapeRun => run !== null);
  }

  public async purgeOlderThan(cutoff: Date, batchSize: number = databaseConfig.purgeBatchSize): Promise<PurgeResult> {
    if (!(batchSize > 0)) {
      throw new RangeError(`batchSize must be positive (got ${batchSize})`);
    }
    const iso = cutoff.toISOString();

    // alerts first: deleting their snapshots would cascade them away uncounted
    const alerts = await this.purgeTable(tableNames.arbitrageAlerts, 'created_at', iso, batchSize);
    const snapshots = await this.purgeTable(tableNames.fundingRates, 'scraped_at', iso, batchSize);
    const runs = await this.purgeTable(tableNames.scrapingLogs, 'created_at', iso, batchSize);

    logger.info(`Purged rows older than ${iso}`, { snapshots, alerts, runs });
    return { snapshots, alerts, runs };
  }

  private async purgeTable(table: string, column: string, cutoffIso: string, batchSize: number): Promise<number> {
    let deleted = 0;

    for (;;) {
      const selected = await this.run(`Select expired ${table}`, () =>
        this.client
          .from(table)
          .select('id')
          .lt(column, cutoffIso)
          .order('id', { ascending: true })
          .limit(batchSize)
      );
      const ids = extractIds(selected);
      if (ids.length === 0) {
        break;
      }

      const removed = extractIds(
        await this.run(`Delete expired ${table}`, () => this.client.from(table).delete().in('id', ids).select('id'))
      );
      if (removed.length === 0) {
        logger.warn(`Delete from ${table} removed no rows, stopping purge`, { selected: ids.length });
        break;
      }
      deleted += removed.length;

      if (ids.length < batchSize) {
        break;
      }
    }

    return deleted;
  }

  private async resolveSnapshotIds(alerts: readonly ArbitrageAlert[]): Promise<Map<string, number>> {
    const groups = new Map<string, { timeframe: string; scrapedAt: string; coins: Set<string> }>();
    for (const alert of alerts) {
      const ref = alert.sourceSnapshotRef;
      const scrapedAt = ref.scrapedAt.toISOString();
      const groupKey = `${ref.timeframe}|${scrapedAt}`;
      const group = groups.get(groupKey) ?? { timeframe: ref.timeframe, scrapedAt, coins: new Set<string>() };
      group.coins.add(ref.coin);
      groups.set(groupKey, group);
    }

    const ids = new Map<string, number>();
    for (const group of groups.values()) {
      const data = await this.run('Resolve snapshot ids', () =>
        this.client
          .from(tableNames.fundingRates)
          .select('id, coin')
          .eq('timeframe', group.timeframe)
          .eq('scraped_at', group.scrapedAt)
          .in('coin', [...group.coins])
      );
      const rows: unknown[] = Array.isArray(data) ? data : [];
      for (const row of rows) {
        if (typeof row !== 'object' || row === null || !('id' in row) || !('coin' in row)) continue;
        const id = toNullableNumber(row.id);
        if (id !== null && typeof row.coin === 'string') {
          ids.set(`${row.coin}|${group.timeframe}|${group.scrapedAt}`, id);
        }
      }
    }
    return ids;
  }

  private refKey(alert: ArbitrageAlert): string {
    const ref = alert.sourceSnapshotRef;
    return `${ref.coin}|${ref.timeframe}|${ref.scrapedAt.toISOString()}`;
  }

  /** Awaits a query and unwraps `{ data, error }`; every failure becomes a PersistenceError */
  private async run(
    action: string,
    query: () => PromiseLike<{ data: unknown; error: PostgrestError | null }>
  ): Promise<unknown> {
    let result: { data: unknown; error: PostgrestError | null };
    try {
      result = await query();
    } catch (error) {
      throw toPersistenceError(action, error);
    }
    if (result.error) {
      throw toPersistenceError(action, result.error);
    }
    return result.data;
  }
}

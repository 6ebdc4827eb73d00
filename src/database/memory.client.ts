import { BaseFundingRepository } from './BaseFundingRepository';
import { AlertQuery, RunQuery, SnapshotQuery } from './interfaces/IFundingRepository';
import { snapshotKey } from './models';
import { databaseConfig } from '../config/database.config';
import {
  ArbitrageAlert,
  FundingSnapshot,
  PurgeResult,
  ScrapeRun,
  WriteResult,
} from '../types/common';
import { byScrapedAtAsc } from '../utils/stats';

interface StoredSnapshot {
  id: number;
  snapshot: FundingSnapshot;
}

interface StoredAlert {
  id: number;
  fundingRateId: number;
  alert: ArbitrageAlert;
  createdAt: Date;
}

interface StoredRun {
  id: number;
  run: ScrapeRun;
  createdAt: Date;
}

const cloneSnapshot = (snapshot: FundingSnapshot): FundingSnapshot => ({
  ...snapshot,
  exchangeFunding: { ...snapshot.exchangeFunding },
  arbitrage: { ...snapshot.arbitrage },
  scrapedAt: new Date(snapshot.scrapedAt.getTime()),
});

/** Removes the lowest `batchSize` expired ids per round, as the database purge does */
const deleteInBatches = (
  expiredIds: () => number[],
  remove: (ids: Set<number>) => void,
  batchSize: number
): number => {
  let deleted = 0;
  for (;;) {
    const ids = expiredIds()
      .sort((a, b) => a - b)
      .slice(0, batchSize);
    if (ids.length === 0) {
      break;
    }
    remove(new Set(ids));
    deleted += ids.length;
    if (ids.length < batchSize) {
      break;
    }
  }
  return deleted;
};

/**
 * Process-local store with the same uniqueness and cascade rules as the
 * database. Backs `--dry-run` and the tests.
 */
export class InMemoryFundingRepository extends BaseFundingRepository {
  private snapshots: StoredSnapshot[] = [];
  private alerts: StoredAlert[] = [];
  private runs: StoredRun[] = [];
  private readonly snapshotIds = new Map<string, number>();
  private nextId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {
    super();
  }

  public async testConnection(): Promise<boolean> {
    return true;
  }

  public async upsertSnapshots(batch: readonly FundingSnapshot[]): Promise<WriteResult> {
    let inserted = 0;
    for (const snapshot of batch) {
      const key = snapshotKey(snapshot.coin, snapshot.timeframe, snapshot.scrapedAt);
      if (this.snapshotIds.has(key)) {
        continue;
      }
      const id = this.nextId++;
      this.snapshotIds.set(key, id);
      this.snapshots.push({ id, snapshot: cloneSnapshot(snapshot) });
      inserted++;
    }
    return { inserted, skipped: batch.length - inserted };
  }

  public async insertAlerts(alerts: readonly ArbitrageAlert[]): Promise<WriteResult> {
    let inserted = 0;
    for (const alert of alerts) {
      const ref = alert.sourceSnapshotRef;
      const fundingRateId = this.snapshotIds.get(snapshotKey(ref.coin, ref.timeframe, ref.scrapedAt));
      if (fundingRateId === undefined) {
        continue;
      }
      const duplicate = this.alerts.some(
        (stored) => stored.fundingRateId === fundingRateId && stored.alert.exchange === alert.exchange
      );
      if (duplicate) {
        continue;
      }
      const id = this.nextId++;
      const createdAt = this.clock();
      this.alerts.push({ id, fundingRateId, createdAt, alert: { ...alert, id, createdAt } });
      inserted++;
    }
    return { inserted, skipped: alerts.length - inserted };
  }

  public async recordRun(run: ScrapeRun): Promise<void> {
    const createdAt = new Date(run.startedAt.getTime() + run.durationSeconds * 1000);
    this.runs.push({ id: this.nextId++, run: { ...run }, createdAt });
  }

  public async findSnapshots(query: SnapshotQuery): Promise<FundingSnapshot[]> {
    return this.snapshots
      .map(({ snapshot }) => snapshot)
      .filter((snapshot) =>
        (query.timeframe === undefined || snapshot.timeframe === query.timeframe) &&
        (query.coin === undefined || snapshot.coin === query.coin) &&
        (query.from === undefined || snapshot.scrapedAt.getTime() >= query.from.getTime()) &&
        (query.to === undefined || snapshot.scrapedAt.getTime() < query.to.getTime())
      )
      .sort(byScrapedAtAsc)
      .map(cloneSnapshot);
  }

  public async listAlerts(query: AlertQuery = {}): Promise<ArbitrageAlert[]> {
    const matches = this.alerts
      .filter(({ alert, createdAt }) =>
        (query.timeframe === undefined || alert.timeframe === query.timeframe) &&
        (!query.onlyUnnotified || !alert.notified) &&
        (query.since === undefined || createdAt.getTime() >= query.since.getTime())
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map(({ alert }) => ({ ...alert }));
    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  public async markAlertsNotified(ids: readonly number[], at: Date): Promise<number> {
    const wanted = new Set(ids);
    let updated = 0;
    for (const stored of this.alerts) {
      if (wanted.has(stored.id) && !stored.alert.notified) {
        stored.alert = { ...stored.alert, notified: true, notifiedAt: at };
        updated++;
      }
    }
    return updated;
  }

  public async findRuns(query: RunQuery = {}): Promise<ScrapeRun[]> {
    const matches = this.runs
      .filter(({ createdAt }) => query.since === undefined || createdAt.getTime() >= query.since.getTime())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map(({ run }) => ({ ...run }));
    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  public async purgeOlderThan(cutoff: Date, batchSize: number = databaseConfig.purgeBatchSize): Promise<PurgeResult> {
    if (!(batchSize > 0)) {
      throw new RangeError(`batchSize must be positive (got ${batchSize})`);
    }
    const limit = cutoff.getTime();

    const alerts = deleteInBatches(
      () => this.alerts.filter(({ createdAt }) => createdAt.getTime() < limit).map(({ id }) => id),
      (ids) => {
        this.alerts = this.alerts.filter(({ id }) => !ids.has(id));
      },
      batchSize
    );

    const snapshots = deleteInBatches(
      () => this.snapshots.filter(({ snapshot }) => snapshot.scrapedAt.getTime() < limit).map(({ id }) => id),
      (ids) => {
        this.snapshots = this.snapshots.filter(({ id }) => !ids.has(id));
        for (const [key, id] of this.snapshotIds) {
          if (ids.has(id)) {
            this.snapshotIds.delete(key);
          }
        }
        // cascade, as the foreign key does
        this.alerts = this.alerts.filter(({ fundingRateId }) => !ids.has(fundingRateId));
      },
      batchSize
    );

    const runs = deleteInBatches(
      () => this.runs.filter(({ createdAt }) => createdAt.getTime() < limit).map(({ id }) => id),
      (ids) => {
        this.runs = this.runs.filter(({ id }) => !ids.has(id));
      },
      batchSize
    );

    return { snapshots, alerts, runs };
  }
}

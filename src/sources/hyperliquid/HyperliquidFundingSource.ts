import { BaseSourceClient, SourceClientOptions } from '../BaseSourceClient';
import {
  defaultFundingIntervalHours,
  hyperliquidEndpoints,
  hyperliquidInfoTypes,
  referenceVenue,
  timeframeHours,
  venueToExchange,
} from '../../config/sources/hyperliquid.config';
import { sourceColumns } from '../../config/table.config';
import { RawRow, Timeframe } from '../../types/common';

interface UniverseAsset {
  name: string;
  isDelisted?: boolean;
}

interface AssetContext {
  funding?: string;
  openInterest?: string;
  oraclePx?: string;
  markPx?: string;
}

interface VenueFunding {
  fundingRate: string;
  nextFundingTime?: number;
  fundingIntervalHours?: number;
}

type VenueEntry = [string, VenueFunding | null];
type PredictedFunding = [string, VenueEntry[]];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isUniverseAsset = (value: unknown): value is UniverseAsset =>
  isRecord(value) && typeof value.name === 'string';

const isAssetContext = (value: unknown): value is AssetContext => isRecord(value);

const isVenueEntry = (value: unknown): value is VenueEntry =>
  Array.isArray(value) &&
  value.length === 2 &&
  typeof value[0] === 'string' &&
  (value[1] === null || (isRecord(value[1]) && typeof value[1].fundingRate === 'string'));

const isPredictedFunding = (value: unknown): value is PredictedFunding =>
  Array.isArray(value) &&
  value.length === 2 &&
  typeof value[0] === 'string' &&
  Array.isArray(value[1]) &&
  value[1].every(isVenueEntry);

const toNumber = (value: string | undefined): number | null => {
  if (value === undefined) return null;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Reads the funding comparison table from the Hyperliquid info API instead
 * of rendering the dashboard page. Rows carry fractional rates (0.0001 is
 * 0.01%) already scaled to the requested timeframe, ordered by open
 * interest, largest first.
 */
export class HyperliquidFundingSource extends BaseSourceClient {
  constructor(options: Omit<SourceClientOptions, 'name'>) {
    super({ ...options, name: 'hyperliquid' });
  }

  protected async fetchRows(timeframe: Timeframe, signal: AbortSignal): Promise<RawRow[]> {
    // sequential on purpose: one session, one request in flight
    const meta = await this.post<unknown>(
      hyperliquidEndpoints.info,
      { type: hyperliquidInfoTypes.metaAndAssetCtxs },
      signal
    );
    const predicted = await this.post<unknown>(
      hyperliquidEndpoints.info,
      { type: hyperliquidInfoTypes.predictedFundings },
      signal
    );

    const { universe, contexts } = this.parseMeta(meta);
    const fundings = this.parsePredicted(predicted);
    const hours = timeframeHours[timeframe];

    const rows = universe.flatMap((asset, index): Array<{ row: RawRow; oi: number | null }> => {
      if (asset.isDelisted) {
        return [];
      }
      const ctx = contexts[index];
      const venues = fundings.get(asset.name) ?? new Map<string, VenueFunding | null>();

      const row: RawRow = {
        [sourceColumns.coin]: asset.name,
        [sourceColumns.openInterest]: this.openInterestUsd(ctx),
        [sourceColumns.referenceFunding]: this.scaledRate(
          venues.get(referenceVenue) ?? (ctx.funding ? { fundingRate: ctx.funding } : null),
          referenceVenue,
          hours
        ),
      };

      for (const [venue, exchange] of Object.entries(venueToExchange)) {
        row[sourceColumns.exchangeFunding(exchange)] = this.scaledRate(venues.get(venue) ?? null, venue, hours);
      }

      const oi = row[sourceColumns.openInterest];
      return [{ row, oi: typeof oi === 'number' ? oi : null }];
    });

    // stable sort: equal or missing open interest keeps API order
    rows.sort((a, b) => (b.oi ?? -1) - (a.oi ?? -1));
    return rows.map(({ row }) => row);
  }

  private parseMeta(payload: unknown): { universe: UniverseAsset[]; contexts: AssetContext[] } {
    if (!Array.isArray(payload) || payload.length < 2) {
      throw this.structuralMismatch('metaAndAssetCtxs is not a [meta, contexts] pair', payload);
    }

    const [meta, contexts] = payload;
    if (!isRecord(meta) || !Array.isArray(meta.universe) || !meta.universe.every(isUniverseAsset)) {
      throw this.structuralMismatch('metaAndAssetCtxs has no usable universe', payload);
    }
    if (!Array.isArray(contexts) || !contexts.every(isAssetContext)) {
      throw this.structuralMismatch('metaAndAssetCtxs has no asset contexts', payload);
    }
    if (contexts.length !== meta.universe.length) {
      throw this.structuralMismatch(
        `universe has ${meta.universe.length} assets but ${contexts.length} contexts`,
        payload
      );
    }

    return { universe: meta.universe, contexts };
  }

  private parsePredicted(payload: unknown): Map<string, Map<string, VenueFunding | null>> {
    if (!Array.isArray(payload) || !payload.every(isPredictedFunding)) {
      throw this.structuralMismatch('predictedFundings is not a list of [coin, venues]', payload);
    }

    const byCoin = new Map<string, Map<string, VenueFunding | null>>();
    for (const [coin, venues] of payload) {
      byCoin.set(coin, new Map(venues));
    }

    const knownVenues = new Set<string>([referenceVenue, ...Object.keys(venueToExchange)]);
    const seenVenues = new Set(payload.flatMap(([, venues]) => venues.map(([venue]) => venue)));
    if (payload.length > 0 && ![...knownVenues].some((venue) => seenVenues.has(venue))) {
      throw this.structuralMismatch('predictedFundings lists none of the expected venues', payload);
    }

    return byCoin;
  }

  private openInterestUsd(ctx: AssetContext): number | null {
    const size = toNumber(ctx.openInterest);
    const price = toNumber(ctx.oraclePx) ?? toNumber(ctx.markPx);
    if (size === null || price === null) {
      return null;
    }
    return size * price;
  }

  /** Fractional rate for `hours`, from a rate paid every funding interval */
  private scaledRate(entry: VenueFunding | null, venue: string, hours: number): number | null {
    if (!entry) {
      return null;
    }
    const rate = toNumber(entry.fundingRate);
    const interval = entry.fundingIntervalHours ?? defaultFundingIntervalHours[venue] ?? 8;
    if (rate === null || interval <= 0) {
      return null;
    }
    return (rate / interval) * hours;
  }
}

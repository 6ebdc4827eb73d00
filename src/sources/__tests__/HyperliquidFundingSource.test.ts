import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { HyperliquidFundingSource } from '../hyperliquid/HyperliquidFundingSource';
import { DiagnosticsWriter } from '../interfaces/ISourceClient';
import { FetchError } from '../../utils/errors';
import { AbortedError } from '../../utils/helpers';

const meta = [
  {
    universe: [{ name: 'ETH' }, { name: 'BTC' }, { name: 'OLD', isDelisted: true }, { name: 'SOL' }],
  },
  [
    { funding: '0.00001', openInterest: '1000', markPx: '3000' },
    { funding: '0.0000125', openInterest: '100', oraclePx: '60000' },
    { openInterest: '1', oraclePx: '1' },
    { funding: '0.00002' },
  ],
];

const predicted = [
  [
    'BTC',
    [
      ['HlPerp', { fundingRate: '0.0000125', fundingIntervalHours: 1 }],
      ['BinPerp', { fundingRate: '0.0001', fundingIntervalHours: 8 }],
      ['BybitPerp', null],
    ],
  ],
  ['ETH', [['BinPerp', { fundingRate: '0.00008' }]]],
];

type Responder = (type: string, config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

const ok = (config: InternalAxiosRequestConfig, data: unknown): AxiosResponse => ({
  data,
  status: 200,
  statusText: 'OK',
  headers: {},
  config,
});

const createSource = (responder: Responder, diagnostics?: DiagnosticsWriter, overallTimeoutMs = 1000) => {
  const source = new HyperliquidFundingSource({
    baseUrl: 'https://api.example.test',
    pageLoadWaitMs: 500,
    overallTimeoutMs,
    diagnostics,
  });
  source['httpClient'].defaults.adapter = (config: InternalAxiosRequestConfig) => {
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    const type = typeof body === 'object' && body !== null && 'type' in body ? String(body.type) : '';
    return responder(type, config);
  };
  return source;
};

const fromPayloads = (payloads: Record<string, unknown>): Responder => async (type, config) => ok(config, payloads[type]);

const httpError = (config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosError => {
  const response: AxiosResponse = { data, status, statusText: 'Error', headers: {}, config };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
};

describe('HyperliquidFundingSource', () => {
  it('flattens the API payloads into rows ordered by open interest', async () => {
    const source = createSource(fromPayloads({ metaAndAssetCtxs: meta, predictedFundings: predicted }));

    const result = await source.fetch('8hours');

    expect(result.rows.map((row) => row.coin)).toEqual(['BTC', 'ETH', 'SOL']);

    const [btc, eth, sol] = result.rows;
    expect(btc.hyperliquid_oi).toBeCloseTo(6_000_000, 6);
    expect(btc.hyperliquid_funding).toBeCloseTo(0.0001, 12);
    expect(btc.binance_funding).toBeCloseTo(0.0001, 12);
    expect(btc.bybit_funding).toBeNull();

    expect(eth.hyperliquid_oi).toBeCloseTo(3_000_000, 6);
    expect(eth.hyperliquid_funding).toBeCloseTo(0.00008, 12);
    expect(eth.binance_funding).toBeCloseTo(0.00008, 12);
    expect(eth.bybit_funding).toBeNull();

    expect(sol.hyperliquid_oi).toBeNull();
    expect(sol.hyperliquid_funding).toBeCloseTo(0.00016, 12);
    expect(sol).toHaveProperty('binance_funding', null);
    expect(sol).toHaveProperty('bybit_funding', null);
  });

  it('scales rates to the requested timeframe', async () => {
    const source = createSource(fromPayloads({ metaAndAssetCtxs: meta, predictedFundings: predicted }));

    const { rows } = await source.fetch('day');

    const btc = rows.find((row) => row.coin === 'BTC');
    expect(btc?.hyperliquid_funding).toBeCloseTo(0.0003, 12);
    expect(btc?.binance_funding).toBeCloseTo(0.0003, 12);
  });

  it('classifies retryable HTTP statuses as transient', async () => {
    const source = createSource(async (_type, config) => {
      throw httpError(config, 503, 'unavailable');
    });

    const error = await source.fetch('hourly').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'TransientNetwork' });
  });

  it('treats other HTTP statuses as a structural mismatch and saves diagnostics', async () => {
    const write = vi.fn().mockResolvedValue('diagnostics/hourly.json');
    const source = createSource(
      async (_type, config) => {
        throw httpError(config, 422, { error: 'bad request type' });
      },
      { write }
    );

    const error = await source.fetch('hourly').catch((caught: unknown) => caught);

    expect(error).toMatchObject({ kind: 'StructuralMismatch' });
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith(
      expect.stringMatching(/^hourly-/),
      expect.objectContaining({ source: 'hyperliquid', timeframe: 'hourly', payload: { error: 'bad request type' } })
    );
  });

  it('rejects payloads of the wrong shape', async () => {
    const write = vi.fn().mockResolvedValue('diagnostics/day.json');
    const source = createSource(fromPayloads({ metaAndAssetCtxs: { unexpected: true }, predictedFundings: [] }), {
      write,
    });

    const error = await source.fetch('day').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'StructuralMismatch' });
    expect(write).toHaveBeenCalledWith(
      expect.stringMatching(/^day-/),
      expect.objectContaining({ payload: { unexpected: true } })
    );
  });

  it('rejects a universe whose length differs from the contexts', async () => {
    const source = createSource(
      fromPayloads({ metaAndAssetCtxs: [{ universe: [{ name: 'BTC' }] }, []], predictedFundings: [] })
    );

    await expect(source.fetch('hourly')).rejects.toThrow('StructuralMismatch: universe has 1 assets but 0 contexts');
  });

  it('gives up with a Timeout once the overall budget is spent', async () => {
    const source = createSource(
      (_type, config) =>
        new Promise((_resolve, reject) => {
          config.signal?.addEventListener?.('abort', () => reject(new Error('canceled')));
        }),
      undefined,
      20
    );

    const error = await source.fetch('hourly').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'Timeout' });
  });

  it('reports cancellation from the caller as AbortedError', async () => {
    const controller = new AbortController();
    const source = createSource(async () => {
      controller.abort();
      throw new Error('canceled');
    });

    await expect(source.fetch('hourly', controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });
});

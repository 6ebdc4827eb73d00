import axios, { AxiosError, AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { DiagnosticsWriter, ISourceClient } from './interfaces/ISourceClient';
import { FetchResult, RawRow, Timeframe, isTimeframe } from '../types/common';
import { ConfigurationError, FetchError } from '../utils/errors';
import { AbortedError } from '../utils/helpers';
import { logger } from '../utils/logger';

export interface SourceClientOptions {
  name: string;
  baseUrl: string;
  /** Per-request budget */
  pageLoadWaitMs: number;
  /** Budget for the whole fetch of one timeframe */
  overallTimeoutMs: number;
  diagnostics?: DiagnosticsWriter;
}

export class FileDiagnosticsWriter implements DiagnosticsWriter {
  constructor(private readonly dir: string) {}

  public async write(name: string, payload: unknown): Promise<string> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    const filepath = path.join(this.dir, `${name}.json`);
    await fs.promises.writeFile(filepath, JSON.stringify(payload, null, 2), 'utf-8');
    return filepath;
  }
}

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

export abstract class BaseSourceClient implements ISourceClient {
  protected readonly options: SourceClientOptions;
  protected readonly httpClient: AxiosInstance;

  constructor(options: SourceClientOptions) {
    this.options = options;
    this.httpClient = axios.create({
      baseURL: options.baseUrl,
      timeout: options.pageLoadWaitMs,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'FundingRateCollector/1.0',
      },
    });

    this.setupInterceptors();
  }

  public getName(): string {
    return this.options.name;
  }

  public async fetch(timeframe: Timeframe, signal?: AbortSignal): Promise<FetchResult> {
    if (!isTimeframe(timeframe)) {
      throw new ConfigurationError([`Unknown timeframe "${String(timeframe)}"`]);
    }
    if (signal?.aborted) {
      throw new AbortedError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.overallTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const startedAt = Date.now();
    try {
      const rows = await this.fetchRows(timeframe, controller.signal);
      logger.debug(`Fetched ${rows.length} rows for ${timeframe} from ${this.getName()}`, {
        durationMs: Date.now() - startedAt,
      });
      return { rows, fetchedAt: new Date() };
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortedError();
      }
      if (timedOut) {
        throw new FetchError(
          'Timeout',
          `${this.getName()} did not answer for ${timeframe} within ${this.options.overallTimeoutMs}ms`,
          error
        );
      }

      const fetchError = error instanceof FetchError ? error : this.classifyError(error);
      if (fetchError.kind === 'StructuralMismatch') {
        this.captureDiagnostics(timeframe, fetchError);
      }
      throw fetchError;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  public async close(): Promise<void> {
    logger.debug(`${this.getName()} source closed`);
  }

  /**
   * Fetch and flatten one timeframe into table rows, ordered as the source
   * orders them. Throw `this.structuralMismatch(...)` when the payload does
   * not have the expected shape.
   */
  protected abstract fetchRows(timeframe: Timeframe, signal: AbortSignal): Promise<RawRow[]>;

  protected async post<T>(endpoint: string, body: unknown, signal: AbortSignal): Promise<T> {
    const response = await this.httpClient.post<T>(endpoint, body, { signal });
    return response.data;
  }

  protected structuralMismatch(message: string, payload: unknown): FetchError {
    return new FetchError('StructuralMismatch', message, undefined, payload);
  }

  protected classifyError(error: unknown): FetchError {
    if (axios.isAxiosError(error)) {
      const axiosError: AxiosError = error;
      if (axiosError.code === 'ECONNABORTED' || axiosError.code === 'ETIMEDOUT') {
        return new FetchError('Timeout', `Request to ${this.getName()} timed out`, error);
      }
      if (axiosError.response) {
        const { status, data } = axiosError.response;
        if (RETRYABLE_STATUS.has(status)) {
          return new FetchError('TransientNetwork', `${this.getName()} answered HTTP ${status}`, error);
        }
        return new FetchError(
          'StructuralMismatch',
          `${this.getName()} answered HTTP ${status}`,
          error,
          data
        );
      }
      return new FetchError(
        'TransientNetwork',
        `Network error for ${this.getName()}: ${axiosError.message}`,
        error
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new FetchError('TransientNetwork', message, error);
  }

  protected setupInterceptors(): void {
    this.httpClient.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        this.handleApiError(error);
        return Promise.reject(error);
      }
    );
  }

  protected handleApiError(error: unknown): void {
    if (!axios.isAxiosError(error) || axios.isCancel(error)) {
      return;
    }

    if (error.response) {
      logger.warn(`API error for ${this.getName()}`, {
        status: error.response.status,
        url: error.config?.url,
      });
    } else {
      logger.warn(`Network error for ${this.getName()}: ${error.message}`, {
        code: error.code,
      });
    }
  }

  /** Best effort: the dump runs in the background and never fails the fetch. */
  private captureDiagnostics(timeframe: Timeframe, error: FetchError): void {
    const writer = this.options.diagnostics;
    if (!writer) {
      return;
    }

    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const payload = {
      source: this.getName(),
      timeframe,
      error: error.message,
      payload: error.diagnostic ?? null,
    };

    void writer
      .write(`${timeframe}-${stamp}`, payload)
      .then((filepath) => logger.warn(`Structural mismatch payload saved to ${filepath}`))
      .catch((writeError: unknown) => {
        logger.warn('Could not save diagnostics payload', {
          error: writeError instanceof Error ? writeError.message : String(writeError),
        });
      });
  }
}

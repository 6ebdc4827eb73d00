import { FetchResult, Timeframe } from '../../types/common';

export interface ISourceClient {
  /**
   * Get the name of the source
   */
  getName(): string;

  /**
   * Fetch the raw funding table for one timeframe. Single attempt: rejects
   * with a FetchError (Timeout, StructuralMismatch or TransientNetwork) and
   * never retries on its own.
   * @param timeframe Timeframe to fetch
   * @param signal Aborts the fetch when the daemon is stopping
   */
  fetch(timeframe: Timeframe, signal?: AbortSignal): Promise<FetchResult>;

  /**
   * Release any session held by the client
   */
  close(): Promise<void>;
}

export interface DiagnosticsWriter {
  write(name: string, payload: unknown): Promise<string>;
}

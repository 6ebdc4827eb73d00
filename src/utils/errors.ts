export type FetchErrorKind = 'Timeout' | 'StructuralMismatch' | 'TransientNetwork';

export type PersistenceErrorKind = 'ConnectivityFailure' | 'ConstraintViolation';

export abstract class ScraperError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class FetchError extends ScraperError {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    cause?: unknown,
    /** Offending payload, kept for the diagnostics dump on StructuralMismatch */
    public readonly diagnostic?: unknown
  ) {
    super(`${kind}: ${message}`, cause);
  }
}

/**
 * Row-level problem found while normalizing. Never thrown out of the
 * normalizer; collected so callers can count and log them.
 */
export class ValidationError extends ScraperError {
  constructor(
    public readonly field: string,
    public readonly rawValue: unknown,
    detail: string
  ) {
    super(`${field}: ${detail}`);
  }
}

export class PersistenceError extends ScraperError {
  constructor(
    public readonly kind: PersistenceErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(`${kind}: ${message}`, cause);
  }
}

export class ConfigurationError extends ScraperError {
  constructor(
    public readonly issues: string[]
  ) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/** A batch that produced no usable rows; retried like a fetch failure. */
export class EmptyBatchError extends ScraperError {
  constructor(public readonly totalRows: number) {
    super(`No usable rows (${totalRows} rows found)`);
  }
}

export const isRetryable = (error: unknown): boolean => {
  if (error instanceof FetchError || error instanceof EmptyBatchError) {
    return true;
  }
  if (error instanceof PersistenceError) {
    return error.kind === 'ConnectivityFailure';
  }
  return false;
};

/**
 * Human-readable cause, taken from the deepest classified error in the
 * cause chain.
 */
export const describeError = (error: unknown): string => {
  let deepest: ScraperError | null = null;
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    if (current instanceof ScraperError) {
      deepest = current;
    }
    current = current.cause;
  }

  if (deepest) {
    return deepest.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

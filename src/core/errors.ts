/**
 * Error taxonomy for the watcher core.
 *
 * External failures (market data, analysis, transport) are downgraded by the
 * scheduler; only StatePersistError is allowed to escape a tick.
 */

export type WatcherErrorCode =
  | 'TRANSIENT_DATA'
  | 'CORRUPT_STATE'
  | 'QUOTA_EXHAUSTED'
  | 'TRANSPORT'
  | 'STATE_PERSIST'
  | 'CONFIG';

/**
 * Base error class
 */
export class WatcherError extends Error {
  constructor(
    message: string,
    public readonly code: WatcherErrorCode,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Market source or analysis engine call failed or timed out. Retry next tick.
 */
export class TransientDataError extends WatcherError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSIENT_DATA', cause);
  }
}

/**
 * Analysis engine could not produce a usable result for a candidate.
 */
export class AnalysisError extends TransientDataError {
  constructor(
    message: string,
    public readonly candidateId: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

/**
 * Persisted state is unreadable or does not match the schema.
 */
export class CorruptStateError extends WatcherError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CORRUPT_STATE', cause);
  }
}

/**
 * spend() was called with no quota left. Callers must check canSpend() first.
 */
export class QuotaExhaustedError extends WatcherError {
  constructor(
    public readonly used: number,
    public readonly maxDaily: number,
  ) {
    super(`Daily AI quota exhausted (${used}/${maxDaily})`, 'QUOTA_EXHAUSTED');
  }
}

/**
 * Delivery failed for one or more destinations.
 */
export class TransportError extends WatcherError {
  constructor(
    message: string,
    public readonly failedDestinations: string[],
    cause?: unknown,
  ) {
    super(message, 'TRANSPORT', cause);
  }
}

/**
 * The durable backend rejected a write. The tick that caused it must not report success.
 */
export class StatePersistError extends WatcherError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STATE_PERSIST', cause);
  }
}

export class ConfigurationError extends WatcherError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'CONFIG');
  }
}

/**
 * Render an unknown thrown value for log lines.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error
      ? `${error.message} (${error.cause.message})`
      : error.message;
  }
  return String(error);
}

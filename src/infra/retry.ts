/**
 * Retry Infrastructure - error classification and exponential backoff
 *
 * Delivery failures are retryable by default; only errors explicitly
 * marked non-retryable end a queue entry early.
 */

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * An error that should be retried.
 */
export class RetryableError extends Error {
  readonly retryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'RetryableError';
  }
}

/**
 * An error that should NOT be retried (missing target, invalid state, bad input).
 */
export class NonRetryableError extends Error {
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'NonRetryableError';
  }
}

/**
 * Failed outbound webhook call: non-2xx response, timeout, cancellation or
 * connection error. `statusCode` is set only when a response was received.
 */
export class DeliveryError extends RetryableError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'DeliveryError';
    this.statusCode = statusCode;
  }
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof NonRetryableError) return false;
  return true;
}

// =============================================================================
// BACKOFF
// =============================================================================

export interface BackoffOptions {
  /** Delay before the first retry in ms */
  baseDelayMs: number;
  /** Ceiling for any single delay in ms */
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 1_000,
  maxDelayMs: 15 * 60 * 1000,
};

/**
 * Delay before the next attempt, given how many attempts had already failed
 * before the one that just failed: `baseDelayMs * 2^attemptsBefore`, capped
 * at `maxDelayMs`.
 */
export function computeBackoff(attemptsBefore: number, options: BackoffOptions = DEFAULT_BACKOFF): number {
  const exponent = Math.max(0, Math.floor(attemptsBefore));
  const delay = options.baseDelayMs * Math.pow(2, exponent);
  if (!Number.isFinite(delay)) return options.maxDelayMs;
  return Math.min(delay, options.maxDelayMs);
}

/**
 * Reconnect Backoff Utilities
 *
 * Exponential backoff for the reconnect supervisor: the delay doubles after
 * every failed attempt, never exceeds the configured maximum, and returns to
 * the initial value after a successful connection. Optional jitter spreads
 * retries from several clients; it defaults to off so retries are predictable.
 */

import { AbortError } from '../shared/errors';

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Base delay in milliseconds (default: 5000) */
  baseDelayMs?: number;
  /** Maximum delay cap in milliseconds (default: 300000) */
  maxDelayMs?: number;
  /** Jitter factor as decimal, e.g., 0.25 = ±25% (default: 0) */
  jitterFactor?: number;
}

const DEFAULT_CONFIG: Required<RetryConfig> = {
  baseDelayMs: 5_000,
  maxDelayMs: 300_000,
  jitterFactor: 0,
};

/**
 * Calculate delay with exponential backoff and optional jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) ± jitter, never above maxDelay
 *
 * With defaults (baseDelay=5000, maxDelay=300000, no jitter):
 * - Attempt 0: 5s
 * - Attempt 1: 10s
 * - Attempt 2: 20s
 * - Attempt 6+: 300s (capped)
 *
 * @param attempt - Zero-based attempt number (0 = first retry)
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = {}
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = { ...DEFAULT_CONFIG, ...config };

  // Exponential backoff: baseDelay * 2^attempt, capped at maxDelay
  const exponentialDelay = Math.min(
    baseDelayMs * Math.pow(2, attempt),
    maxDelayMs
  );

  if (jitterFactor <= 0) {
    return exponentialDelay;
  }

  // Add jitter: random value in range [-jitterFactor, +jitterFactor]
  const jitterRange = exponentialDelay * jitterFactor;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.min(Math.round(exponentialDelay + jitter), maxDelayMs);
}

/**
 * Current reconnect delay for one client.
 *
 * `next()` hands out the delay to sleep before the coming retry and advances
 * the attempt counter; `reset()` is called after every successful connect.
 */
export class ReconnectBackoff {
  private attempt = 0;
  private readonly config: Required<RetryConfig>;

  constructor(config: RetryConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Delay the next retry would wait, without consuming it */
  get currentDelayMs(): number {
    return calculateBackoffDelay(this.attempt, { ...this.config, jitterFactor: 0 });
  }

  get attempts(): number {
    return this.attempt;
  }

  next(): number {
    const delay = calculateBackoffDelay(this.attempt, this.config);
    // Stop counting once the cap is reached so 2^attempt cannot overflow
    if (this.config.baseDelayMs * Math.pow(2, this.attempt) < this.config.maxDelayMs) {
      this.attempt++;
    }
    return delay;
  }

  reset(): void {
    this.attempt = 0;
  }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sleep that rejects with AbortError as soon as the signal fires.
 */
export const sleep: SleepFn = (ms, signal) => {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

import { createChildLogger } from './logger.js';

const log = createChildLogger('retry');

export interface RetryOptions {
  maxAttempts?: number;
  /** Lower bound of every delay, in ms. */
  minDelay?: number;
  /** Upper bound of every delay, in ms. */
  maxDelay?: number;
  /** Scale of the exponential ceiling: multiplier * 2^(attempt - 1). */
  multiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  /** Source of jitter in [0, 1). */
  random?: () => number;
}

const TRANSIENT_STATUS_CODES = [408, 429];

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Errors without an HTTP status (network resets, empty replies) are transient.
 * With a status, only timeouts, rate limits and 5xx are.
 */
export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status === undefined) return true;
  return TRANSIENT_STATUS_CODES.includes(status) || status >= 500;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 6,
  minDelay: 1000,
  maxDelay: 60_000,
  multiplier: 1000,
  shouldRetry: isTransientError,
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: Math.random,
};

/**
 * Delay to wait after the given (1-based) failed attempt: uniform between
 * minDelay and the exponential ceiling, the ceiling clamped to
 * [minDelay, maxDelay]. The result never exceeds maxDelay.
 */
export function computeBackoffDelay(
  attempt: number,
  opts?: Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'multiplier' | 'random'>,
): number {
  const { minDelay, maxDelay, multiplier, random } = { ...DEFAULT_OPTIONS, ...opts };

  // A floor above the cap is pulled down to it: maxDelay always wins.
  const floor = Math.min(minDelay, maxDelay);
  const ceiling = Math.max(floor, Math.min(multiplier * Math.pow(2, attempt - 1), maxDelay));
  return floor + random() * (ceiling - floor);
}

export async function retry<T>(
  fn: () => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const options = { ...DEFAULT_OPTIONS, ...opts };

  let lastError: unknown;
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === options.maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, options);

      log.warn(
        { attempt, maxAttempts: options.maxAttempts, delay, err: error },
        'Retrying after error',
      );

      await options.sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Wrap an async operation so every call goes through {@link retry}.
 */
export function withRetry<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  opts?: RetryOptions,
): (...args: A) => Promise<T> {
  return (...args: A) => retry(() => fn(...args), opts);
}

import type { RetryPolicy } from './types';

const JITTER_FACTOR = 0.2;

/**
 * Delay before retry number `retry` (1-based): `min * 2^(retry - 1)` plus up
 * to 20% jitter, clamped to `[min, max]`.
 */
export function computeBackoffMs(
  retry: number,
  policy: Pick<RetryPolicy, 'minRetryDelayMs' | 'maxRetryDelayMs'>,
  random: () => number = Math.random,
): number {
  const { minRetryDelayMs, maxRetryDelayMs } = policy;
  const exponential = minRetryDelayMs * 2 ** Math.max(0, retry - 1);
  const jitter = exponential * JITTER_FACTOR * random();
  const delay = Math.round(exponential + jitter);
  return Math.min(maxRetryDelayMs, Math.max(minRetryDelayMs, delay));
}

export function retryPolicyFromSeconds(
  maxRetries: number,
  minBackoffSeconds: number,
  maxBackoffSeconds: number,
): RetryPolicy {
  return {
    maxRetries,
    minRetryDelayMs: minBackoffSeconds * 1000,
    maxRetryDelayMs: maxBackoffSeconds * 1000,
  };
}

/**
 * Milliseconds requested by a `Retry-After` header value, given either in
 * seconds or as an HTTP date. Unparseable values yield undefined.
 */
export function parseRetryAfterMs(
  header: string | null | undefined,
  now: () => number = Date.now,
): number | undefined {
  if (!header || !header.trim()) {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now());
  }

  return undefined;
}

/**
 * A server-requested delay wins over the computed backoff, capped at
 * `maxRetryDelayMs`.
 */
export function computeRetryDelayMs(
  retry: number,
  policy: Pick<RetryPolicy, 'minRetryDelayMs' | 'maxRetryDelayMs'>,
  retryAfterMs?: number,
  random: () => number = Math.random,
): number {
  if (retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, policy.maxRetryDelayMs);
  }
  return computeBackoffMs(retry, policy, random);
}

export interface RetryPolicy {
  /** Retries after the first attempt; the request is sent at most maxRetries + 1 times. */
  readonly maxRetries: number;
  isRetryableStatus(status: number): boolean;
  /** Delay before retry number `retry` (0-based). A Retry-After value wins when present. */
  delayFor(retry: number, retryAfterMs: number | null): number;
}

export interface RetryOptions {
  readonly maxRetries?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly retryableStatuses?: readonly number[];
}

const DEFAULT_MAX_RETRIES = 5;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 60_000;

export function createRetryPolicy(opts?: RetryOptions): RetryPolicy {
  const maxRetries = opts?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = opts?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const retryable = new Set(opts?.retryableStatuses ?? [429]);

  return {
    maxRetries,
    isRetryableStatus: (status) => retryable.has(status),
    delayFor(retry, retryAfterMs) {
      if (retryAfterMs !== null) return retryAfterMs;
      return Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
    },
  };
}

/** Reads a Retry-After header given either as delta-seconds or as an HTTP date. */
export function parseRetryAfter(header: string | null, now: number): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (trimmed === "") return null;

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

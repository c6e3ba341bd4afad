import axios from 'axios';
import * as functions from 'firebase-functions';

const TRANSIENT_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN'];

export interface RetryOptions {
  /** Total tries, the first call included. */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Shows up in the retry log line, e.g. `chat`. */
  label?: string;
}

/**
 * Rate limits, upstream 5xx and dropped connections. Anything else (4xx,
 * bad payloads) fails on the first try.
 */
export function isTransientError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return status === 429 || status >= 500;
    }
    return error.code !== undefined && TRANSIENT_NETWORK_CODES.includes(error.code);
  }
  if (error instanceof Error) {
    return TRANSIENT_NETWORK_CODES.some((code) => error.message.includes(code));
  }
  return false;
}

/** Retry-After in seconds, as sent with a 429. */
function retryAfterMs(error: unknown): number | null {
  if (!axios.isAxiosError(error)) return null;
  const header: unknown = error.response?.headers?.['retry-after'];
  const seconds = typeof header === 'string' ? Number.parseInt(header, 10) : Number.NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Calls `fn` until it succeeds, doubling the wait between attempts. A
 * Retry-After header from the upstream wins over the computed delay, capped
 * at `maxDelayMs`.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = isTransientError,
    label = 'retry',
  } = options;

  let backoff = initialDelayMs;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const wait = Math.min(retryAfterMs(error) ?? backoff, maxDelayMs);
      functions.logger.warn(`[${label}] Attempt ${attempt} failed, retrying in ${wait}ms`);
      await delay(wait);
      backoff = Math.min(backoff * 2, maxDelayMs);
    }
  }
}

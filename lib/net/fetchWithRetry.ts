import pLimit, { type Limiter } from './pLimit';
import { CONFIG } from '../config';
import logger from '../logger';

// at most this many concurrent requests per remote host
const PER_HOST_CONCURRENCY = 2;
const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

const hostLimits = new Map<string, Limiter>();

function limiterFor(url: string): Limiter {
  let host: string;
  try {
    host = new URL(url).host;
  } catch {
    host = 'default';
  }
  let limit = hostLimits.get(host);
  if (!limit) {
    limit = pLimit(PER_HOST_CONCURRENCY);
    hostLimits.set(host, limit);
  }
  return limit;
}

export interface FetchRetryOptions {
  retries?: number; // total attempts
  backoffMs?: number; // base of the exponential backoff
  timeoutMs?: number; // per attempt
}

/**
 * `fetch` with a per-attempt timeout, exponential backoff on network errors,
 * 429 and 5xx, and `Retry-After` support. The last response is returned as-is
 * once attempts run out; the last network error is rethrown.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<Response> {
  const attempts = Math.max(1, opts?.retries ?? 3);
  const base = opts?.backoffMs ?? 200;
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;

  return limiterFor(url)(async () => {
    for (let attempt = 1; ; attempt++) {
      const backoff = base * 2 ** (attempt - 1);
      let res: Response;
      try {
        res = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      } catch (err: unknown) {
        logger.debug({ url, attempt, err }, 'fetch attempt failed');
        if (attempt >= attempts) throw err;
        await sleep(backoff);
        continue;
      }

      if (!RETRYABLE_STATUS.has(res.status) || attempt >= attempts) return res;

      const retryAfter = res.headers.get('retry-after');
      const wait = res.status === 429 && retryAfter ? parseRetryAfter(retryAfter) : backoff;
      logger.debug({ url, attempt, status: res.status, wait }, 'retrying fetch');
      // release the socket before waiting
      await res.body?.cancel();
      await sleep(wait);
    }
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, Math.floor(ms))));
}

/** Retry-After as milliseconds: delta-seconds or an HTTP date, 1 s when unreadable. */
export function parseRetryAfter(val: string): number {
  const seconds = Number(val);
  if (!Number.isNaN(seconds)) return seconds * 1000;
  const at = Date.parse(val);
  if (!Number.isNaN(at)) return Math.max(0, at - Date.now());
  return 1000;
}

/**
 * Simple Redis adapter using `ioredis`.
 *
 * Exports:
 * - `getRedisClient()` - async initializer/getter that returns a connected Redis client or `null` if unavailable.
 * - `closeRedisClient()` - disconnects the shared client so the process can exit.
 *
 * Returns `null` when `REDIS_URL` is not set or when a connection attempt
 * fails; callers fall back to in-process alternatives.
 */

import Redis from 'ioredis';
import logger from './logger';

let client: Redis | null = null;
let connecting: Promise<Redis | null> | null = null;
let unavailable = false;

async function connect(url: string): Promise<Redis | null> {
  const candidate = new Redis(url, {
    password: process.env.REDIS_PASSWORD || undefined,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });

  try {
    await candidate.connect();
    await candidate.ping();
    client = candidate;
    return client;
  } catch (err) {
    candidate.disconnect();
    unavailable = true;
    logger.warn({ err }, 'Redis not available, falling back to in-process cache');
    return null;
  }
}

/**
 * Get a Redis client if `REDIS_URL` is configured.
 * Concurrent first callers share one connection attempt; a failed attempt is not retried.
 */
export async function getRedisClient(): Promise<Redis | null> {
  if (client) return client;

  const url = process.env.REDIS_URL;
  if (!url || unavailable) return null;

  if (!connecting) {
    connecting = connect(url).finally(() => {
      connecting = null;
    });
  }
  return connecting;
}

export async function closeRedisClient(): Promise<void> {
  const current = client;
  client = null;
  if (current) await current.quit();
}

const redisUtils = {
  getRedisClient,
  closeRedisClient,
};
export default redisUtils;

import { LRUCache } from "lru-cache";
import RedisCacheAdapter from './cache/redisAdapter';
import { setCacheHitRatio } from './metrics';

export type CacheKey = string;

let _cacheHits = 0;
let _cacheMisses = 0;

export function trackCacheAccess(hit: boolean) {
  if (hit) _cacheHits++; else _cacheMisses++;
  const total = _cacheHits + _cacheMisses;
  if (total > 0) setCacheHitRatio(_cacheHits / total);
}

export interface CacheAdapter<K = CacheKey, V = unknown> {
  get(key: K): Promise<V | undefined>;
  set(key: K, value: V, ttlMillis?: number): Promise<void>;
  del(key: K): Promise<void>;
}

/**
 * Simple in-memory LRU adapter using `lru-cache` v10+.
 */
export class InMemoryLRUAdapter<V extends {}> implements CacheAdapter<string, V> {
  private cache: LRUCache<string, V>;

  constructor(opts?: { max?: number; ttl?: number }) {
    this.cache = new LRUCache<string, V>({
      max: opts?.max ?? 5000,
      ttl: opts?.ttl ?? 1000 * 60 * 60, // 1 hour default
    });
  }

  async get(key: string): Promise<V | undefined> {
    const val = this.cache.get(key);
    trackCacheAccess(val !== undefined);
    return val;
  }

  async set(key: string, value: V, ttlMillis?: number): Promise<void> {
    if (typeof ttlMillis === 'number') {
      this.cache.set(key, value, { ttl: ttlMillis });
    } else {
      this.cache.set(key, value);
    }
  }

  async del(key: string): Promise<void> {
    this.cache.delete(key);
  }
}

/**
 * Default cache: Redis when `REDIS_URL` is set, otherwise in-process LRU.
 * `isValue` guards what comes back from Redis.
 */
export function createDefaultCache<V extends {}>(opts: {
  isValue: (value: unknown) => value is V;
  max?: number;
  ttl?: number;
}): CacheAdapter<string, V> {
  if (process.env.REDIS_URL) {
    return new RedisCacheAdapter<V>(opts.isValue);
  }
  return new InMemoryLRUAdapter<V>(opts);
}

import { createHash } from 'crypto';
import { describeError } from './errors';
import { logger } from './logger';

interface CacheEntry<T> {
  value: T;
  createdAt: number;
  expiresAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  maxSize?: number;
  keyPrefix?: string;
  now?: () => number;
}

export type CachedFunction<A extends unknown[], R> = ((...args: A) => Promise<R>) & {
  clear(): void;
  size(): number;
};

const EVICTION_BATCH = 10;

/**
 * Memoize an async function for ttlMs per distinct argument list.
 * Rejections are passed through and never cached.
 */
export function withTtlCache<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: TtlCacheOptions
): CachedFunction<A, R> {
  const { ttlMs, maxSize = 1000, keyPrefix = '', now = Date.now } = options;
  const entries = new Map<string, CacheEntry<R>>();

  const evictOldest = (): void => {
    const oldest = [...entries.entries()]
      .sort(([, a], [, b]) => a.createdAt - b.createdAt)
      .slice(0, EVICTION_BATCH);
    oldest.forEach(([key]) => entries.delete(key));
  };

  const cached = async (...args: A): Promise<R> => {
    const key = cacheKey(keyPrefix, fn.name, args);
    const entry = entries.get(key);

    if (entry && entry.expiresAt > now()) {
      return entry.value;
    }
    if (entry) {
      entries.delete(key);
    }

    const value = await fn(...args);
    if (entries.size >= maxSize) {
      evictOldest();
    }
    const createdAt = now();
    entries.set(key, { value, createdAt, expiresAt: createdAt + ttlMs });
    return value;
  };

  return Object.assign(cached, {
    clear: () => entries.clear(),
    size: () => entries.size
  });
}

/**
 * Resolve to `fallback` instead of rejecting
 */
export function withFallback<A extends unknown[], R, F>(
  fn: (...args: A) => Promise<R>,
  fallback: F,
  context?: string
): (...args: A) => Promise<R | F> {
  return async (...args: A) => {
    try {
      return await fn(...args);
    } catch (error) {
      logger.warn(`${context ?? (fn.name || 'wrapped function')} failed, using fallback`, {
        error: describeError(error)
      });
      return fallback;
    }
  };
}

function cacheKey(prefix: string, name: string, args: unknown[]): string {
  let serialized: string;
  try {
    serialized = JSON.stringify(args) ?? '';
  } catch {
    serialized = args.map(arg => String(arg)).join('|');
  }
  return createHash('md5').update(`${prefix}_${name}_${serialized}`).digest('hex');
}

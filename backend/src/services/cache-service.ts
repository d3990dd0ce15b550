/**
 * services/cache-service.ts — Bundle cache
 *
 * Redis-backed when ENABLE_REDIS_CACHE=true, in-memory Map fallback otherwise.
 * Provides: get/set with TTL support.
 * The store never changes after load, so a bundle keyed by
 * (dataset version, criteria) stays valid until its TTL.
 *
 * Key naming convention:
 *   dash:{version}:{criteriaHash}   — dashboard bundle
 */
import { createHash } from 'crypto';
import type Redis from 'ioredis';
import { env } from '../config/env.ts';
import { getRedis } from '../config/redis.ts';
import { childLogger } from '../shared/logger.ts';
import { cacheOperations } from '../shared/metrics.ts';
import type { CriteriaSnapshot } from '../types.ts';

const log = childLogger({ module: 'cache' });

// ── In-memory fallback ──
const MEM_CACHE_MAX = 200;
const memCache = new Map<string, { data: string; expiresAt: number }>();

function memGet(key: string): string | null {
  const entry = memCache.get(key);
  if (!entry) return null;
  if (Date.now() > entry.expiresAt) {
    memCache.delete(key);
    return null;
  }
  return entry.data;
}

function memSet(key: string, data: string, ttlSec: number): void {
  // evict oldest on overflow
  if (memCache.size >= MEM_CACHE_MAX) {
    const first = memCache.keys().next().value;
    if (first !== undefined) memCache.delete(first);
  }
  memCache.set(key, { data, expiresAt: Date.now() + ttlSec * 1000 });
}

function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Public API ──

export class CacheService {
  private redis: Redis | null = null;

  constructor(useRedis: boolean = env.ENABLE_REDIS_CACHE) {
    if (useRedis) this.redis = getRedis();
  }

  get backend(): 'redis' | 'memory' {
    return this.redis ? 'redis' : 'memory';
  }

  /**
   * Get the cached JSON text for a key, or null.
   * Callers store serialized payloads and send them back as-is.
   */
  async get(key: string): Promise<string | null> {
    try {
      const raw = this.redis ? await this.redis.get(key) : memGet(key);
      cacheOperations.inc({ operation: raw ? 'hit' : 'miss' });
      return raw;
    } catch (err) {
      log.warn({ key, error: errMessage(err) }, 'Cache GET failed');
      return null;
    }
  }

  /**
   * Set JSON text with TTL (in seconds).
   */
  async set(key: string, json: string, ttlSec: number): Promise<void> {
    try {
      if (this.redis) await this.redis.setex(key, ttlSec, json);
      else memSet(key, json, ttlSec);
      cacheOperations.inc({ operation: 'set' });
    } catch (err) {
      log.warn({ key, error: errMessage(err) }, 'Cache SET failed');
    }
  }

  async getStats(): Promise<{ type: string; keys?: number; memoryUsed?: string }> {
    if (this.redis) {
      try {
        const info = await this.redis.info('keyspace');
        const dbLine = info.match(/db0:keys=(\d+)/);
        const memInfo = await this.redis.info('memory');
        const memLine = memInfo.match(/used_memory_human:(.+)/);
        return {
          type: 'redis',
          keys: dbLine?.[1] ? parseInt(dbLine[1]) : 0,
          memoryUsed: memLine?.[1] ? memLine[1].trim() : 'unknown',
        };
      } catch {
        return { type: 'redis', keys: 0, memoryUsed: 'unavailable' };
      }
    }
    return { type: 'memory', keys: memCache.size };
  }
}

// ── Singleton ──
let _cache: CacheService | null = null;
export function getCache(): CacheService {
  if (!_cache) _cache = new CacheService();
  return _cache;
}

// ── Helpers ──

/**
 * Create a stable hash key from filter params.
 * Key order does not matter.
 */
export function hashFilters(filters: object): string {
  const sorted = JSON.stringify(filters, Object.keys(filters).sort());
  return createHash('md5').update(sorted).digest('hex').slice(0, 12);
}

export function dashboardKey(version: string, criteria: CriteriaSnapshot): string {
  return `dash:${version}:${hashFilters(criteria)}`;
}

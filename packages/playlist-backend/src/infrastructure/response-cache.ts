// packages/playlist-backend/src/infrastructure/response-cache.ts
//
// Response cache keyed by normalized query, used to skip repeated playlist-platform lookups.
// - memory: per-process LRU with TTL (default).
// - redis: shared across processes via ioredis (CACHE_PROVIDER=redis).
// Cache failures are logged and treated as misses; they never fail a job.

import type { CacheProvider } from '../config/env.js';
import { logger as rootLogger, type Logger } from './logger.js';

export interface CacheStats {
  provider: CacheProvider;
  hits: number;
  misses: number;
  size: number | null;
}

export interface ResponseCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  stats(): CacheStats;
}

/** Lowercases, trims and collapses whitespace so equivalent queries share an entry. */
export function normalizeQuery(...parts: string[]): string {
  return parts.map((part) => part.trim().toLowerCase().replace(/\s+/g, ' ')).join('|');
}

export interface MemoryResponseCacheOptions {
  ttlSeconds: number;
  maxEntries: number;
  now?: () => number;
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export class MemoryResponseCache implements ResponseCache {
  // Map order doubles as recency order: oldest first.
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: MemoryResponseCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.maxEntries = Math.max(1, options.maxEntries);
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.now()) {
      if (entry) this.entries.delete(key);
      this.misses += 1;
      return null;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits += 1;
    return entry.value;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  stats(): CacheStats {
    return { provider: 'memory', hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}

/** The subset of the ioredis client the cache uses. */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}

export interface RedisResponseCacheOptions {
  ttlSeconds: number;
  keyPrefix?: string;
  logger?: Logger;
}

export class RedisResponseCache implements ResponseCache {
  private readonly ttlSeconds: number;
  private readonly keyPrefix: string;
  private readonly log: Logger;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly client: RedisCacheClient,
    options: RedisResponseCacheOptions,
  ) {
    this.ttlSeconds = options.ttlSeconds;
    this.keyPrefix = options.keyPrefix ?? 'vibelist:cache:';
    this.log = options.logger ?? rootLogger;
  }

  async get(key: string): Promise<string | null> {
    try {
      const value = await this.client.get(this.keyPrefix + key);
      if (value === null) {
        this.misses += 1;
        return null;
      }
      this.hits += 1;
      return value;
    } catch (error: unknown) {
      this.misses += 1;
      this.log.warn('Cache read failed; treating as miss', {
        component: 'redis',
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async set(key: string, value: string): Promise<void> {
    try {
      await this.client.set(this.keyPrefix + key, value, 'EX', this.ttlSeconds);
    } catch (error: unknown) {
      this.log.warn('Cache write failed', {
        component: 'redis',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  stats(): CacheStats {
    return { provider: 'redis', hits: this.hits, misses: this.misses, size: null };
  }
}

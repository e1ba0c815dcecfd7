// Bounded LRU of remote directory existence with per-entry TTL.
// Map insertion order doubles as recency: a hit re-inserts the key at the tail.

import type { FastifyBaseLogger } from 'fastify';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface CacheEntry {
  exists: boolean;
  storedAt: number;
}

export interface DirectoryCacheStats {
  size: number;
  validEntries: number;
  expiredEntries: number;
  maxSize: number;
  ttlSeconds: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface DirectoryCacheOptions {
  ttlSeconds: number;
  maxSize: number;
  logger?: FastifyBaseLogger;
  /** Milliseconds since epoch. Defaults to Date.now. */
  now?: () => number;
}

/**
 * Canonical cache key: slashes unified, duplicates collapsed, no leading or
 * trailing slash.
 */
export function normalizeCacheKey(path: string): string {
  return path
    .replace(/\\/g, '/')
    .replace(/\/{2,}/g, '/')
    .replace(/^\/+|\/+$/g, '');
}

// ---------------------------------------------------------------------------
// DirectoryCache
// ---------------------------------------------------------------------------

export class DirectoryCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly ttlSeconds: number;
  private readonly maxSize: number;
  private readonly logger: FastifyBaseLogger | undefined;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: DirectoryCacheOptions) {
    this.ttlSeconds = options.ttlSeconds;
    this.ttlMs = options.ttlSeconds * 1000;
    this.maxSize = Math.max(1, options.maxSize);
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Cached existence of a directory, or undefined when unknown or stale.
   */
  get(path: string): boolean | undefined {
    const key = normalizeCacheKey(path);
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    if (this.isExpired(entry)) {
      this.misses++;
      return undefined;
    }

    // Re-insert at the tail (most recently used)
    this.entries.set(key, entry);
    this.hits++;
    return entry.exists;
  }

  set(path: string, exists: boolean): void {
    const key = normalizeCacheKey(path);
    this.entries.delete(key);
    this.entries.set(key, { exists, storedAt: this.now() });

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      this.logger?.debug(
        { evictedPath: oldest.value, cacheSize: this.entries.size },
        'Directory cache entry evicted (max size)'
      );
    }
  }

  delete(path: string): boolean {
    return this.entries.delete(normalizeCacheKey(path));
  }

  /**
   * Drop every entry at or below a path.
   */
  deleteTree(path: string): number {
    const root = normalizeCacheKey(path);
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key === root || key.startsWith(`${root}/`)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): DirectoryCacheStats {
    let expiredEntries = 0;
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry)) expiredEntries++;
    }

    return {
      size: this.entries.size,
      validEntries: this.entries.size - expiredEntries,
      expiredEntries,
      maxSize: this.maxSize,
      ttlSeconds: this.ttlSeconds,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.storedAt >= this.ttlMs;
  }
}

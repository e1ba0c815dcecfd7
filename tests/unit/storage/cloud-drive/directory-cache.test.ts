import { describe, it, expect, beforeEach } from 'vitest';

import { DirectoryCache, normalizeCacheKey } from '@/storage/cloud-drive/directory-cache.js';

import { createMockLogger } from '../../../helpers/logger.js';

describe('normalizeCacheKey', () => {
  it('unifies separators and trims slashes', () => {
    expect(normalizeCacheKey('\\assets//video/')).toBe('assets/video');
  });
});

describe('DirectoryCache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
  });

  it('returns undefined for unknown paths and counts a miss', () => {
    const cache = new DirectoryCache({ ttlSeconds: 60, maxSize: 10, now });

    expect(cache.get('a')).toBeUndefined();
    expect(cache.stats().misses).toBe(1);
  });

  it('stores both positive and negative existence', () => {
    const cache = new DirectoryCache({ ttlSeconds: 60, maxSize: 10, now });
    cache.set('a', true);
    cache.set('b', false);

    expect(cache.get('a')).toBe(true);
    expect(cache.get('b')).toBe(false);
    expect(cache.stats().hits).toBe(2);
  });

  it('treats differently spelled paths as one key', () => {
    const cache = new DirectoryCache({ ttlSeconds: 60, maxSize: 10, now });
    cache.set('/assets/video/', true);

    expect(cache.get('assets//video')).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('expires entries once the TTL has elapsed', () => {
    const cache = new DirectoryCache({ ttlSeconds: 5, maxSize: 10, now });
    cache.set('a', true);

    clock += 4_999;
    expect(cache.get('a')).toBe(true);

    clock += 1;
    expect(cache.get('a')).toBeUndefined();
    // The stale entry is removed on access
    expect(cache.size).toBe(0);
  });

  it('evicts the least recently used entry beyond maxSize', () => {
    const { logger, debug } = createMockLogger();
    const cache = new DirectoryCache({ ttlSeconds: 60, maxSize: 2, now, logger });
    cache.set('a', true);
    cache.set('b', true);

    // Touch "a" so "b" becomes the oldest
    expect(cache.get('a')).toBe(true);
    cache.set('c', true);

    expect(cache.size).toBe(2);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(true);
    expect(cache.get('c')).toBe(true);
    expect(cache.stats().evictions).toBe(1);
    expect(debug).toHaveBeenCalledWith(
      { evictedPath: 'b', cacheSize: 2 },
      'Directory cache entry evicted (max size)'
    );
  });

  it('never grows past maxSize', () => {
    const cache = new DirectoryCache({ ttlSeconds: 60, maxSize: 3, now });
    for (let i = 0; i < 50; i++) cache.set(`dir-${i}`, i % 2 === 0);

    expect(cache.size).toBe(3);
    expect(cache.stats().evictions).toBe(47);
  });

  it('re-setting a key refreshes its timestamp', () => {
    const cache = new DirectoryCache({ ttlSeconds: 10, maxSize: 10, now });
    cache.set('a', false);
    clock += 8_000;
    cache.set('a', true);
    clock += 8_000;

    expect(cache.get('a')).toBe(true);
  });

  it('deleteTree drops a path and everything below it only', () => {
    const cache = new DirectoryCache({ ttlSeconds: 60, maxSize: 10, now });
    cache.set('a', true);
    cache.set('a/b', true);
    cache.set('a/b/c', true);
    cache.set('ab', true);

    expect(cache.deleteTree('a/')).toBe(3);
    expect(cache.get('ab')).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('reports valid and expired entries and resets counters on clear', () => {
    const cache = new DirectoryCache({ ttlSeconds: 10, maxSize: 100, now });
    cache.set('old', true);
    clock += 6_000;
    cache.set('new', true);
    clock += 5_000;
    cache.get('new');

    expect(cache.stats()).toEqual({
      size: 2,
      validEntries: 1,
      expiredEntries: 1,
      maxSize: 100,
      ttlSeconds: 10,
      hits: 1,
      misses: 0,
      evictions: 0,
    });

    cache.clear();
    expect(cache.stats()).toMatchObject({ size: 0, hits: 0, misses: 0, evictions: 0 });
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { SonarError, SonarErrorCode } from '../../errors/index.js';
import { captureError } from '../../__tests__/fixtures.js';
import { createCacheKey } from '../cache-key.js';
import { CacheStore } from '../cache-store.js';
import { TtlPolicy } from '../ttl-policy.js';

describe('CacheStore', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('TTL', () => {
    it('serves an entry until its TTL has passed', () => {
      const store = new CacheStore();
      const key = createCacheKey('projects', 'P');
      store.put(key, { key: 'P' });

      vi.advanceTimersByTime(299_000);
      expect(store.get(key)).toEqual({ hit: true, value: { key: 'P' } });

      vi.advanceTimersByTime(2_000);
      expect(store.get(key)).toEqual({ hit: false });
      expect(store.stats().expiredRemovals).toBe(1);
      expect(store.size).toBe(0);
    });

    it('uses the TTL of the resource type', () => {
      const store = new CacheStore();
      const issues = createCacheKey('issues', 'P');
      const projects = createCacheKey('projects', 'P');
      store.put(issues, []);
      store.put(projects, {});

      vi.advanceTimersByTime(61_000);

      expect(store.get(issues).hit).toBe(false);
      expect(store.get(projects).hit).toBe(true);
    });

    it('honours overridden TTLs', () => {
      const store = new CacheStore({ ttlPolicy: new TtlPolicy({ issues: 5 }) });
      const key = createCacheKey('issues', 'P');
      store.put(key, []);

      vi.advanceTimersByTime(5_001);

      expect(store.get(key).hit).toBe(false);
    });

    it('rejects resource types without a TTL', () => {
      const store = new CacheStore();

      const error = captureError(() => store.put(createCacheKey('widgets', 'x'), {}));

      expect(error).toBeInstanceOf(SonarError);
      expect(error).toMatchObject({
        code: SonarErrorCode.UNKNOWN_RESOURCE_TYPE,
        message: 'Unknown resource type: widgets',
      });
      expect(store.size).toBe(0);
    });
  });

  describe('LRU eviction', () => {
    it('evicts the least recently used entry once maxEntries is exceeded', () => {
      const store = new CacheStore({ maxEntries: 3 });
      const a = createCacheKey('projects', 'A');
      const b = createCacheKey('projects', 'B');
      const c = createCacheKey('projects', 'C');
      const d = createCacheKey('projects', 'D');

      store.put(a, 'a');
      store.put(b, 'b');
      store.put(c, 'c');
      store.get(a);
      store.put(d, 'd');

      expect(store.stats().evictions).toBe(1);
      expect(store.has(b)).toBe(false);
      expect(store.has(a)).toBe(true);
      expect(store.has(c)).toBe(true);
      expect(store.has(d)).toBe(true);
    });

    it('replacing an entry does not evict', () => {
      const store = new CacheStore({ maxEntries: 2 });
      const a = createCacheKey('projects', 'A');
      const b = createCacheKey('projects', 'B');

      store.put(a, 'a1');
      store.put(b, 'b');
      store.put(a, 'a2');

      expect(store.stats().evictions).toBe(0);
      expect(store.get(a)).toEqual({ hit: true, value: 'a2' });
    });
  });

  describe('invalidation', () => {
    let store: CacheStore;

    beforeEach(() => {
      store = new CacheStore();
      store.put(createCacheKey('projects', 'P'), 'project P');
      store.put(createCacheKey('issues', 'P', { ps: 100 }), 'issues P');
      store.put(createCacheKey('issues', 'ALL', { projectKeys: 'P,Q' }), 'issues P,Q');
      store.put(createCacheKey('projects', 'Q'), 'project Q');
      store.put(createCacheKey('projects', 'PX'), 'project PX');
    });

    it('removes every entry referencing the project', () => {
      expect(store.invalidatePrefix('P')).toBe(3);

      expect(store.has(createCacheKey('projects', 'P'))).toBe(false);
      expect(store.has(createCacheKey('issues', 'P', { ps: 100 }))).toBe(false);
      expect(store.has(createCacheKey('issues', 'ALL', { projectKeys: 'P,Q' }))).toBe(false);
      expect(store.has(createCacheKey('projects', 'Q'))).toBe(true);
      expect(store.has(createCacheKey('projects', 'PX'))).toBe(true);
      expect(store.stats().invalidations).toBe(3);
    });

    it('can be restricted to one resource type', () => {
      expect(store.invalidatePrefix('P', 'issues')).toBe(2);
      expect(store.has(createCacheKey('projects', 'P'))).toBe(true);
    });

    it('removes a single key', () => {
      expect(store.invalidate(createCacheKey('projects', 'Q'))).toBe(true);
      expect(store.invalidate(createCacheKey('projects', 'Q'))).toBe(false);
      expect(store.size).toBe(4);
    });

    it('clears by type and clears everything', () => {
      expect(store.clearType('issues')).toBe(2);
      expect(store.stats().entriesByType).toEqual({ projects: 3 });
      expect(store.clearAll()).toBe(3);
      expect(store.size).toBe(0);
      expect(store.stats().approximateBytes).toBe(0);
    });
  });

  it('prunes expired entries', () => {
    const store = new CacheStore();
    store.put(createCacheKey('issues', 'P'), []);
    store.put(createCacheKey('projects', 'P'), {});

    vi.advanceTimersByTime(61_000);

    expect(store.pruneExpired()).toBe(1);
    expect(store.size).toBe(1);
    expect(store.stats().expiredRemovals).toBe(1);
  });

  it('reports statistics', () => {
    const store = new CacheStore({ maxEntries: 10 });
    const key = createCacheKey('projects', 'P');

    store.get(key);
    store.put(key, { name: 'é' });
    store.get(key);
    store.get(key);
    store.get(key);

    expect(store.stats()).toEqual({
      hits: 3,
      misses: 1,
      evictions: 0,
      entryCount: 1,
      hitRatio: 0.75,
      sets: 1,
      invalidations: 0,
      expiredRemovals: 0,
      approximateBytes: Buffer.byteLength('{"name":"é"}', 'utf8'),
      maxEntries: 10,
      entriesByType: { projects: 1 },
    });
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { Errors, SonarErrorCode } from '../../errors/index.js';
import { RetryOrchestrator } from '../../retry/index.js';
import { deferred } from '../../__tests__/fixtures.js';
import { CacheCoordinator } from '../cache-coordinator.js';
import { createCacheKey } from '../cache-key.js';
import { CacheStore } from '../cache-store.js';

describe('CacheCoordinator', () => {
  let store: CacheStore;
  let coordinator: CacheCoordinator;
  const key = createCacheKey('issues', 'P', { ps: 100 });

  beforeEach(() => {
    vi.useFakeTimers();
    store = new CacheStore();
    const retry = new RetryOrchestrator({ baseDelayMs: 1000, maxDelayMs: 30000 }, { random: () => 0 });
    coordinator = new CacheCoordinator(store, retry);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs one fetch for concurrent misses and hands every caller the same value', async () => {
    const fetch = deferred<unknown>();
    const loader = vi.fn(() => fetch.promise);

    const callers = Array.from({ length: 100 }, () => coordinator.getOrFetch(key, loader));
    expect(loader).toHaveBeenCalledTimes(1);
    expect(coordinator.stats()).toEqual({
      inFlight: 1,
      waiters: 100,
      fetchesStarted: 1,
      joinedWaiters: 99,
      failedFetches: 0,
      detachedFetches: 0,
    });

    const payload = { issues: [], total: 0 };
    fetch.resolve(payload);
    const results = await Promise.all(callers);

    expect(results.every((result) => result === payload)).toBe(true);
    expect(store.get(key)).toEqual({ hit: true, value: payload });
    expect(coordinator.isInFlight(key)).toBe(false);
  });

  it('serves later callers from the store', async () => {
    const loader = vi.fn(async () => 'value');

    await coordinator.getOrFetch(key, loader);
    await expect(coordinator.getOrFetch(key, loader)).resolves.toBe('value');

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('hands every waiter the same error and caches nothing', async () => {
    const fetch = deferred<unknown>();
    const loader = vi.fn(() => fetch.promise);
    const failure = Errors.fromStatus(404, { body: { errors: [{ msg: 'Component not found' }] } });

    const callers = Array.from({ length: 3 }, () => coordinator.getOrFetch(key, loader));
    const settled = Promise.allSettled(callers);
    fetch.reject(failure);
    const results = await settled;

    for (const result of results) {
      expect(result).toEqual({ status: 'rejected', reason: failure });
    }
    expect(store.has(key)).toBe(false);
    expect(coordinator.stats().failedFetches).toBe(1);

    const retryLoader = vi.fn(async () => 'recovered');
    await expect(coordinator.getOrFetch(key, retryLoader)).resolves.toBe('recovered');
    expect(retryLoader).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures before releasing waiters', async () => {
    const loader = vi
      .fn<() => Promise<unknown>>()
      .mockRejectedValueOnce(Errors.fromStatus(503))
      .mockResolvedValueOnce('ok');

    const pending = coordinator.getOrFetch(key, loader);
    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toBe('ok');
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('lets a caller stop waiting without cancelling the shared fetch', async () => {
    const fetch = deferred<unknown>();
    const loader = vi.fn(() => fetch.promise);

    const impatient = coordinator.getOrFetch(key, loader, { waitTimeoutMs: 100 });
    const impatientResult = expect(impatient).rejects.toMatchObject({
      code: SonarErrorCode.TIMEOUT,
      message: `Timed out after 100ms waiting for ${key.id}`,
    });
    const patient = coordinator.getOrFetch(key, loader);

    await vi.advanceTimersByTimeAsync(100);
    await impatientResult;
    expect(coordinator.isInFlight(key)).toBe(true);

    fetch.resolve('late');
    await expect(patient).resolves.toBe('late');

    const lateLoader = vi.fn(async () => 'unused');
    await expect(coordinator.getOrFetch(key, lateLoader)).resolves.toBe('late');
    expect(lateLoader).not.toHaveBeenCalled();
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('stops counting a caller once its wait times out', async () => {
    const fetch = deferred<unknown>();
    const loader = vi.fn(() => fetch.promise);

    const impatient = coordinator.getOrFetch(key, loader, { waitTimeoutMs: 100 });
    const impatientResult = expect(impatient).rejects.toMatchObject({ code: SonarErrorCode.TIMEOUT });
    const patient = coordinator.getOrFetch(key, loader);
    expect(coordinator.stats()).toMatchObject({ inFlight: 1, waiters: 2, joinedWaiters: 1 });

    await vi.advanceTimersByTimeAsync(100);
    await impatientResult;
    expect(coordinator.stats()).toMatchObject({ inFlight: 1, waiters: 1, joinedWaiters: 1 });

    fetch.resolve('done');
    await expect(patient).resolves.toBe('done');
    expect(coordinator.stats()).toMatchObject({ inFlight: 0, waiters: 0 });
  });

  // ==========================================================================
  // Invalidation during a fetch
  // ==========================================================================

  it('answers the waiters of a detached fetch without storing its value', async () => {
    const first = deferred<unknown>();
    const loader = vi.fn<() => Promise<unknown>>().mockReturnValueOnce(first.promise).mockResolvedValueOnce('fresh');

    const early = coordinator.getOrFetch(key, loader);
    const joined = coordinator.getOrFetch(key, loader);

    expect(coordinator.detachWhere((candidate) => candidate.resourceId === 'P')).toBe(1);
    expect(coordinator.isInFlight(key)).toBe(false);

    const late = coordinator.getOrFetch(key, loader);
    expect(loader).toHaveBeenCalledTimes(2);
    expect(coordinator.isInFlight(key)).toBe(true);

    first.resolve('stale');
    await expect(early).resolves.toBe('stale');
    await expect(joined).resolves.toBe('stale');
    await expect(late).resolves.toBe('fresh');

    expect(store.get(key)).toEqual({ hit: true, value: 'fresh' });
    expect(coordinator.stats()).toMatchObject({ inFlight: 0, fetchesStarted: 2, detachedFetches: 1 });
  });

  it('drops a detached result that settles after the store was cleared', async () => {
    const fetch = deferred<unknown>();
    const loader = vi.fn(() => fetch.promise);

    const pending = coordinator.getOrFetch(key, loader);
    store.clearAll();
    coordinator.detachWhere(() => true);

    fetch.resolve('stale');
    await expect(pending).resolves.toBe('stale');
    expect(store.has(key)).toBe(false);
    expect(coordinator.stats()).toMatchObject({ inFlight: 0, waiters: 0 });
  });

  it('detaches only the fetches that match', async () => {
    const other = createCacheKey('projects', 'Q');
    const fetch = deferred<unknown>();
    const loader = vi.fn(() => fetch.promise);

    const pending = Promise.all([coordinator.getOrFetch(key, loader), coordinator.getOrFetch(other, loader)]);

    expect(coordinator.detachWhere((candidate) => candidate.resourceType === 'issues')).toBe(1);
    expect(coordinator.isInFlight(key)).toBe(false);
    expect(coordinator.isInFlight(other)).toBe(true);

    fetch.resolve('v');
    await pending;
    expect(store.has(key)).toBe(false);
    expect(store.has(other)).toBe(true);
  });

  it('keeps different keys independent', async () => {
    const other = createCacheKey('issues', 'Q');
    const loader = vi.fn(async () => 'v');

    await Promise.all([coordinator.getOrFetch(key, loader), coordinator.getOrFetch(other, loader)]);

    expect(loader).toHaveBeenCalledTimes(2);
    expect(coordinator.stats().fetchesStarted).toBe(2);
  });
});

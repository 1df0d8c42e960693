import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { createLogger } from '../../logging/index.js';
import { createCacheKey } from '../cache-key.js';
import { CacheStore } from '../cache-store.js';
import { CacheMaintenance } from '../maintenance.js';

describe('CacheMaintenance', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('prunes expired entries on its interval until stopped', () => {
    const store = new CacheStore();
    const maintenance = new CacheMaintenance(store, { cleanupIntervalMs: 60_000, statsIntervalMs: 0 });
    maintenance.start();
    expect(maintenance.running).toBe(true);

    store.put(createCacheKey('issues', 'P'), []);
    vi.advanceTimersByTime(120_000);
    expect(store.size).toBe(0);

    maintenance.stop();
    expect(maintenance.running).toBe(false);

    store.put(createCacheKey('issues', 'Q'), []);
    vi.advanceTimersByTime(120_000);
    expect(store.size).toBe(1);
  });

  it('logs statistics on its interval', () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: 'info',
      destination: {
        write: (line: string) => {
          lines.push(line);
        },
      },
    });
    const store = new CacheStore();
    const maintenance = new CacheMaintenance(store, { cleanupIntervalMs: 0, statsIntervalMs: 1000, logger });

    maintenance.start();
    vi.advanceTimersByTime(1000);
    maintenance.stop();

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      component: 'cache-maintenance',
      msg: 'cache statistics',
      entries: 0,
      hitRatio: 0,
    });
  });
});

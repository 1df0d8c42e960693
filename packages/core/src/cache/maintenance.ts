/**
 * Cache Maintenance
 *
 * Periodically prunes expired entries and logs cache statistics. The timers
 * are unref'd so they never keep the process alive.
 */

import { createSilentLogger, type Logger } from '../logging/index.js';

import type { CacheStore } from './cache-store.js';

export interface CacheMaintenanceOptions {
  /** 0 disables pruning */
  cleanupIntervalMs?: number | undefined;
  /** 0 disables statistics logging */
  statsIntervalMs?: number | undefined;
  logger?: Logger | undefined;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;
const DEFAULT_STATS_INTERVAL_MS = 10 * 60 * 1000;

export class CacheMaintenance {
  private readonly cleanupIntervalMs: number;
  private readonly statsIntervalMs: number;
  private readonly logger: Logger;
  private timers: NodeJS.Timeout[] = [];

  constructor(
    private readonly store: CacheStore,
    options: CacheMaintenanceOptions = {}
  ) {
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.statsIntervalMs = options.statsIntervalMs ?? DEFAULT_STATS_INTERVAL_MS;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'cache-maintenance' });
  }

  get running(): boolean {
    return this.timers.length > 0;
  }

  start(): void {
    if (this.running) return;

    if (this.cleanupIntervalMs > 0) {
      this.timers.push(setInterval(() => this.prune(), this.cleanupIntervalMs).unref());
    }
    if (this.statsIntervalMs > 0) {
      this.timers.push(setInterval(() => this.logStats(), this.statsIntervalMs).unref());
    }
  }

  stop(): void {
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
  }

  prune(): number {
    const removed = this.store.pruneExpired();
    if (removed > 0) {
      this.logger.info({ removed }, 'cleaned up expired cache entries');
    }
    return removed;
  }

  logStats(): void {
    const stats = this.store.stats();
    this.logger.info(
      {
        entries: stats.entryCount,
        hitRatio: Math.round(stats.hitRatio * 1000) / 1000,
        evictions: stats.evictions,
        approximateBytes: stats.approximateBytes,
      },
      'cache statistics'
    );
  }
}

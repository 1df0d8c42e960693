/**
 * Cache Store
 *
 * Bounded key/value table with per-resource-type TTLs.
 * - Map insertion order is the recency order: reads move an entry to the end
 * - Expired entries are misses and are removed when looked up or pruned
 * - When the table grows past `maxEntries`, the least recently used entries go,
 *   whatever their remaining TTL
 */

import { Errors } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { keyReferences } from './cache-key.js';
import { TtlPolicy } from './ttl-policy.js';

import type { CacheEntry, CacheKey, CacheLookup, CacheStats } from './types.js';

export interface CacheStoreOptions {
  maxEntries?: number | undefined;
  ttlPolicy?: TtlPolicy | undefined;
  clock?: Clock | undefined;
  logger?: Logger | undefined;
}

const DEFAULT_MAX_ENTRIES = 1000;

export class CacheStore {
  readonly maxEntries: number;
  readonly ttlPolicy: TtlPolicy;

  private readonly entries = new Map<string, CacheEntry>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private sets = 0;
  private invalidations = 0;
  private expiredRemovals = 0;
  private approximateBytes = 0;

  constructor(options: CacheStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw Errors.invalidArgument('maxEntries', 'must be a positive integer');
    }
    this.ttlPolicy = options.ttlPolicy ?? new TtlPolicy();
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'cache' });
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: CacheKey): CacheLookup {
    const entry = this.entries.get(key.id);
    if (entry === undefined) {
      this.misses++;
      return { hit: false };
    }

    const now = this.clock.now();
    if (now > entry.expiresAt) {
      this.remove(entry);
      this.expiredRemovals++;
      this.misses++;
      return { hit: false };
    }

    // Move to end (most recently used)
    this.entries.delete(key.id);
    this.entries.set(key.id, entry);
    entry.lastAccessedAt = now;
    this.hits++;
    return { hit: true, value: entry.value };
  }

  /**
   * Store a value with its type's TTL. Unknown resource types are rejected.
   */
  put(key: CacheKey, value: unknown): void {
    const ttlMs = this.ttlPolicy.ttlMsFor(key.resourceType);
    const now = this.clock.now();

    const previous = this.entries.get(key.id);
    if (previous !== undefined) {
      this.remove(previous);
    }

    const entry: CacheEntry = {
      key,
      value,
      resourceType: key.resourceType,
      createdAt: now,
      expiresAt: now + ttlMs,
      sizeEstimate: estimateSize(value),
      lastAccessedAt: now,
    };
    this.entries.set(key.id, entry);
    this.approximateBytes += entry.sizeEstimate;
    this.sets++;

    this.evictOverflow();
  }

  has(key: CacheKey): boolean {
    const entry = this.entries.get(key.id);
    return entry !== undefined && this.clock.now() <= entry.expiresAt;
  }

  invalidate(key: CacheKey): boolean {
    const entry = this.entries.get(key.id);
    if (entry === undefined) return false;
    this.remove(entry);
    this.invalidations++;
    return true;
  }

  /**
   * Remove every entry that references `resourceId`, optionally only of one type
   */
  invalidatePrefix(resourceId: string, resourceType?: string): number {
    return this.removeWhere(
      (entry) =>
        (resourceType === undefined || entry.resourceType === resourceType) &&
        keyReferences(entry.key, resourceId)
    );
  }

  clearType(resourceType: string): number {
    return this.removeWhere((entry) => entry.resourceType === resourceType);
  }

  clearAll(): number {
    const count = this.entries.size;
    this.entries.clear();
    this.approximateBytes = 0;
    this.invalidations += count;
    return count;
  }

  /**
   * Drop every expired entry now rather than on its next lookup
   */
  pruneExpired(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      if (now > entry.expiresAt) {
        this.remove(entry);
        removed++;
      }
    }
    this.expiredRemovals += removed;
    if (removed > 0) {
      this.logger.debug({ removed, remaining: this.entries.size }, 'pruned expired cache entries');
    }
    return removed;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    const entriesByType: Record<string, number> = {};
    for (const entry of this.entries.values()) {
      entriesByType[entry.resourceType] = (entriesByType[entry.resourceType] ?? 0) + 1;
    }

    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      entryCount: this.entries.size,
      hitRatio: lookups === 0 ? 0 : this.hits / lookups,
      sets: this.sets,
      invalidations: this.invalidations,
      expiredRemovals: this.expiredRemovals,
      approximateBytes: this.approximateBytes,
      maxEntries: this.maxEntries,
      entriesByType,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private remove(entry: CacheEntry): void {
    if (this.entries.delete(entry.key.id)) {
      this.approximateBytes -= entry.sizeEstimate;
    }
  }

  private removeWhere(predicate: (entry: CacheEntry) => boolean): number {
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      if (predicate(entry)) {
        this.remove(entry);
        removed++;
      }
    }
    this.invalidations += removed;
    return removed;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.values().next();
      if (oldest.done) return;
      this.remove(oldest.value);
      this.evictions++;
      this.logger.debug({ key: oldest.value.key.id }, 'evicted least recently used cache entry');
    }
  }
}

function estimateSize(value: unknown): number {
  const serialized = JSON.stringify(value);
  return typeof serialized === 'string' ? Buffer.byteLength(serialized, 'utf8') : 0;
}

/**
 * Cache types
 */

import type { NormalizedParams } from '../validation/index.js';

export interface CacheKey {
  resourceType: string;
  resourceId: string;
  params: NormalizedParams;
  /** Canonical string form, e.g. `issues:my-project?ps=100&severities=BLOCKER` */
  id: string;
}

export interface CacheEntry<T = unknown> {
  key: CacheKey;
  value: T;
  resourceType: string;
  createdAt: number;
  expiresAt: number;
  /** Approximate bytes of the serialized value */
  sizeEstimate: number;
  lastAccessedAt: number;
}

export type CacheLookup<T = unknown> = { hit: true; value: T } | { hit: false };

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  entryCount: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRatio: number;
  sets: number;
  invalidations: number;
  expiredRemovals: number;
  approximateBytes: number;
  maxEntries: number;
  entriesByType: Record<string, number>;
}

export interface CoordinatorStats {
  inFlight: number;
  /** Callers currently waiting on an in-flight fetch */
  waiters: number;
  fetchesStarted: number;
  joinedWaiters: number;
  failedFetches: number;
  /** Fetches whose key was invalidated before they settled */
  detachedFetches: number;
}

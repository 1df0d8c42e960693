export { CacheStore, type CacheStoreOptions } from './cache-store.js';
export {
  CacheCoordinator,
  type CacheCoordinatorOptions,
  type GetOrFetchOptions,
  type Loader,
} from './cache-coordinator.js';
export { CacheMaintenance, type CacheMaintenanceOptions } from './maintenance.js';
export { createCacheKey, keyReferences } from './cache-key.js';
export { TtlPolicy, DEFAULT_TTL_BY_TYPE, RESOURCE_TYPE_PATTERN } from './ttl-policy.js';
export type { CacheEntry, CacheKey, CacheLookup, CacheStats, CoordinatorStats } from './types.js';

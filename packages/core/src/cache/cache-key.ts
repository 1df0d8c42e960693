/**
 * Cache keys
 *
 * A key is the resource type, the resource id and the normalized query
 * parameters. Its string form doubles as the map key and the log label.
 */

import { normalizeParams, type QueryParams } from '../validation/index.js';

import type { CacheKey } from './types.js';

function encode(value: string): string {
  // Commas separate list values; keep them readable
  return encodeURIComponent(value).replace(/%2C/gi, ',');
}

export function createCacheKey(resourceType: string, resourceId: string, params: QueryParams = {}): CacheKey {
  const normalized = normalizeParams(params);
  const query = Object.entries(normalized)
    .map(([name, value]) => `${encode(name)}=${encode(value)}`)
    .join('&');

  return {
    resourceType,
    resourceId,
    params: normalized,
    id: query.length > 0 ? `${resourceType}:${resourceId}?${query}` : `${resourceType}:${resourceId}`,
  };
}

/**
 * Whether `resourceId` is a component of the key: the key's own id, or one
 * value of a parameter such as `component=P` or `projectKeys=P,Q`.
 */
export function keyReferences(key: CacheKey, resourceId: string): boolean {
  if (key.resourceId === resourceId) return true;
  return Object.values(key.params).some((value) => value.split(',').includes(resourceId));
}

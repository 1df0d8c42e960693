/**
 * sonar_cache_info - Cache Statistics Snapshot
 */

import { createResponseBuilder } from '../../infrastructure/index.js';

import type { CacheInfo } from 'sonargate-core';
import type { ToolHandler } from '../types.js';

export const handleCacheInfo: ToolHandler = async ({ gateway, requestId }) => {
  const info = gateway.cacheInfo();
  const { entryCount, maxEntries, hitRatio } = info.statistics;

  const builder = createResponseBuilder<CacheInfo>(requestId)
    .withSummary(
      `${entryCount}/${maxEntries} entries cached, hit ratio ${(hitRatio * 100).toFixed(1)}%`
    )
    .withData(info);

  if (entryCount >= maxEntries) {
    builder.addWarning('Cache is full; least recently used entries are being evicted');
    builder.addNextAction('Call sonar_cache_optimize to drop expired entries');
  }
  return builder.buildContent();
};

/**
 * sonar_cache_optimize - Prune Expired Entries Now
 */

import { createResponseBuilder } from '../../infrastructure/index.js';

import type { CacheOptimizationReport } from 'sonargate-core';
import type { ToolHandler } from '../types.js';

export const handleCacheOptimize: ToolHandler = async ({ gateway, requestId }) => {
  const report = gateway.optimizeCache();

  return createResponseBuilder<CacheOptimizationReport>(requestId)
    .withSummary(report.operationsPerformed.join('; '))
    .withData(report)
    .buildContent();
};

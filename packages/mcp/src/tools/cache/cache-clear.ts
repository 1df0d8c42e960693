/**
 * sonar_cache_clear - Drop Cached Entries
 */

import { z } from 'zod';

import { createResponseBuilder } from '../../infrastructure/index.js';

import type { ToolHandler } from '../types.js';

export const CacheClearArgsSchema = z.object({
  resourceType: z.string().min(1).optional(),
});

export interface CacheClearData {
  resourceType: string | null;
  removed: number;
}

export const handleCacheClear: ToolHandler = async ({ gateway, requestId }, args) => {
  const { resourceType } = CacheClearArgsSchema.parse(args);
  const removed = gateway.clearCache(resourceType);

  return createResponseBuilder<CacheClearData>(requestId)
    .withSummary(
      resourceType === undefined
        ? `Cleared ${removed} cached entries`
        : `Cleared ${removed} cached ${resourceType} entries`
    )
    .withData({ resourceType: resourceType ?? null, removed })
    .buildContent();
};

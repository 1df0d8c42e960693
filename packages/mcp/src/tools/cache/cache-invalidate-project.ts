/**
 * sonar_cache_invalidate_project - Forget Everything Cached for a Project
 *
 * Use after a change in SonarQube (new analysis, issue transition) so the
 * next read goes upstream.
 */

import { z } from 'zod';

import { createResponseBuilder } from '../../infrastructure/index.js';

import type { ToolHandler } from '../types.js';

export const CacheInvalidateProjectArgsSchema = z.object({
  projectKey: z.string().min(1),
});

export interface CacheInvalidateProjectData {
  projectKey: string;
  removed: number;
}

export const handleCacheInvalidateProject: ToolHandler = async ({ gateway, requestId }, args) => {
  const { projectKey } = CacheInvalidateProjectArgsSchema.parse(args);
  const removed = gateway.invalidateProject(projectKey);
  const key = projectKey.trim();

  return createResponseBuilder<CacheInvalidateProjectData>(requestId)
    .withSummary(`Invalidated ${removed} cached entries for ${key}`)
    .withData({ projectKey: key, removed })
    .buildContent();
};

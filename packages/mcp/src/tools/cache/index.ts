/**
 * Cache Tools
 *
 * Inspect and maintain the response cache.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const CACHE_TOOLS: Tool[] = [
  {
    name: 'sonar_cache_info',
    description:
      'Cache statistics: entries by resource type, hit ratio, evictions, in-flight fetches and the TTL configured for each resource type.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'sonar_cache_clear',
    description: 'Clear cached entries of one resource type, or the whole cache when no type is given.',
    inputSchema: {
      type: 'object',
      properties: {
        resourceType: {
          type: 'string',
          description: 'Resource type to clear (default: all)',
        },
      },
    },
  },
  {
    name: 'sonar_cache_invalidate_project',
    description:
      'Drop every cached entry that references a project, so the next read fetches fresh data. Use after an analysis or an issue change.',
    inputSchema: {
      type: 'object',
      properties: {
        projectKey: {
          type: 'string',
          description: 'SonarQube project key',
        },
      },
      required: ['projectKey'],
    },
  },
  {
    name: 'sonar_cache_optimize',
    description: 'Remove expired cache entries now and report statistics before and after.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];

export { handleCacheInfo } from './cache-info.js';
export { handleCacheClear, CacheClearArgsSchema } from './cache-clear.js';
export { handleCacheInvalidateProject, CacheInvalidateProjectArgsSchema } from './cache-invalidate-project.js';
export { handleCacheOptimize } from './cache-optimize.js';

export type { CacheClearData } from './cache-clear.js';
export type { CacheInvalidateProjectData } from './cache-invalidate-project.js';

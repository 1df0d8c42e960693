/**
 * Tool Registry
 *
 * Central registry for all MCP tools with:
 * - Tool definitions (schemas)
 * - Handler routing
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import {
  CACHE_TOOLS,
  handleCacheClear,
  handleCacheInfo,
  handleCacheInvalidateProject,
  handleCacheOptimize,
} from './cache/index.js';
import { OPERATIONS_TOOLS, handleHealth, handleRateLimitStatus, handleServerMetrics } from './operations/index.js';
import { RESOURCE_TOOLS, handleResourceGet } from './resources/index.js';

import type { ToolHandler } from './types.js';

/**
 * All registered tools
 *
 * Order matters for AI discovery: reads first, then maintenance.
 */
export const ALL_TOOLS: Tool[] = [...RESOURCE_TOOLS, ...CACHE_TOOLS, ...OPERATIONS_TOOLS];

const HANDLERS: ReadonlyMap<string, ToolHandler> = new Map([
  ['sonar_resource_get', handleResourceGet],
  ['sonar_cache_info', handleCacheInfo],
  ['sonar_cache_clear', handleCacheClear],
  ['sonar_cache_invalidate_project', handleCacheInvalidateProject],
  ['sonar_cache_optimize', handleCacheOptimize],
  ['sonar_rate_limit_status', handleRateLimitStatus],
  ['sonar_health', handleHealth],
  ['sonar_server_metrics', handleServerMetrics],
]);

export function getHandler(name: string): ToolHandler | undefined {
  return HANDLERS.get(name);
}

/**
 * MCP Tools
 */

export { ALL_TOOLS, getHandler } from './registry.js';
export type { ToolContext, ToolHandler } from './types.js';

export * from './resources/index.js';
export * from './cache/index.js';
export * from './operations/index.js';

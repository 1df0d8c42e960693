/**
 * Tool handler contract
 */

import type { SonarGateway } from 'sonargate-core';

import type { MetricsCollector, ToolResult } from '../infrastructure/index.js';

export interface ToolContext {
  gateway: SonarGateway;
  metrics: MetricsCollector;
  requestId: string;
}

/** Handlers validate their own arguments and throw on failure */
export type ToolHandler = (context: ToolContext, args: Record<string, unknown>) => Promise<ToolResult>;

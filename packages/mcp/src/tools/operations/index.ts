/**
 * Operations Tools
 *
 * Health, throttling and server metrics.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const OPERATIONS_TOOLS: Tool[] = [
  {
    name: 'sonar_rate_limit_status',
    description:
      'Outbound request budget: tokens available, capacity, refill rate, queued callers and any pause imposed by SonarQube throttling.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'sonar_health',
    description: 'Check that SonarQube is reachable and that the configured token is valid. Never cached.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'sonar_server_metrics',
    description: 'Tool call counts, error counts by code and average durations for this server.',
    inputSchema: {
      type: 'object',
      properties: {
        format: {
          type: 'string',
          enum: ['summary', 'prometheus'],
          description: 'Add Prometheus text exposition to the summary (default: summary)',
        },
      },
    },
  },
];

export { handleRateLimitStatus } from './rate-limit-status.js';
export { handleHealth } from './health.js';
export { handleServerMetrics, ServerMetricsArgsSchema } from './server-metrics.js';

export type { ServerMetricsData } from './server-metrics.js';

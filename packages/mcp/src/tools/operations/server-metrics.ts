/**
 * sonar_server_metrics - MCP Server Call Metrics
 */

import { z } from 'zod';

import { createResponseBuilder, type MetricsSummary } from '../../infrastructure/index.js';

import type { ToolHandler } from '../types.js';

export const ServerMetricsArgsSchema = z.object({
  format: z.enum(['summary', 'prometheus']).default('summary'),
});

export interface ServerMetricsData {
  summary: MetricsSummary;
  prometheus?: string | undefined;
}

export const handleServerMetrics: ToolHandler = async ({ metrics, requestId }, args) => {
  const { format } = ServerMetricsArgsSchema.parse(args);
  const summary = metrics.getSummary();
  const data: ServerMetricsData = { summary };
  if (format === 'prometheus') {
    data.prometheus = metrics.toPrometheus();
  }

  return createResponseBuilder<ServerMetricsData>(requestId)
    .withSummary(`${summary.totalRequests} tool calls, ${summary.totalErrors} errors`)
    .withData(data)
    .buildContent();
};

/**
 * MCP Infrastructure
 *
 * - Response building
 * - Structured error handling
 * - Metrics collection
 */

export {
  ResponseBuilder,
  createResponseBuilder,
  type MCPResponse,
  type MCPResponseMeta,
  type ResponseHints,
} from './response-builder.js';

export { handleError, describeError, type ToolResult, type ToolErrorBody } from './error-handler.js';

export {
  MetricsCollector,
  METRIC_NAMES,
  type MetricLabels,
  type MetricsSummary,
  type HistogramBuckets,
} from './metrics.js';

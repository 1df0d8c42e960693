/**
 * sonargate-mcp
 *
 * MCP server exposing the SonarGate data-access layer to AI agents:
 * - Cached, rate-limited SonarQube reads
 * - Cache inspection and maintenance tools
 * - Structured error responses with recovery hints
 */

export {
  createSonarGateMCPServer,
  createToolDispatcher,
  SERVER_NAME,
  type SonarGateMCPServerOptions,
  type ToolDispatcher,
} from './server.js';

export * from './tools/index.js';

export {
  ResponseBuilder,
  createResponseBuilder,
  handleError,
  describeError,
  MetricsCollector,
  METRIC_NAMES,
  type ToolResult,
  type ToolErrorBody,
  type MCPResponse,
  type MetricsSummary,
} from './infrastructure/index.js';

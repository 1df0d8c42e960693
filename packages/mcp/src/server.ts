/**
 * SonarGate MCP Server
 *
 * Exposes the gateway's cached reads and cache maintenance as MCP tools.
 * Every call is timed, counted and logged; failures become structured
 * error results with recovery hints.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { Errors, VERSION, createSilentLogger, type Logger, type SonarGateway } from 'sonargate-core';

import { MetricsCollector, describeError, handleError, type ToolResult } from './infrastructure/index.js';
import { ALL_TOOLS, getHandler } from './tools/index.js';

export interface SonarGateMCPServerOptions {
  gateway: SonarGateway;
  logger?: Logger | undefined;
  metrics?: MetricsCollector | undefined;
  now?: (() => number) | undefined;
}

export type ToolDispatcher = (name: string, args: Record<string, unknown>) => Promise<ToolResult>;

export const SERVER_NAME = 'sonargate';

export function createSonarGateMCPServer(options: SonarGateMCPServerOptions): Server {
  const server = new Server({ name: SERVER_NAME, version: VERSION }, { capabilities: { tools: {} } });
  const dispatch = createToolDispatcher(options);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: ALL_TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    return dispatch(name, args);
  });

  return server;
}

/**
 * Route a tool call to its handler. Never throws.
 */
export function createToolDispatcher(options: SonarGateMCPServerOptions): ToolDispatcher {
  const { gateway } = options;
  const metrics = options.metrics ?? new MetricsCollector();
  const logger = (options.logger ?? createSilentLogger()).child({ component: 'mcp' });
  const now = options.now ?? Date.now;
  let sequence = 0;

  return async (name, args) => {
    const requestId = `req_${now().toString(36)}_${++sequence}`;
    const startTime = now();

    try {
      const handler = getHandler(name);
      if (handler === undefined) {
        throw Errors.invalidArgument('name', `unknown tool '${name}'`);
      }

      const result = await handler({ gateway, metrics, requestId }, args);
      const durationMs = now() - startTime;
      metrics.recordRequest(name, durationMs, true);
      logger.debug({ tool: name, requestId, durationMs }, 'tool call completed');
      return result;
    } catch (error) {
      const durationMs = now() - startTime;
      const { code, message } = describeError(error);
      metrics.recordRequest(name, durationMs, false);
      metrics.recordError(name, code);
      logger.warn({ tool: name, requestId, durationMs, code, err: message }, 'tool call failed');
      return handleError(error, requestId);
    }
  };
}

#!/usr/bin/env -S node --import tsx
/**
 * SonarGate MCP Server Entry Point
 *
 * Usage:
 *   sonargate-mcp               # Configure from the environment
 *   sonargate-mcp --verbose     # Log at debug level
 *
 * MCP Config (add to mcp.json):
 * {
 *   "mcpServers": {
 *     "sonarqube": {
 *       "command": "sonargate-mcp",
 *       "env": { "SONARQUBE_URL": "https://sonar.example.com", "SONARQUBE_TOKEN": "..." }
 *     }
 *   }
 * }
 *
 * Logs go to stderr; stdout carries the MCP protocol.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SonarGateway, createLogger, loadConfigFromEnv, toSonarError } from 'sonargate-core';

import { MetricsCollector } from '../infrastructure/index.js';
import { createSonarGateMCPServer } from '../server.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const verbose = args.includes('--verbose') || args.includes('-v');

  const config = loadConfigFromEnv();
  const logger = createLogger({ level: verbose ? 'debug' : config.logLevel, name: 'sonargate-mcp' });

  const gateway = new SonarGateway({ config, logger });
  const server = createSonarGateMCPServer({ gateway, logger, metrics: new MetricsCollector() });

  gateway.start();
  await server.connect(new StdioServerTransport());
  logger.info({ baseUrl: gateway.config.baseUrl, resourceTypes: gateway.resourceTypes }, 'sonargate MCP server listening on stdio');

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, 'shutting down');
    gateway.close();
    await server.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: toSonarError(error).message }, 'shutdown failed');
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  const sonarError = toSonarError(error);
  process.stderr.write(`Failed to start SonarGate MCP server: [${sonarError.code}] ${sonarError.message}\n`);
  process.exit(1);
});

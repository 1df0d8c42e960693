/**
 * Shared test helpers: a gateway over an in-process transport
 */

import { vi } from 'vitest';
import { SonarGateway, createSilentLogger, isRecord, type HttpMethod, type RequestOptions, type Transport } from 'sonargate-core';

import type { ToolResult } from '../infrastructure/index.js';

export type TransportHandler = (method: HttpMethod, path: string, options: RequestOptions) => unknown;

export function createFakeTransport(handler: TransportHandler) {
  const call = vi.fn<Transport['call']>(async (method, path, options = {}) => ({
    status: 200,
    data: await handler(method, path, options),
    headers: { 'content-type': 'application/json' },
    durationMs: 1,
  }));
  const close = vi.fn<() => void>();
  return { call, close } satisfies Transport;
}

export function createTestGateway(transport: Transport): SonarGateway {
  return new SonarGateway({
    config: { baseUrl: 'https://sonar.test', token: 'test-secret' },
    transport,
    logger: createSilentLogger(),
  });
}

/**
 * Parse the JSON text body of a tool result
 */
export function parseResult(result: ToolResult): Record<string, unknown> {
  const first = result.content[0];
  if (first === undefined) {
    throw new Error('tool result has no content');
  }
  const parsed: unknown = JSON.parse(first.text);
  if (!isRecord(parsed)) {
    throw new Error('tool result is not a JSON object');
  }
  return parsed;
}

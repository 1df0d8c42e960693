/**
 * HTTP Transport
 *
 * Pooled keep-alive connections to SonarQube through one axios instance.
 * Every response resolves (validateStatus accepts all statuses) so that
 * classification happens in one place, below.
 */

import http from 'node:http';
import https from 'node:https';

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';

import { Errors, SonarError } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { normalizeParams } from '../validation/index.js';
import { USER_AGENT } from '../version.js';
import { normalizeBaseUrl, parseRetryAfter } from './url.js';

import type { HttpMethod, RawResponse, RequestOptions, Transport } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface HttpTransportOptions {
  baseUrl: string;
  token: string;
  /** Sent as the `organization` query parameter on every call (SonarCloud) */
  organization?: string | undefined;
  verifySsl?: boolean | undefined;
  requestTimeoutMs?: number | undefined;
  maxSockets?: number | undefined;
  logger?: Logger | undefined;
  clock?: Clock | undefined;
  /** Replaces the network layer; used by tests */
  adapter?: AxiosAdapter | undefined;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
const DEFAULT_MAX_SOCKETS = 50;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

// ============================================================================
// Transport
// ============================================================================

export class HttpTransport implements Transport {
  readonly baseUrl: string;

  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly token: string;
  private readonly organization: string | undefined;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.token = options.token;
    this.organization = options.organization;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'transport' });
    this.clock = options.clock ?? systemClock;

    const maxSockets = options.maxSockets ?? DEFAULT_MAX_SOCKETS;
    this.httpAgent = new http.Agent({ keepAlive: true, maxSockets });
    this.httpsAgent = new https.Agent({
      keepAlive: true,
      maxSockets,
      rejectUnauthorized: options.verifySsl ?? true,
    });

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: this.requestTimeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: {
        Authorization: `Bearer ${this.token}`,
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
      responseType: 'text',
      // Parsing is done here so non-JSON bodies can be kept as text
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async call(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<RawResponse> {
    const params: Record<string, string> = { ...normalizeParams(options.params) };
    if (this.organization !== undefined && params['organization'] === undefined) {
      params['organization'] = this.organization;
    }

    const startedAt = this.clock.now();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        method,
        url: path,
        params,
        data: options.body,
      });
    } catch (error) {
      const classified = this.classifyFailure(error);
      this.logger.warn(
        {
          method,
          path,
          durationMs: this.clock.now() - startedAt,
          code: classified.code,
          headers: { Authorization: `Bearer ${this.token}` },
        },
        classified.message
      );
      throw classified;
    }

    const durationMs = this.clock.now() - startedAt;
    const headers = flattenHeaders(response.headers);
    const data = parseBody(response.data, response.status);

    this.logger.debug(
      {
        method,
        path,
        status: response.status,
        durationMs,
        headers: { Authorization: `Bearer ${this.token}` },
      },
      'sonarqube request'
    );

    if (response.status >= 400) {
      throw Errors.fromStatus(response.status, {
        body: data,
        retryAfterMs: parseRetryAfter(headers['retry-after'], this.clock.now()),
        method,
        path,
      });
    }

    return { status: response.status, data, headers, durationMs };
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private classifyFailure(error: unknown): SonarError {
    if (error instanceof SonarError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
        return Errors.timeout(`Request timed out after ${this.requestTimeoutMs}ms`, error);
      }
      return Errors.network(error.message, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return Errors.network(message, error);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      flat[name.toLowerCase()] = value;
    } else if (typeof value === 'number') {
      flat[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      flat[name.toLowerCase()] = value.map(String).join(', ');
    }
  }
  return flat;
}

/**
 * JSON bodies come back parsed. Anything else is wrapped so callers always
 * receive a value they can serialize.
 */
export function parseBody(data: unknown, status: number): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  if (data.length > 0) {
    try {
      const parsed: unknown = JSON.parse(data);
      return parsed;
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
    }
  }
  return { content: data, statusCode: status };
}

/**
 * Transport types
 */

import type { QueryParams } from '../validation/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestOptions {
  params?: QueryParams | undefined;
  body?: unknown;
}

/**
 * A successful upstream response. JSON bodies arrive parsed; anything else
 * arrives as `{ content, statusCode }`.
 */
export interface RawResponse<T = unknown> {
  status: number;
  data: T;
  /** Lower-cased header names */
  headers: Record<string, string>;
  durationMs: number;
}

export interface Transport {
  /**
   * Perform one HTTP call. Never retries. Failures are thrown as SonarError.
   */
  call(method: HttpMethod, path: string, options?: RequestOptions): Promise<RawResponse>;

  /** Release pooled connections */
  close(): void;
}

/**
 * Shared test helpers: an in-process axios adapter and error capture
 */

import { vi } from 'vitest';

import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status: number;
  body?: string | undefined;
  headers?: Record<string, string> | undefined;
}

/**
 * Axios adapter answering from `handler` instead of the network
 */
export function createStubAdapter(
  handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>
) {
  return vi.fn<AxiosAdapter>(async (config) => {
    const reply = await handler(config);
    return {
      data: reply.body ?? '',
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
  });
}

export function json(status: number, payload: unknown, headers?: Record<string, string>): StubReply {
  return { status, body: JSON.stringify(payload), headers: { 'content-type': 'application/json', ...headers } };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

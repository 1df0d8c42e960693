/**
 * Identifier validation and query parameter normalization
 *
 * Two calls that mean the same request must produce the same cache key, so
 * parameters are normalized before a key is built or a request is sent.
 */

import { Errors } from '../errors/index.js';

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | readonly QueryScalar[] | null | undefined;
export type QueryParams = Readonly<Record<string, QueryValue>>;

/** Sorted by key, every value a string */
export type NormalizedParams = Readonly<Record<string, string>>;

const RESOURCE_ID_PATTERN = /^[a-zA-Z0-9_\-.:]+$/;
const MAX_RESOURCE_ID_LENGTH = 400;

const MIN_PAGE = 1;
const MIN_PAGE_SIZE = 1;
const MAX_PAGE_SIZE = 500;

/**
 * Validate a project key or component key and return it trimmed
 */
export function validateResourceId(value: string, field = 'resourceId'): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw Errors.validation(field, 'must not be empty');
  }
  if (trimmed.length > MAX_RESOURCE_ID_LENGTH) {
    throw Errors.validation(field, `must be at most ${MAX_RESOURCE_ID_LENGTH} characters`);
  }
  if (!RESOURCE_ID_PATTERN.test(trimmed)) {
    throw Errors.validation(field, 'may only contain letters, digits, and the characters _ - . :');
  }
  return trimmed;
}

function toInteger(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw Errors.validation(key, `must be an integer, got '${value}'`);
  }
  return parsed;
}

function normalizeValue(value: QueryScalar | readonly QueryScalar[]): string {
  if (Array.isArray(value)) {
    return value.map((item) => String(item).trim()).filter((item) => item.length > 0).join(',');
  }
  return String(value).trim();
}

/**
 * Trim and sort keys, drop absent values, join arrays with commas and clamp paging.
 */
export function normalizeParams(params: QueryParams = {}): NormalizedParams {
  const entries: Array<[string, string]> = [];

  for (const [rawKey, rawValue] of Object.entries(params)) {
    const key = rawKey.trim();
    if (key.length === 0 || rawValue === undefined || rawValue === null) continue;

    let value = normalizeValue(rawValue);
    if (key === 'p') {
      value = String(Math.max(MIN_PAGE, toInteger(key, value)));
    } else if (key === 'ps') {
      value = String(Math.min(MAX_PAGE_SIZE, Math.max(MIN_PAGE_SIZE, toInteger(key, value))));
    }
    entries.push([key, value]);
  }

  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

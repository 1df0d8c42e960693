/**
 * Base URL and header helpers
 */

import { Errors } from '../errors/index.js';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Normalize a SonarQube base URL so that relative API paths can be appended.
 *
 * `sonar.example.com` becomes `https://sonar.example.com/api` and
 * `http://localhost:9000/` becomes `http://localhost:9000/api`.
 */
export function normalizeBaseUrl(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw Errors.invalidConfiguration(['baseUrl: must not be empty']);
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw Errors.invalidConfiguration([
      `baseUrl: '${trimmed}' is not a valid URL (${error instanceof Error ? error.message : String(error)})`,
    ]);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw Errors.invalidConfiguration([`baseUrl: unsupported protocol '${url.protocol}'`]);
  }

  let pathname = url.pathname.replace(/\/+$/, '');
  if (!pathname.endsWith('/api')) {
    pathname = `${pathname}/api`;
  }
  url.pathname = pathname;
  url.search = '';
  url.hash = '';

  return url.toString();
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP-date
 */
export function parseRetryAfter(value: string | undefined, now: number): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

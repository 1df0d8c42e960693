/**
 * Environment configuration loader
 *
 * Reads the SONARQUBE_* and tuning variables into a raw object and hands it to
 * the schema. Malformed numbers and booleans are passed through unconverted so
 * validation reports them against the right field.
 */

import { parseGatewayConfig, type GatewayConfig } from './schema.js';

const TTL_PREFIX = 'CACHE_TTL_';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

type Env = Readonly<Record<string, string | undefined>>;

function readString(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readNumber(env: Env, name: string): number | string | undefined {
  const raw = readString(env, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isNaN(value) ? raw : value;
}

function readBoolean(env: Env, name: string): boolean | string | undefined {
  const raw = readString(env, name);
  if (raw === undefined) return undefined;
  const normalized = raw.toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return raw;
}

function scale(value: number | string | undefined, factor: number): number | string | undefined {
  return typeof value === 'number' ? value * factor : value;
}

function readTtlOverrides(env: Env): Record<string, number | string> {
  const overrides: Record<string, number | string> = {};
  for (const name of Object.keys(env)) {
    if (!name.startsWith(TTL_PREFIX)) continue;
    const value = readNumber(env, name);
    if (value === undefined) continue;
    overrides[name.slice(TTL_PREFIX.length).toLowerCase()] = value;
  }
  return overrides;
}

/**
 * Build the gateway configuration from environment variables.
 *
 * `MAX_RETRIES` counts retries after the first attempt, so the default of 2
 * gives three attempts in total. `REQUEST_TIMEOUT` is in seconds.
 */
export function loadConfigFromEnv(env: Env = process.env): GatewayConfig {
  const maxRetries = readNumber(env, 'MAX_RETRIES');

  return parseGatewayConfig({
    baseUrl: readString(env, 'SONARQUBE_URL') ?? '',
    token: readString(env, 'SONARQUBE_TOKEN') ?? '',
    organization: readString(env, 'SONARQUBE_ORGANIZATION'),
    verifySsl: readBoolean(env, 'SONARQUBE_VERIFY_SSL'),
    requestTimeoutMs: scale(readNumber(env, 'REQUEST_TIMEOUT'), 1000),
    maxSockets: readNumber(env, 'MAX_CONCURRENT_REQUESTS'),
    logLevel: readString(env, 'LOG_LEVEL')?.toLowerCase(),
    retry: {
      maxAttempts: typeof maxRetries === 'number' ? maxRetries + 1 : maxRetries,
      baseDelayMs: readNumber(env, 'RETRY_BASE_DELAY_MS'),
      maxDelayMs: readNumber(env, 'RETRY_MAX_DELAY_MS'),
    },
    rateLimit: {
      capacity: readNumber(env, 'RATE_LIMIT_CAPACITY'),
      refillRatePerSec: readNumber(env, 'RATE_LIMIT_REFILL_PER_SEC'),
      acquireTimeoutMs: readNumber(env, 'RATE_LIMIT_ACQUIRE_TIMEOUT_MS'),
    },
    cache: {
      maxEntries: readNumber(env, 'CACHE_MAX_ENTRIES'),
      ttlByType: readTtlOverrides(env),
    },
  });
}

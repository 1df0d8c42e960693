/**
 * Gateway configuration schema
 *
 * Every recognized option is enumerated here and validated once, when the
 * gateway is constructed. Unknown resource types are never defaulted: the TTL
 * table is the source of truth for what the gateway may cache.
 */

import { z } from 'zod';

import { DEFAULT_RETRYABLE_STATUS_CODES, Errors } from '../errors/index.js';
import { DEFAULT_TTL_BY_TYPE, RESOURCE_TYPE_PATTERN } from '../cache/ttl-policy.js';
import { DEFAULT_RATE_LIMIT_CONFIG } from '../rate-limit/token-bucket.js';
import { DEFAULT_RETRY_POLICY } from '../retry/retry-orchestrator.js';

export const RetryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(DEFAULT_RETRY_POLICY.maxAttempts),
    baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),
    maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
    jitterFraction: z.number().min(0).max(1).default(DEFAULT_RETRY_POLICY.jitterFraction),
    retryableStatusCodes: z
      .array(z.number().int().min(400).max(599))
      .default(() => [...DEFAULT_RETRYABLE_STATUS_CODES]),
  })
  .refine((policy) => policy.maxDelayMs >= policy.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  });

export const RateLimitConfigSchema = z.object({
  capacity: z.number().int().min(1).default(DEFAULT_RATE_LIMIT_CONFIG.capacity),
  refillRatePerSec: z.number().positive().default(DEFAULT_RATE_LIMIT_CONFIG.refillRatePerSec),
  /** How long one outbound call may wait for a token before failing */
  acquireTimeoutMs: z.number().int().min(0).default(DEFAULT_RATE_LIMIT_CONFIG.acquireTimeoutMs),
});

export const CacheConfigSchema = z.object({
  maxEntries: z.number().int().min(1).default(1000),
  /** Overrides merged over DEFAULT_TTL_BY_TYPE, in seconds */
  ttlByType: z
    .record(
      z.string().regex(RESOURCE_TYPE_PATTERN, 'resource types are lower_snake_case'),
      z.number().int().positive()
    )
    .default({})
    .transform((overrides): Record<string, number> => ({ ...DEFAULT_TTL_BY_TYPE, ...overrides })),
  /** 0 disables the periodic expired-entry sweep */
  cleanupIntervalMs: z.number().int().min(0).default(300000),
  /** 0 disables periodic statistics logging */
  statsIntervalMs: z.number().int().min(0).default(600000),
});

export const GatewayConfigSchema = z.object({
  baseUrl: z.string().trim().min(1, 'baseUrl is required'),
  token: z.string().min(1, 'token is required'),
  organization: z.string().min(1).optional(),
  verifySsl: z.boolean().default(true),
  requestTimeoutMs: z.number().int().positive().default(30000),
  maxSockets: z.number().int().positive().default(50),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  retry: RetryPolicySchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
});

export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
export type GatewayConfig = z.output<typeof GatewayConfigSchema>;
export type RetryPolicy = z.output<typeof RetryPolicySchema>;
export type RateLimitConfig = z.output<typeof RateLimitConfigSchema>;
export type CacheConfig = z.output<typeof CacheConfigSchema>;

/**
 * Validate configuration, failing with every bad field listed
 */
export function parseGatewayConfig(input: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw Errors.invalidConfiguration(issues);
  }
  return result.data;
}

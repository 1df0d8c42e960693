/**
 * sonargate-core - Resilient SonarQube data-access layer
 *
 * - Transport: pooled keep-alive HTTP client with classified failures
 * - Rate limiting: token bucket shared by all outbound calls
 * - Retry: exponential backoff driven by error classification
 * - Cache: TTL + LRU store and a singleflight coordinator
 * - Gateway: the facade MCP tool handlers call
 */

export { VERSION, USER_AGENT } from './version.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './validation/index.js';
export * from './transport/index.js';
export * from './rate-limit/index.js';
export * from './retry/index.js';
export * from './cache/index.js';
export * from './gateway/index.js';

export { systemClock, type Clock, type Cancel } from './utils/clock.js';
export { isRecord } from './utils/guards.js';

export {
  GatewayConfigSchema,
  RetryPolicySchema,
  RateLimitConfigSchema,
  CacheConfigSchema,
  parseGatewayConfig,
  type GatewayConfig,
  type GatewayConfigInput,
  type RetryPolicy,
  type RateLimitConfig,
  type CacheConfig,
} from './schema.js';

export { loadConfigFromEnv } from './loader.js';

export {
  TokenBucket,
  DEFAULT_RATE_LIMIT_CONFIG,
  type RateLimitStatus,
  type TokenBucketOptions,
} from './token-bucket.js';

/**
 * Rate Limiter
 *
 * Token bucket shared by every outbound SonarQube call. Tokens refill lazily
 * from elapsed time; callers that cannot be served wait in FIFO order until
 * enough tokens accrue or their timeout fires.
 */

import type { RateLimitConfig } from '../config/index.js';
import { Errors } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Cancel, type Clock } from '../utils/clock.js';

export const DEFAULT_RATE_LIMIT_CONFIG = {
  capacity: 100,
  refillRatePerSec: 100 / 60,
  acquireTimeoutMs: 30000,
};

export interface RateLimitStatus {
  available: number;
  capacity: number;
  refillRatePerSec: number;
  utilizationPercent: number;
  /** Callers queued for tokens */
  waiting: number;
  /** Epoch ms until which refill is suspended after an upstream 429 */
  pausedUntil: number | null;
}

export interface TokenBucketOptions {
  clock?: Clock | undefined;
  logger?: Logger | undefined;
}

interface Waiter {
  tokens: number;
  resolve: (granted: boolean) => void;
  cancelTimeout: Cancel | undefined;
}

// Fractional refill can land a hair below a whole token
const EPSILON = 1e-9;

export class TokenBucket {
  private readonly config: RateLimitConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private tokens: number;
  /** May lie in the future while refill is paused */
  private lastRefillAt: number;
  private readonly waiters: Waiter[] = [];
  private cancelDrain: Cancel | null = null;

  constructor(config: Partial<RateLimitConfig> = {}, options: TokenBucketOptions = {}) {
    this.config = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config };
    if (!Number.isInteger(this.config.capacity) || this.config.capacity < 1) {
      throw Errors.invalidArgument('capacity', 'must be a positive integer');
    }
    if (!(this.config.refillRatePerSec > 0)) {
      throw Errors.invalidArgument('refillRatePerSec', 'must be greater than 0');
    }

    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'rate-limiter' });
    this.tokens = this.config.capacity;
    this.lastRefillAt = this.clock.now();
  }

  /**
   * Take `tokens` tokens, waiting up to `timeoutMs` for them.
   * Resolves false when the wait times out; nothing is deducted in that case.
   */
  async acquire(tokens = 1, timeoutMs = this.config.acquireTimeoutMs): Promise<boolean> {
    if (!Number.isFinite(tokens) || tokens <= 0) {
      throw Errors.invalidArgument('tokens', 'must be a positive number');
    }
    if (tokens > this.config.capacity) {
      throw Errors.invalidArgument('tokens', `cannot exceed bucket capacity ${this.config.capacity}`);
    }

    this.refill(this.clock.now());

    if (this.waiters.length === 0 && this.tokens + EPSILON >= tokens) {
      this.tokens = Math.max(0, this.tokens - tokens);
      return true;
    }

    if (timeoutMs <= 0) {
      return false;
    }

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = { tokens, resolve, cancelTimeout: undefined };

      if (Number.isFinite(timeoutMs)) {
        waiter.cancelTimeout = this.clock.schedule(() => {
          const index = this.waiters.indexOf(waiter);
          if (index === -1) return;
          this.waiters.splice(index, 1);
          this.logger.debug({ tokens, timeoutMs, waiting: this.waiters.length }, 'rate limit wait timed out');
          resolve(false);
          // The head may have changed
          this.drain();
        }, timeoutMs);
      }

      this.waiters.push(waiter);
      this.logger.debug({ tokens, waiting: this.waiters.length }, 'waiting for rate limit tokens');
      this.scheduleDrain();
    });
  }

  /**
   * Empty the bucket and suspend refill for `retryAfterMs`, after the
   * upstream answered 429.
   */
  penalize(retryAfterMs: number): void {
    const now = this.clock.now();
    this.refill(now);
    this.tokens = 0;
    this.lastRefillAt = Math.max(this.lastRefillAt, now + Math.max(0, retryAfterMs));
    this.logger.warn({ retryAfterMs, pausedUntil: this.lastRefillAt }, 'upstream rate limit hit, pausing refill');
    this.rescheduleDrain();
  }

  /**
   * Restore a full bucket and lift any pause
   */
  reset(): void {
    this.tokens = this.config.capacity;
    this.lastRefillAt = this.clock.now();
    this.drain();
  }

  status(): RateLimitStatus {
    const now = this.clock.now();
    this.refill(now);
    const { capacity, refillRatePerSec } = this.config;
    return {
      available: Math.floor(this.tokens + EPSILON),
      capacity,
      refillRatePerSec,
      utilizationPercent: Math.round(((capacity - this.tokens) / capacity) * 1000) / 10,
      waiting: this.waiters.length,
      pausedUntil: this.lastRefillAt > now ? this.lastRefillAt : null,
    };
  }

  /**
   * Fail every queued caller and cancel pending timers
   */
  dispose(): void {
    this.cancelScheduledDrain();
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.cancelTimeout?.();
      waiter.resolve(false);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private refill(now: number): void {
    if (now <= this.lastRefillAt) return;
    const elapsedSec = (now - this.lastRefillAt) / 1000;
    this.tokens = Math.min(this.config.capacity, this.tokens + elapsedSec * this.config.refillRatePerSec);
    this.lastRefillAt = now;
  }

  /** Milliseconds until `tokens` tokens will be available */
  private msUntil(tokens: number): number {
    const now = this.clock.now();
    this.refill(now);
    const pause = Math.max(0, this.lastRefillAt - now);
    const deficit = tokens - this.tokens;
    if (deficit <= EPSILON) return pause;
    return pause + Math.ceil((deficit / this.config.refillRatePerSec) * 1000);
  }

  /** Serve queued callers in order while tokens last */
  private drain(): void {
    this.cancelScheduledDrain();
    this.refill(this.clock.now());

    for (let head = this.waiters[0]; head !== undefined; head = this.waiters[0]) {
      if (this.tokens + EPSILON < head.tokens) break;
      this.tokens = Math.max(0, this.tokens - head.tokens);
      this.waiters.shift();
      head.cancelTimeout?.();
      head.resolve(true);
    }

    this.scheduleDrain();
  }

  private scheduleDrain(): void {
    if (this.cancelDrain !== null) return;
    const head = this.waiters[0];
    if (head === undefined) return;
    this.cancelDrain = this.clock.schedule(() => {
      this.cancelDrain = null;
      this.drain();
    }, this.msUntil(head.tokens));
  }

  private rescheduleDrain(): void {
    this.cancelScheduledDrain();
    this.scheduleDrain();
  }

  private cancelScheduledDrain(): void {
    if (this.cancelDrain !== null) {
      this.cancelDrain();
      this.cancelDrain = null;
    }
  }
}

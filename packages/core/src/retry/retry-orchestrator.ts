/**
 * Retry Orchestrator
 *
 * Runs one operation with exponential backoff, retrying only errors whose
 * classification allows it. The outcome is returned as a value; `execute`
 * never throws.
 */

import type { RetryPolicy } from '../config/index.js';
import { DEFAULT_RETRYABLE_STATUS_CODES, SonarErrorCode, toSonarError, type SonarError } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Clock } from '../utils/clock.js';

export const DEFAULT_RETRY_POLICY = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFraction: 0.1,
  retryableStatusCodes: DEFAULT_RETRYABLE_STATUS_CODES,
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: SonarError; attempts: number };

export interface RetryOrchestratorOptions {
  clock?: Clock | undefined;
  /** Uniform in [0, 1) */
  random?: (() => number) | undefined;
  logger?: Logger | undefined;
  /** Called with the pause to apply when the upstream answers 429 */
  onRateLimited?: ((retryAfterMs: number) => void) | undefined;
}

export interface ExecuteOptions {
  /** Overrides the policy's attempt limit for this call */
  maxAttempts?: number | undefined;
  /** Included in log lines */
  label?: string | undefined;
}

export class RetryOrchestrator {
  readonly policy: RetryPolicy;

  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly onRateLimited: ((retryAfterMs: number) => void) | undefined;

  constructor(policy: Partial<RetryPolicy> = {}, options: RetryOrchestratorOptions = {}) {
    this.policy = {
      ...DEFAULT_RETRY_POLICY,
      ...policy,
      retryableStatusCodes: [...(policy.retryableStatusCodes ?? DEFAULT_RETRY_POLICY.retryableStatusCodes)],
    };
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'retry' });
    this.onRateLimited = options.onRateLimited;
  }

  async execute<T>(operation: () => Promise<T>, options: ExecuteOptions = {}): Promise<RetryOutcome<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        const value = await operation();
        return { ok: true, value, attempts: attempt };
      } catch (caught) {
        const error = toSonarError(caught);
        error.attempts = attempt;

        if (error.code === SonarErrorCode.RATE_LIMITED && error.status === 429) {
          this.onRateLimited?.(error.retryAfterMs ?? this.delayFor(attempt));
        }

        const retryable = this.isRetryable(error);
        if (!retryable || attempt >= maxAttempts) {
          this.logger.debug(
            { label: options.label, attempt, code: error.code, status: error.status },
            retryable ? 'retries exhausted' : 'non-retryable failure'
          );
          return { ok: false, error, attempts: attempt };
        }

        const delayMs =
          error.retryAfterMs !== undefined
            ? Math.min(error.retryAfterMs, this.policy.maxDelayMs)
            : this.delayFor(attempt);
        this.logger.info(
          { label: options.label, attempt, maxAttempts, delayMs, code: error.code, status: error.status },
          'retrying after failure'
        );
        await this.clock.sleep(delayMs);
      }
    }
  }

  /**
   * Upstream statuses follow the policy; everything else follows the
   * error's own classification.
   */
  isRetryable(error: SonarError): boolean {
    if (error.status !== undefined) {
      return this.policy.retryableStatusCodes.includes(error.status);
    }
    return error.retryable;
  }

  /**
   * Backoff before the attempt after `attempt`: exponential, capped, plus jitter
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitterFraction } = this.policy;
    const base = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
    return Math.round(base + this.random() * base * jitterFraction);
  }
}

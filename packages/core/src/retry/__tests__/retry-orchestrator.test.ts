import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';

import { Errors, SonarErrorCode } from '../../errors/index.js';
import { RetryOrchestrator } from '../retry-orchestrator.js';

import type { Clock } from '../../utils/clock.js';

describe('RetryOrchestrator', () => {
  let sleep: Mock<(ms: number) => Promise<void>>;
  let clock: Clock;

  beforeEach(() => {
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    clock = { now: () => 0, sleep, schedule: () => () => undefined };
  });

  it('surfaces the last error once retries are exhausted', async () => {
    const retry = new RetryOrchestrator({ maxAttempts: 3 }, { clock, random: () => 0 });
    const operation = vi.fn(async () => {
      throw Errors.fromStatus(503);
    });

    const outcome = await retry.execute(operation);

    expect(operation).toHaveBeenCalledTimes(3);
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    if (!outcome.ok) {
      expect(outcome.error.code).toBe(SonarErrorCode.UPSTREAM_SERVER_ERROR);
      expect(outcome.error.status).toBe(503);
      expect(outcome.error.attempts).toBe(3);
    }
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('does not retry fatal errors', async () => {
    const retry = new RetryOrchestrator({}, { clock, random: () => 0 });
    const operation = vi.fn(async () => {
      throw Errors.fromStatus(404);
    });

    const outcome = await retry.execute(operation);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({ ok: false, attempts: 1, error: { code: SonarErrorCode.NOT_FOUND } });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('returns the value after a transient failure', async () => {
    const retry = new RetryOrchestrator({}, { clock, random: () => 0 });
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(Errors.network('socket hang up'))
      .mockResolvedValueOnce('ok');

    await expect(retry.execute(operation)).resolves.toEqual({ ok: true, value: 'ok', attempts: 2 });
  });

  it('treats unclassified throws as fatal internal errors', async () => {
    const retry = new RetryOrchestrator({}, { clock });
    const operation = vi.fn(async () => {
      throw new TypeError('boom');
    });

    const outcome = await retry.execute(operation);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({
      ok: false,
      error: { code: SonarErrorCode.INTERNAL_ERROR, message: 'Internal error: boom' },
    });
  });

  it('follows the configured status list over the error default', async () => {
    const retry = new RetryOrchestrator({ retryableStatusCodes: [409] }, { clock, random: () => 0 });

    expect(retry.isRetryable(Errors.fromStatus(409))).toBe(true);
    expect(retry.isRetryable(Errors.fromStatus(503))).toBe(false);
    expect(retry.isRetryable(Errors.timeout('slow'))).toBe(true);
  });

  it('reports a 429 to the rate limiter and waits for Retry-After', async () => {
    const onRateLimited = vi.fn();
    const retry = new RetryOrchestrator({}, { clock, random: () => 0, onRateLimited });
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(Errors.fromStatus(429, { retryAfterMs: 5000 }))
      .mockResolvedValueOnce('ok');

    const outcome = await retry.execute(operation);

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 2 });
    expect(onRateLimited).toHaveBeenCalledWith(5000);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it('caps Retry-After at the maximum delay', async () => {
    const retry = new RetryOrchestrator({ maxDelayMs: 2000 }, { clock, random: () => 0 });
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(Errors.fromStatus(429, { retryAfterMs: 60_000 }))
      .mockResolvedValueOnce('ok');

    await retry.execute(operation);

    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('honours a per-call attempt limit', async () => {
    const retry = new RetryOrchestrator({ maxAttempts: 5 }, { clock });
    const operation = vi.fn(async () => {
      throw Errors.fromStatus(502);
    });

    const outcome = await retry.execute(operation, { maxAttempts: 1 });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(outcome.attempts).toBe(1);
  });

  describe('delayFor', () => {
    it('doubles the delay per attempt and adds jitter', () => {
      const retry = new RetryOrchestrator({ baseDelayMs: 1000, jitterFraction: 0.1 }, { random: () => 0.5 });

      expect(retry.delayFor(1)).toBe(1050);
      expect(retry.delayFor(2)).toBe(2100);
      expect(retry.delayFor(3)).toBe(4200);
    });

    it('caps the delay before adding jitter', () => {
      const retry = new RetryOrchestrator(
        { baseDelayMs: 1000, maxDelayMs: 3000, jitterFraction: 0.1 },
        { random: () => 0.5 }
      );

      expect(retry.delayFor(5)).toBe(3150);
    });
  });
});

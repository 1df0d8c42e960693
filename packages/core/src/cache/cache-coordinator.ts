/**
 * Cache Coordinator
 *
 * At most one upstream fetch per cache key. The first miss starts the fetch;
 * every concurrent miss for the same key waits on that fetch and receives the
 * same outcome. A successful value is stored before any waiter is released;
 * failures are handed to the waiters and never stored.
 *
 * Invalidating a key detaches its in-flight fetch: callers already waiting
 * still receive its outcome, later callers start a fresh fetch, and the
 * detached result is not stored.
 *
 * The in-flight table is only touched in synchronous code, so the
 * check-then-insert below cannot interleave with another caller.
 */

import { Errors, toSonarError } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Cancel, type Clock } from '../utils/clock.js';

import type { RetryOrchestrator, RetryOutcome } from '../retry/index.js';
import type { CacheStore } from './cache-store.js';
import type { CacheKey, CoordinatorStats } from './types.js';

export type Loader = () => Promise<unknown>;

export interface GetOrFetchOptions {
  /** Give up waiting after this long. The fetch itself keeps running. */
  waitTimeoutMs?: number | undefined;
}

export interface CacheCoordinatorOptions {
  clock?: Clock | undefined;
  logger?: Logger | undefined;
}

interface FlightState {
  /** Callers still waiting on the outcome */
  waiters: number;
  /** Set once the key was invalidated; the result is then not stored */
  detached: boolean;
}

interface InFlightRequest {
  key: CacheKey;
  startedAt: number;
  state: FlightState;
  /** Never rejects */
  outcome: Promise<RetryOutcome<unknown>>;
}

export class CacheCoordinator {
  private readonly inFlight = new Map<string, InFlightRequest>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  private fetchesStarted = 0;
  private joinedWaiters = 0;
  private failedFetches = 0;
  private detachedFetches = 0;

  constructor(
    private readonly store: CacheStore,
    private readonly retry: RetryOrchestrator,
    options: CacheCoordinatorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'coordinator' });
  }

  /**
   * Return the cached value for `key`, fetching it with `loader` on a miss.
   * Throws the classified error when the fetch fails.
   */
  async getOrFetch(key: CacheKey, loader: Loader, options: GetOrFetchOptions = {}): Promise<unknown> {
    const cached = this.store.get(key);
    if (cached.hit) {
      return cached.value;
    }

    let flight = this.inFlight.get(key.id);
    if (flight !== undefined) {
      flight.state.waiters++;
      this.joinedWaiters++;
      this.logger.debug({ key: key.id, waiters: flight.state.waiters }, 'joined in-flight fetch');
    } else {
      flight = this.startFetch(key, loader);
    }

    const outcome = await this.waitFor(flight, options.waitTimeoutMs);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  isInFlight(key: CacheKey): boolean {
    return this.inFlight.has(key.id);
  }

  /**
   * Detach every in-flight fetch whose key matches. Returns how many were detached.
   */
  detachWhere(predicate: (key: CacheKey) => boolean): number {
    let detached = 0;
    for (const [id, flight] of [...this.inFlight]) {
      if (predicate(flight.key)) {
        flight.state.detached = true;
        this.inFlight.delete(id);
        detached++;
      }
    }
    if (detached > 0) {
      this.detachedFetches += detached;
      this.logger.debug({ detached }, 'detached invalidated in-flight fetches');
    }
    return detached;
  }

  stats(): CoordinatorStats {
    let waiters = 0;
    for (const flight of this.inFlight.values()) {
      waiters += flight.state.waiters;
    }
    return {
      inFlight: this.inFlight.size,
      waiters,
      fetchesStarted: this.fetchesStarted,
      joinedWaiters: this.joinedWaiters,
      failedFetches: this.failedFetches,
      detachedFetches: this.detachedFetches,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private startFetch(key: CacheKey, loader: Loader): InFlightRequest {
    const state: FlightState = { waiters: 1, detached: false };
    const flight: InFlightRequest = {
      key,
      startedAt: this.clock.now(),
      state,
      outcome: this.runFetch(key, loader, state),
    };
    this.inFlight.set(key.id, flight);
    this.fetchesStarted++;
    return flight;
  }

  private async runFetch(key: CacheKey, loader: Loader, state: FlightState): Promise<RetryOutcome<unknown>> {
    const startedAt = this.clock.now();
    try {
      const outcome = await this.retry.execute(loader, { label: key.id });

      if (!outcome.ok) {
        this.failedFetches++;
        this.logger.warn(
          { key: key.id, attempts: outcome.attempts, code: outcome.error.code, durationMs: this.clock.now() - startedAt },
          'fetch failed'
        );
        return outcome;
      }

      if (state.detached) {
        this.logger.debug({ key: key.id, waiters: state.waiters }, 'dropped result of invalidated fetch');
        return outcome;
      }

      try {
        this.store.put(key, outcome.value);
      } catch (error) {
        this.failedFetches++;
        return { ok: false, error: toSonarError(error), attempts: outcome.attempts };
      }

      this.logger.debug({ key: key.id, attempts: outcome.attempts, durationMs: this.clock.now() - startedAt }, 'fetched');
      return outcome;
    } finally {
      // The await above guarantees startFetch registered the entry first.
      // A detached flight may already have been replaced under the same key.
      if (this.inFlight.get(key.id)?.state === state) {
        this.inFlight.delete(key.id);
      }
    }
  }

  private async waitFor(flight: InFlightRequest, waitTimeoutMs: number | undefined): Promise<RetryOutcome<unknown>> {
    if (waitTimeoutMs === undefined) {
      return flight.outcome;
    }

    let cancel: Cancel = () => undefined;
    const timeout = new Promise<never>((_, reject) => {
      cancel = this.clock.schedule(() => {
        flight.state.waiters--;
        this.logger.debug(
          { key: flight.key.id, waitTimeoutMs, waiters: flight.state.waiters },
          'caller stopped waiting for fetch'
        );
        reject(Errors.waitTimeout(flight.key.id, waitTimeoutMs));
      }, waitTimeoutMs);
    });

    try {
      return await Promise.race([flight.outcome, timeout]);
    } finally {
      cancel();
    }
  }
}

/**
 * Clock
 *
 * Time source injected into every component that reads the time or waits.
 * The system clock defers to the globals at call time, so tests can drive it
 * with fake timers.
 */

/** Cancels a scheduled callback. Calling it after the callback ran is a no-op. */
export type Cancel = () => void;

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolve after `ms` milliseconds */
  sleep(ms: number): Promise<void>;
  /** Run `callback` once after `ms` milliseconds */
  schedule(callback: () => void, ms: number): Cancel;
}

export const systemClock: Clock = {
  now: () => Date.now(),

  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),

  schedule: (callback, ms) => {
    const timer = setTimeout(callback, Math.max(0, ms));
    return () => clearTimeout(timer);
  },
};

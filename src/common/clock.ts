/**
 * Time source shared by every admission component.
 *
 * Injected rather than read from `Date.now()` directly so that window
 * arithmetic, breaker timeouts and counter expiry can be driven by tests.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch. */
  now(): number;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => Date.now(),
};

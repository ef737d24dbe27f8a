/**
 * Rate Limiting Strategies
 * Pure implementations of the four admission algorithms. Each one maps the
 * stored counter state, the rule and the current time to a decision and,
 * when the request is admitted, the next state. Persisting that state
 * atomically is the counter store's job.
 */

import {
  StateCodec,
  jsonCodec,
} from '../counter-store/counter-store.interface';
import { RateLimitAlgorithm, RateLimitRule } from '../rules/rule.types';

/**
 * Algorithm verdict for one evaluation
 */
export interface StrategyOutcome {
  allowed: boolean;
  /** Permits still available after this evaluation. */
  remaining: number;
  /** Epoch ms at which the counter is back to its full allowance. */
  resetAt: number;
  /** Null when allowed, or when waiting would never help. */
  retryAfterMs: number | null;
}

export interface StrategyStep<S> {
  outcome: StrategyOutcome;
  /** Present only when the request was admitted. */
  next?: S;
}

export interface RateLimitStrategy<S> {
  readonly codec: StateCodec<S>;
  /** How long idle state must be kept before it can be forgotten. */
  ttlMs(rule: RateLimitRule): number;
  apply(
    state: S | null,
    rule: RateLimitRule,
    now: number,
    permits: number,
  ): StrategyStep<S>;
}

export interface FixedWindowState {
  windowStart: number;
  count: number;
}

export interface SlidingWindowState {
  windowStart: number;
  current: number;
  previous: number;
}

export interface TokenBucketState {
  tokens: number;
  lastRefillAt: number;
}

export interface LeakyBucketState {
  level: number;
  lastDrainAt: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function alignWindow(now: number, windowMs: number): number {
  return Math.floor(now / windowMs) * windowMs;
}

/**
 * Permits the rule can ever grant at once.
 */
export function ruleCapacity(rule: RateLimitRule): number {
  return rule.algorithm === RateLimitAlgorithm.TOKEN_BUCKET ||
    rule.algorithm === RateLimitAlgorithm.LEAKY_BUCKET
    ? rule.burst
    : rule.limit;
}

function windowTtl(rule: RateLimitRule): number {
  return 2 * rule.windowMs;
}

/**
 * Buckets need their state until they would have refilled (or drained)
 * completely, which can take longer than two windows when burst > 2 × limit.
 */
function bucketTtl(rule: RateLimitRule): number {
  const drainMs =
    rule.limit > 0 ? Math.ceil((rule.burst * rule.windowMs) / rule.limit) : 0;
  return Math.max(2 * rule.windowMs, drainMs);
}

/**
 * Fixed Window Strategy
 * One counter per aligned window. Can admit up to 2 × limit across a window
 * boundary.
 */
export const fixedWindowStrategy: RateLimitStrategy<FixedWindowState> = {
  codec: jsonCodec(
    (value): value is FixedWindowState =>
      isRecord(value) && isCount(value.windowStart) && isCount(value.count),
  ),
  ttlMs: windowTtl,

  apply(state, rule, now, permits) {
    const aligned = alignWindow(now, rule.windowMs);
    // A window stored ahead of the local clock (skew) is the current one.
    const window =
      state && state.windowStart >= aligned
        ? state
        : { windowStart: aligned, count: 0 };
    const resetAt = window.windowStart + rule.windowMs;
    const count = window.count + permits;

    if (count > rule.limit) {
      return {
        outcome: {
          allowed: false,
          remaining: Math.max(0, rule.limit - window.count),
          resetAt,
          retryAfterMs: permits > rule.limit ? null : resetAt - now,
        },
      };
    }

    return {
      outcome: {
        allowed: true,
        remaining: rule.limit - count,
        resetAt,
        retryAfterMs: null,
      },
      next: { windowStart: window.windowStart, count },
    };
  },
};

/**
 * Sliding Window Counter Strategy
 * Weights the previous window's count by how much of it still overlaps the
 * sliding interval. Since `current` never exceeds the limit, no interval of
 * one window length admits more than 2 × limit.
 */
export const slidingWindowStrategy: RateLimitStrategy<SlidingWindowState> = {
  codec: jsonCodec(
    (value): value is SlidingWindowState =>
      isRecord(value) &&
      isCount(value.windowStart) &&
      isCount(value.current) &&
      isCount(value.previous),
  ),
  ttlMs: windowTtl,

  apply(state, rule, now, permits) {
    const W = rule.windowMs;
    const window = rollSlidingWindow(state, alignWindow(now, W), W);
    const elapsed = Math.min(W, Math.max(0, now - window.windowStart));
    const estimate = (window.previous * (W - elapsed)) / W + window.current;
    const resetAt = window.windowStart + W;

    if (estimate + permits > rule.limit) {
      return {
        outcome: {
          allowed: false,
          remaining: Math.max(0, Math.floor(rule.limit - estimate)),
          resetAt,
          retryAfterMs:
            permits > rule.limit
              ? null
              : slidingRetryAfter(window, rule.limit, W, now, permits),
        },
      };
    }

    const current = window.current + permits;
    return {
      outcome: {
        allowed: true,
        remaining: Math.max(0, Math.floor(rule.limit - estimate - permits)),
        resetAt,
        retryAfterMs: null,
      },
      next: { windowStart: window.windowStart, current, previous: window.previous },
    };
  },
};

function rollSlidingWindow(
  state: SlidingWindowState | null,
  aligned: number,
  windowMs: number,
): SlidingWindowState {
  if (!state) {
    return { windowStart: aligned, current: 0, previous: 0 };
  }
  if (state.windowStart >= aligned) {
    return state;
  }
  if (state.windowStart === aligned - windowMs) {
    return { windowStart: aligned, current: 0, previous: state.current };
  }
  return { windowStart: aligned, current: 0, previous: 0 };
}

/**
 * Earliest time at which `permits` more would fit, assuming no other traffic:
 * either later in this window, as the previous window's weight decays, or
 * in the next window once `current` has become `previous`.
 */
function slidingRetryAfter(
  window: SlidingWindowState,
  limit: number,
  W: number,
  now: number,
  permits: number,
): number {
  const headroom = limit - window.current - permits;
  let at: number;
  if (headroom >= 0) {
    at = window.windowStart + W * (1 - headroom / window.previous);
  } else {
    const carried = W * (1 - (limit - permits) / window.current);
    at = window.windowStart + W + Math.max(0, carried);
  }
  return Math.max(1, Math.ceil(at - now));
}

/**
 * Token Bucket Strategy
 * Starts full at `burst` tokens and refills at limit / window.
 */
export const tokenBucketStrategy: RateLimitStrategy<TokenBucketState> = {
  codec: jsonCodec(
    (value): value is TokenBucketState =>
      isRecord(value) && isCount(value.tokens) && isCount(value.lastRefillAt),
  ),
  ttlMs: bucketTtl,

  apply(state, rule, now, permits) {
    const capacity = rule.burst;
    const W = rule.windowMs;
    let tokens = capacity;
    let lastRefillAt = now;
    if (state) {
      const elapsed = Math.max(0, now - state.lastRefillAt);
      tokens = Math.min(capacity, state.tokens + (elapsed * rule.limit) / W);
      lastRefillAt = Math.max(state.lastRefillAt, now);
    }

    if (tokens < permits) {
      return {
        outcome: {
          allowed: false,
          remaining: Math.floor(tokens),
          resetAt: now + Math.ceil(((capacity - tokens) * W) / rule.limit),
          retryAfterMs:
            permits > capacity
              ? null
              : Math.max(1, Math.ceil(((permits - tokens) * W) / rule.limit)),
        },
      };
    }

    const left = Math.max(0, tokens - permits);
    return {
      outcome: {
        allowed: true,
        remaining: Math.floor(left),
        resetAt: now + Math.ceil(((capacity - left) * W) / rule.limit),
        retryAfterMs: null,
      },
      next: { tokens: left, lastRefillAt },
    };
  },
};

/**
 * Leaky Bucket Strategy
 * A queue of capacity `burst` draining at limit / window.
 */
export const leakyBucketStrategy: RateLimitStrategy<LeakyBucketState> = {
  codec: jsonCodec(
    (value): value is LeakyBucketState =>
      isRecord(value) && isCount(value.level) && isCount(value.lastDrainAt),
  ),
  ttlMs: bucketTtl,

  apply(state, rule, now, permits) {
    const capacity = rule.burst;
    const W = rule.windowMs;
    let level = 0;
    let lastDrainAt = now;
    if (state) {
      const elapsed = Math.max(0, now - state.lastDrainAt);
      level = Math.max(0, state.level - (elapsed * rule.limit) / W);
      lastDrainAt = Math.max(state.lastDrainAt, now);
    }

    if (level + permits > capacity) {
      return {
        outcome: {
          allowed: false,
          remaining: Math.max(0, Math.floor(capacity - level)),
          resetAt: now + Math.ceil((level * W) / rule.limit),
          retryAfterMs:
            permits > capacity
              ? null
              : Math.max(
                  1,
                  Math.ceil(((level + permits - capacity) * W) / rule.limit),
                ),
        },
      };
    }

    const filled = level + permits;
    return {
      outcome: {
        allowed: true,
        remaining: Math.max(0, Math.floor(capacity - filled)),
        resetAt: now + Math.ceil((filled * W) / rule.limit),
        retryAfterMs: null,
      },
      next: { level: filled, lastDrainAt },
    };
  },
};

import { BlockList } from 'net';

/**
 * Compiled, immutable rule model. Instances are produced by the rule store
 * from a validated rules document and never mutated afterwards.
 */

import type { KeyTemplate } from './key-template';

export enum RateLimitAlgorithm {
  FIXED_WINDOW = 'fixed_window',
  SLIDING_WINDOW = 'sliding_window',
  TOKEN_BUCKET = 'token_bucket',
  LEAKY_BUCKET = 'leaky_bucket',
}

/**
 * Which requests a rate-limit rule applies to. Empty lists match everything.
 */
export interface RuleSelector {
  readonly routes: readonly string[];
  readonly methods: readonly string[];
  readonly backends: readonly string[];
}

export interface RateLimitRule {
  readonly id: string;
  readonly key: KeyTemplate;
  /** Used when `key` cannot be resolved for a request. */
  readonly fallback: KeyTemplate;
  readonly algorithm: RateLimitAlgorithm;
  readonly limit: number;
  readonly windowMs: number;
  /** Capacity for token and leaky buckets. */
  readonly burst: number;
  readonly match: RuleSelector;
}

export enum SlidingWindowType {
  COUNT = 'count',
  TIME = 'time',
}

export interface CircuitBreakerConfig {
  readonly backendId: string;
  /** Failure ratio (0-1) above which a closed breaker opens. */
  readonly failureRateThreshold: number;
  readonly slidingWindowType: SlidingWindowType;
  /** Calls for count windows, seconds for time windows. */
  readonly slidingWindowSize: number;
  readonly minimumNumberOfCalls: number;
  readonly waitDurationOpenMs: number;
  readonly halfOpenPermittedCalls: number;
  readonly halfOpenSuccessThreshold: number;
  /** 0 keeps a half-open breaker waiting for its probes indefinitely. */
  readonly maxWaitInHalfOpenMs: number;
}

export type CircuitBreakerDefaults = Omit<CircuitBreakerConfig, 'backendId'>;

export enum WafAction {
  BLOCK = 'block',
  ALLOW = 'allow',
  LOG = 'log',
}

export enum WafSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export type PathMatchMode = 'exact' | 'prefix' | 'regex';

export type WafMatcher =
  | {
      readonly type: 'path';
      readonly mode: PathMatchMode;
      readonly pattern: string;
      readonly regex: RegExp | null;
    }
  | {
      readonly type: 'header';
      readonly name: string;
      readonly operator: 'equals' | 'contains';
      readonly value: string;
      readonly ignoreCase: boolean;
    }
  | { readonly type: 'body'; readonly regex: RegExp }
  | {
      readonly type: 'ip';
      /** Entries as written: exact addresses or CIDR ranges. */
      readonly addresses: readonly string[];
      readonly list: BlockList;
      /** Match clients outside the list instead of inside it. */
      readonly invert: boolean;
    }
  | { readonly type: 'rate'; readonly ruleId: string | null }
  | { readonly type: 'all'; readonly matchers: readonly WafMatcher[] }
  | { readonly type: 'any'; readonly matchers: readonly WafMatcher[] };

export interface WafRule {
  readonly id: string;
  readonly priority: number;
  /** Position in the source document; breaks priority ties. */
  readonly order: number;
  readonly action: WafAction;
  readonly severity: WafSeverity;
  readonly matcher: WafMatcher;
  readonly rateDerived: boolean;
}

export interface RuleSnapshot {
  readonly version: string;
  readonly loadedAt: number;
  readonly source: string;
  readonly rateLimits: readonly RateLimitRule[];
  readonly circuitBreakers: ReadonlyMap<string, CircuitBreakerConfig>;
  /** Sorted by (priority, order). */
  readonly wafRules: readonly WafRule[];
  readonly hasRateDerivedWafRules: boolean;
}

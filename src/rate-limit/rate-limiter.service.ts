import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import {
  COUNTER_STORE,
  CounterStore,
  StateCodec,
} from '../counter-store/counter-store.interface';
import { RequestContext } from '../admission/request-context';
import { AdmissionMetricsService } from '../metrics/admission-metrics.service';
import { RateLimitAlgorithm, RateLimitRule } from '../rules/rule.types';
import {
  RateLimitStrategy,
  StrategyOutcome,
  fixedWindowStrategy,
  leakyBucketStrategy,
  ruleCapacity,
  slidingWindowStrategy,
  tokenBucketStrategy,
} from './rate-limit-strategies';

export const GLOBAL_SCOPE = 'global';

/**
 * Keys resolved from the rule's own template and keys from a fallback scope
 * live in separate namespaces, so an identity value that spells out a scope
 * (`route:/orders`, `global`) never lands in the bucket shared by
 * unidentified traffic.
 */
export const IDENTITY_KEY_TAG = 'id:';
export const SCOPE_KEY_TAG = 'scope:';

export interface RateLimitDecision extends StrategyOutcome {
  ruleId: string;
  key: string;
  limit: number;
}

export interface EvaluateOptions {
  signal?: AbortSignal;
}

/** Deletion needs no decoding; any stored value is replaced by nothing. */
const opaqueCodec: StateCodec<string> = {
  encode: (state) => state,
  decode: (raw) => raw,
};

@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);

  constructor(
    @Inject(COUNTER_STORE) private readonly store: CounterStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
    private readonly metrics: AdmissionMetricsService,
  ) {}

  /**
   * Derives the limiting key for `rule`, falling back to the rule's scope
   * and then to a single global bucket. Never returns "no key": a request
   * missing an identity is limited more coarsely, not exempted. The result
   * carries its source tag and is the key the admin reset endpoint takes.
   */
  deriveKey(rule: RateLimitRule, context: RequestContext): string {
    const cached = context.derivedKeys.get(rule.id);
    if (cached !== undefined) {
      return cached;
    }

    const resolved = rule.key.resolve(context);
    let key: string;
    if (resolved !== null) {
      key = IDENTITY_KEY_TAG + resolved;
    } else {
      key = SCOPE_KEY_TAG + (rule.fallback.resolve(context) ?? GLOBAL_SCOPE);
      this.logger.debug(
        `Rule ${rule.id}: ${rule.key.source} unresolved, using ${key}`,
      );
    }
    context.derivedKeys.set(rule.id, key);
    return key;
  }

  storageKey(ruleId: string, derivedKey: string): string {
    return `${this.options.counterStore.keyPrefix}${ruleId}:${derivedKey}`;
  }

  /**
   * Evaluates and, when admitted, consumes `permits` from the counter for
   * (rule, derivedKey) in one atomic store update. Counter store faults
   * propagate as `CounterStoreError`.
   */
  async evaluate(
    rule: RateLimitRule,
    derivedKey: string,
    permits = 1,
    options: EvaluateOptions = {},
  ): Promise<RateLimitDecision> {
    const now = this.clock.now();
    const key = this.storageKey(rule.id, derivedKey);

    if (rule.limit === 0) {
      this.metrics.recordRateLimit(rule.id, false);
      return {
        ruleId: rule.id,
        key: derivedKey,
        limit: 0,
        allowed: false,
        remaining: 0,
        resetAt: now,
        retryAfterMs: null,
      };
    }

    const outcome = await this.dispatch(rule, key, permits, options);
    this.metrics.recordRateLimit(rule.id, outcome.allowed);

    return {
      ...outcome,
      ruleId: rule.id,
      key: derivedKey,
      limit: ruleCapacity(rule),
    };
  }

  /**
   * Forgets the counter for (rule, derivedKey); the next request starts
   * from a fresh window or a full bucket.
   */
  async reset(ruleId: string, derivedKey: string): Promise<void> {
    const key = this.storageKey(ruleId, derivedKey);
    await this.store.atomicUpdate(key, 1, opaqueCodec, () => ({
      state: null,
      result: undefined,
    }));
    this.logger.log(`Rate limit counter reset: ${key}`);
  }

  private run<S>(
    strategy: RateLimitStrategy<S>,
    rule: RateLimitRule,
    key: string,
    permits: number,
    options: EvaluateOptions,
  ): Promise<StrategyOutcome> {
    return this.store.atomicUpdate(
      key,
      strategy.ttlMs(rule),
      strategy.codec,
      (current) => {
        // Read the clock inside the transition so a CAS retry sees fresh time.
        const step = strategy.apply(current, rule, this.clock.now(), permits);
        return { state: step.next, result: step.outcome };
      },
      { signal: options.signal },
    );
  }

  private dispatch(
    rule: RateLimitRule,
    key: string,
    permits: number,
    options: EvaluateOptions,
  ): Promise<StrategyOutcome> {
    switch (rule.algorithm) {
      case RateLimitAlgorithm.FIXED_WINDOW:
        return this.run(fixedWindowStrategy, rule, key, permits, options);
      case RateLimitAlgorithm.SLIDING_WINDOW:
        return this.run(slidingWindowStrategy, rule, key, permits, options);
      case RateLimitAlgorithm.TOKEN_BUCKET:
        return this.run(tokenBucketStrategy, rule, key, permits, options);
      case RateLimitAlgorithm.LEAKY_BUCKET:
        return this.run(leakyBucketStrategy, rule, key, permits, options);
    }
  }
}

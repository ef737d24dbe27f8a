import { Inject, Injectable, Logger } from '@nestjs/common';
import { performance } from 'perf_hooks';
import { CircuitBreakerRegistry } from '../circuit-breaker/circuit-breaker.registry';
import {
  AdmissionCancelledError,
  CounterStoreError,
} from '../common/errors';
import { withTimeout } from '../common/with-timeout';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import { AdmissionMetricsService } from '../metrics/admission-metrics.service';
import {
  RateLimitDecision,
  RateLimiterService,
} from '../rate-limit/rate-limiter.service';
import { selectorMatches } from '../rules/rule-selector';
import { RuleStoreService } from '../rules/rule-store.service';
import { RuleSnapshot } from '../rules/rule.types';
import { WafEngineService, WafEvaluation } from '../waf/waf-engine.service';
import { RequestContext } from './request-context';
import {
  DegradedInfo,
  RateLimitSummary,
  Verdict,
  createVerdict,
} from './verdict';

function summarize(decision: RateLimitDecision): RateLimitSummary {
  return {
    ruleId: decision.ruleId,
    key: decision.key,
    limit: decision.limit,
    remaining: decision.remaining,
    resetAt: decision.resetAt,
  };
}

/**
 * Runs WAF, rate limiting and the circuit breaker, in that order, and stops
 * at the first denial. Decision outcomes are returned as verdicts; only
 * cancellation and unexpected errors are thrown.
 */
@Injectable()
export class AdmissionControllerService {
  private readonly logger = new Logger(AdmissionControllerService.name);

  constructor(
    private readonly ruleStore: RuleStoreService,
    private readonly waf: WafEngineService,
    private readonly rateLimiter: RateLimiterService,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly metrics: AdmissionMetricsService,
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
  ) {}

  async admit(context: RequestContext): Promise<Verdict> {
    const started = performance.now();
    try {
      const verdict = await this.decide(context, this.ruleStore.current());
      this.metrics.recordDecision(verdict.outcome, performance.now() - started);
      return verdict;
    } catch (error) {
      if (error instanceof AdmissionCancelledError) {
        this.metrics.recordDecision('cancelled', performance.now() - started);
      }
      throw error;
    }
  }

  /**
   * Reports the result of a downstream call admitted for `backendId`.
   */
  recordOutcome(backendId: string, success: boolean): void {
    this.breakers.recordOutcome(backendId, success, this.ruleStore.current());
  }

  private async decide(
    context: RequestContext,
    snapshot: RuleSnapshot,
  ): Promise<Verdict> {
    const rulesVersion = snapshot.version;

    this.throwIfCancelled(context, 'waf');
    const screening = this.waf.evaluate(context, snapshot);
    this.recordWafMatches(screening);
    if (screening.verdict === 'block' && screening.matchedRule) {
      this.logger.warn(
        `WAF rule ${screening.matchedRule.id} (${screening.matchedRule.severity}) blocked ${context.method} ${context.route}`,
      );
      return createVerdict({
        outcome: 'waf_blocked',
        matchedRuleId: screening.matchedRule.id,
        wafLogged: screening.logged,
        rulesVersion,
      });
    }

    let rateLimit: RateLimitSummary | null = null;
    let degraded: DegradedInfo | null = null;

    for (const rule of snapshot.rateLimits) {
      if (!selectorMatches(rule.match, context)) {
        continue;
      }
      this.throwIfCancelled(context, 'rate limiting');

      const key = this.rateLimiter.deriveKey(rule, context);
      let decision: RateLimitDecision;
      try {
        decision = await withTimeout(
          this.rateLimiter.evaluate(rule, key, 1, { signal: context.signal }),
          this.options.counterStore.timeoutMs,
        );
      } catch (error) {
        if (!(error instanceof CounterStoreError)) {
          throw error;
        }
        degraded = {
          dependency: 'counter_store',
          reason: error.reason,
          policy: this.options.failPolicy,
        };
        this.metrics.recordDependencyFault(
          degraded.dependency,
          degraded.reason,
          degraded.policy,
        );
        this.logger.error(
          `Counter store fault on rule ${rule.id} (${error.reason}), failing ${this.options.failPolicy}: ${error.message}`,
        );
        if (this.options.failPolicy === 'closed') {
          return createVerdict({
            outcome: 'dependency_fault',
            matchedRuleId: rule.id,
            degraded,
            wafLogged: screening.logged,
            rulesVersion,
          });
        }
        // Fail open: the remaining rate rules share the same store.
        break;
      }
      this.throwIfCancelled(context, 'rate limiting');

      rateLimit = summarize(decision);
      if (!decision.allowed) {
        return this.rateLimited(context, snapshot, decision, screening);
      }
    }

    if (context.backendId) {
      this.throwIfCancelled(context, 'circuit breaker');
      const permission = this.breakers.beforeCall(context.backendId, snapshot);
      if (!permission.permitted) {
        return createVerdict({
          outcome: 'circuit_open',
          retryAfterMs: permission.retryAfterMs,
          matchedRuleId: context.backendId,
          rateLimit,
          degraded,
          wafLogged: screening.logged,
          rulesVersion,
        });
      }
    }

    return createVerdict({
      outcome: 'allow',
      matchedRuleId: screening.matchedRule?.id ?? null,
      rateLimit,
      degraded,
      wafLogged: screening.logged,
      rulesVersion,
    });
  }

  /**
   * A rate denial gets a second WAF pass with the rate signal, so rules
   * such as "rate limited and suspicious header" can escalate it to a block.
   */
  private rateLimited(
    context: RequestContext,
    snapshot: RuleSnapshot,
    decision: RateLimitDecision,
    screening: WafEvaluation,
  ): Verdict {
    const rateLimit = summarize(decision);
    let wafLogged = screening.logged;

    if (snapshot.hasRateDerivedWafRules) {
      const escalation = this.waf.evaluate(context, snapshot, {
        deniedRuleIds: new Set([decision.ruleId]),
      });
      const fresh = escalation.logged.filter(
        (id) => !screening.logged.includes(id),
      );
      wafLogged = [...screening.logged, ...fresh];
      fresh.forEach((id) => this.metrics.recordWafMatch(id, 'log'));

      if (escalation.verdict === 'block' && escalation.matchedRule) {
        this.metrics.recordWafMatch(escalation.matchedRule.id, 'block');
        this.logger.warn(
          `WAF rule ${escalation.matchedRule.id} escalated rate limit ${decision.ruleId} to a block`,
        );
        return createVerdict({
          outcome: 'waf_blocked',
          matchedRuleId: escalation.matchedRule.id,
          rateLimit,
          wafLogged,
          rulesVersion: snapshot.version,
        });
      }
    }

    return createVerdict({
      outcome: 'rate_limited',
      retryAfterMs: decision.retryAfterMs,
      matchedRuleId: decision.ruleId,
      rateLimit,
      wafLogged,
      rulesVersion: snapshot.version,
    });
  }

  private recordWafMatches(evaluation: WafEvaluation): void {
    for (const ruleId of evaluation.logged) {
      this.metrics.recordWafMatch(ruleId, 'log');
    }
    if (evaluation.matchedRule) {
      this.metrics.recordWafMatch(
        evaluation.matchedRule.id,
        evaluation.matchedRule.action,
      );
    }
  }

  private throwIfCancelled(context: RequestContext, stage: string): void {
    if (context.signal?.aborted) {
      throw new AdmissionCancelledError(stage);
    }
  }
}

/**
 * Admission Metrics
 * Prometheus counters and gauges for every admission stage
 */

import { Injectable, Logger } from '@nestjs/common';
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

export type BreakerStateName = 'closed' | 'open' | 'half_open';

const BREAKER_STATE_VALUE: Record<BreakerStateName, number> = {
  closed: 0,
  half_open: 1,
  open: 2,
};

/**
 * Owns its own registry so that several gateway instances (one per test
 * module, for example) never collide on metric names.
 */
@Injectable()
export class AdmissionMetricsService {
  private readonly logger = new Logger('AdmissionMetrics');

  readonly registry = new Registry();

  private readonly decisionsCounter: Counter<'outcome'>;
  private readonly decisionDuration: Histogram<'outcome'>;
  private readonly rateLimitCounter: Counter<'rule' | 'result'>;
  private readonly breakerTransitionsCounter: Counter<'backend' | 'from' | 'to'>;
  private readonly breakerStateGauge: Gauge<'backend'>;
  private readonly wafMatchesCounter: Counter<'rule' | 'action'>;
  private readonly dependencyFaultsCounter: Counter<
    'dependency' | 'reason' | 'policy'
  >;
  private readonly reloadsCounter: Counter<'result'>;

  constructor() {
    this.decisionsCounter = new Counter({
      name: 'admission_decisions_total',
      help: 'Admission verdicts by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });

    this.decisionDuration = new Histogram({
      name: 'admission_decision_duration_seconds',
      help: 'Time spent producing an admission verdict',
      labelNames: ['outcome'],
      buckets: [0.0001, 0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1],
      registers: [this.registry],
    });

    this.rateLimitCounter = new Counter({
      name: 'rate_limit_decisions_total',
      help: 'Rate-limit evaluations by rule and result',
      labelNames: ['rule', 'result'],
      registers: [this.registry],
    });

    this.breakerTransitionsCounter = new Counter({
      name: 'circuit_breaker_transitions_total',
      help: 'Circuit breaker state transitions',
      labelNames: ['backend', 'from', 'to'],
      registers: [this.registry],
    });

    // 0 = closed, 1 = half_open, 2 = open
    this.breakerStateGauge = new Gauge({
      name: 'circuit_breaker_state',
      help: 'Current circuit breaker state per backend (0 closed, 1 half-open, 2 open)',
      labelNames: ['backend'],
      registers: [this.registry],
    });

    this.wafMatchesCounter = new Counter({
      name: 'waf_matches_total',
      help: 'WAF rule matches by rule and action',
      labelNames: ['rule', 'action'],
      registers: [this.registry],
    });

    this.dependencyFaultsCounter = new Counter({
      name: 'admission_dependency_faults_total',
      help: 'Faults of admission dependencies, separate from denials',
      labelNames: ['dependency', 'reason', 'policy'],
      registers: [this.registry],
    });

    this.reloadsCounter = new Counter({
      name: 'admission_rules_reloads_total',
      help: 'Rule document loads by result',
      labelNames: ['result'],
      registers: [this.registry],
    });

    this.logger.log('Prometheus metrics initialized');
  }

  /**
   * Adds process metrics (CPU, memory, event loop lag) to this registry.
   * Called once by the application, not by tests.
   */
  collectProcessMetrics(): void {
    collectDefaultMetrics({ register: this.registry });
  }

  recordDecision(outcome: string, durationMs: number): void {
    this.decisionsCounter.inc({ outcome });
    this.decisionDuration.observe({ outcome }, durationMs / 1000);
  }

  recordRateLimit(ruleId: string, allowed: boolean): void {
    this.rateLimitCounter.inc({
      rule: ruleId,
      result: allowed ? 'allowed' : 'denied',
    });
  }

  recordBreakerTransition(
    backendId: string,
    from: BreakerStateName,
    to: BreakerStateName,
  ): void {
    this.breakerTransitionsCounter.inc({ backend: backendId, from, to });
    this.breakerStateGauge.set({ backend: backendId }, BREAKER_STATE_VALUE[to]);
  }

  setBreakerState(backendId: string, state: BreakerStateName): void {
    this.breakerStateGauge.set(
      { backend: backendId },
      BREAKER_STATE_VALUE[state],
    );
  }

  removeBreaker(backendId: string): void {
    this.breakerStateGauge.remove({ backend: backendId });
  }

  recordWafMatch(ruleId: string, action: string): void {
    this.wafMatchesCounter.inc({ rule: ruleId, action });
  }

  recordDependencyFault(
    dependency: string,
    reason: string,
    policy: string,
  ): void {
    this.dependencyFaultsCounter.inc({ dependency, reason, policy });
  }

  recordRulesReload(result: 'success' | 'rejected'): void {
    this.reloadsCounter.inc({ result });
  }

  /**
   * Get Prometheus metrics as string
   */
  async getPrometheusMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}

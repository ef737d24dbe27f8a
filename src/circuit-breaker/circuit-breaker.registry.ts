import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CLOCK, Clock } from '../common/clock';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import { AdmissionMetricsService } from '../metrics/admission-metrics.service';
import { CircuitBreakerConfig, RuleSnapshot } from '../rules/rule.types';
import {
  CallPermission,
  CircuitBreaker,
  CircuitBreakerEvent,
  CircuitBreakerMetrics,
} from './circuit-breaker';

export const CIRCUIT_STATE_CHANGED = 'circuit.state.changed';

const CONFIG_FIELDS = [
  'failureRateThreshold',
  'slidingWindowType',
  'slidingWindowSize',
  'minimumNumberOfCalls',
  'waitDurationOpenMs',
  'halfOpenPermittedCalls',
  'halfOpenSuccessThreshold',
  'maxWaitInHalfOpenMs',
] as const satisfies readonly (keyof CircuitBreakerConfig)[];

const SWEEP_INTERVAL_MS = 60_000;

interface TrackedBreaker {
  breaker: CircuitBreaker;
  lastUsedAt: number;
}

function sameConfig(a: CircuitBreakerConfig, b: CircuitBreakerConfig): boolean {
  return CONFIG_FIELDS.every((field) => a[field] === b[field]);
}

/**
 * Owns the breaker of every backend seen by this node. Breakers are created
 * on first use and replaced by a fresh instance when a rule reload changes
 * their configuration.
 *
 * Backend ids come from requests, so the set is bounded: closed breakers
 * idle for `breakerTracking.idleEvictMs` are dropped by a background sweep,
 * and once `breakerTracking.maxTracked` is reached the least recently used
 * closed breaker makes room for a new one. Open and half-open breakers are
 * never dropped.
 */
@Injectable()
export class CircuitBreakerRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerRegistry.name);
  /** Ordered from least to most recently used. */
  private readonly breakers = new Map<string, TrackedBreaker>();
  private readonly sweeper: NodeJS.Timeout;

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
    private readonly eventEmitter: EventEmitter2,
    private readonly metrics: AdmissionMetricsService,
  ) {
    this.sweeper = setInterval(() => this.evictIdle(), SWEEP_INTERVAL_MS);
    this.sweeper.unref();
  }

  configFor(backendId: string, snapshot: RuleSnapshot): CircuitBreakerConfig {
    return (
      snapshot.circuitBreakers.get(backendId) ?? {
        backendId,
        ...this.options.defaultCircuitBreaker,
      }
    );
  }

  breakerFor(backendId: string, snapshot: RuleSnapshot): CircuitBreaker {
    const config = this.configFor(backendId, snapshot);
    const now = this.clock.now();
    const existing = this.breakers.get(backendId);
    if (existing && sameConfig(existing.breaker.config, config)) {
      this.track(backendId, existing.breaker, now);
      return existing.breaker;
    }

    if (existing) {
      this.logger.log(`Circuit ${backendId} configuration changed, starting fresh`);
    } else {
      this.makeRoom();
    }
    const breaker = new CircuitBreaker(
      config,
      this.clock,
      (event) => this.onTransition(event),
      this.logger,
    );
    this.track(backendId, breaker, now);
    this.metrics.setBreakerState(backendId, 'closed');
    return breaker;
  }

  beforeCall(backendId: string, snapshot: RuleSnapshot): CallPermission {
    return this.breakerFor(backendId, snapshot).beforeCall();
  }

  recordOutcome(
    backendId: string,
    success: boolean,
    snapshot: RuleSnapshot,
  ): void {
    this.breakerFor(backendId, snapshot).recordOutcome(success);
  }

  forceOpen(backendId: string, reason: string, snapshot: RuleSnapshot): void {
    this.breakerFor(backendId, snapshot).forceOpen(reason);
  }

  /**
   * Discards the breaker; the next call for this backend starts closed with
   * an empty window. Returns false when no breaker existed.
   */
  reset(backendId: string): boolean {
    const existed = this.breakers.delete(backendId);
    if (existed) {
      this.logger.log(`Circuit ${backendId} reset`);
      this.metrics.setBreakerState(backendId, 'closed');
    }
    return existed;
  }

  getMetrics(backendId: string): CircuitBreakerMetrics | null {
    return this.breakers.get(backendId)?.breaker.getMetrics() ?? null;
  }

  getAllMetrics(): CircuitBreakerMetrics[] {
    return [...this.breakers.values()].map(({ breaker }) => breaker.getMetrics());
  }

  /** Number of breakers currently held. */
  size(): number {
    return this.breakers.size;
  }

  /**
   * Drops closed breakers not used for `idleEvictMs`. Returns how many were
   * dropped.
   */
  evictIdle(): number {
    const cutoff = this.clock.now() - this.options.breakerTracking.idleEvictMs;
    let evicted = 0;
    for (const [backendId, tracked] of this.breakers) {
      if (tracked.lastUsedAt <= cutoff && tracked.breaker.getState() === 'closed') {
        this.evict(backendId);
        evicted++;
      }
    }
    if (evicted > 0) {
      this.logger.debug(`Dropped ${evicted} idle circuit breakers`);
    }
    return evicted;
  }

  onModuleDestroy(): void {
    clearInterval(this.sweeper);
  }

  private track(backendId: string, breaker: CircuitBreaker, now: number): void {
    this.breakers.delete(backendId);
    this.breakers.set(backendId, { breaker, lastUsedAt: now });
  }

  private makeRoom(): void {
    const { maxTracked } = this.options.breakerTracking;
    if (this.breakers.size < maxTracked) {
      return;
    }
    for (const [backendId, tracked] of this.breakers) {
      if (tracked.breaker.getState() === 'closed') {
        this.evict(backendId);
        return;
      }
    }
    this.logger.warn(
      `${this.breakers.size} circuit breakers are open or half-open; tracking beyond ${maxTracked}`,
    );
  }

  private evict(backendId: string): void {
    this.breakers.delete(backendId);
    this.metrics.removeBreaker(backendId);
  }

  private onTransition(event: CircuitBreakerEvent): void {
    this.metrics.recordBreakerTransition(
      event.backendId,
      event.previousState,
      event.newState,
    );
    this.eventEmitter.emit(CIRCUIT_STATE_CHANGED, event);
  }
}

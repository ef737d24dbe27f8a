import { Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { CircuitBreakerConfig } from '../rules/rule.types';
import { OutcomeWindow, createOutcomeWindow } from './outcome-window';

export type CircuitBreakerState = 'closed' | 'open' | 'half_open';

/**
 * Legal transitions. Anything else is a programming error.
 */
const TRANSITIONS: Record<CircuitBreakerState, CircuitBreakerState[]> = {
  closed: ['open'],
  open: ['half_open'],
  half_open: ['closed', 'open'],
};

export interface CircuitBreakerEvent {
  backendId: string;
  previousState: CircuitBreakerState;
  newState: CircuitBreakerState;
  timestamp: number;
  reason: string;
}

export interface CallPermission {
  permitted: boolean;
  state: CircuitBreakerState;
  /** Remaining open time; null when there is nothing definite to wait for. */
  retryAfterMs: number | null;
}

export interface CircuitBreakerMetrics {
  backendId: string;
  state: CircuitBreakerState;
  calls: number;
  failures: number;
  failureRate: number;
  openedAt: number | null;
  halfOpenProbesIssued: number;
  halfOpenSuccesses: number;
  halfOpenFailures: number;
  config: CircuitBreakerConfig;
}

/**
 * Node-local breaker for one backend. All methods are synchronous, so each
 * state change happens within a single turn of the event loop.
 */
export class CircuitBreaker {
  private state: CircuitBreakerState = 'closed';
  private readonly window: OutcomeWindow;
  private openedAt: number | null = null;
  private halfOpenedAt: number | null = null;
  private probesIssued = 0;
  private halfOpenSuccesses = 0;
  private halfOpenFailures = 0;

  constructor(
    readonly config: CircuitBreakerConfig,
    private readonly clock: Clock,
    private readonly onTransition: (event: CircuitBreakerEvent) => void,
    private readonly logger: Logger,
  ) {
    this.window = createOutcomeWindow(config);
  }

  get backendId(): string {
    return this.config.backendId;
  }

  getState(): CircuitBreakerState {
    this.advance(this.clock.now());
    return this.state;
  }

  beforeCall(): CallPermission {
    const now = this.clock.now();
    this.advance(now);

    switch (this.state) {
      case 'closed':
        return { permitted: true, state: 'closed', retryAfterMs: null };

      case 'open':
        return {
          permitted: false,
          state: 'open',
          retryAfterMs: Math.max(0, this.openUntil() - now),
        };

      case 'half_open':
        if (this.probesIssued < this.config.halfOpenPermittedCalls) {
          this.probesIssued++;
          return { permitted: true, state: 'half_open', retryAfterMs: null };
        }
        return { permitted: false, state: 'half_open', retryAfterMs: null };
    }
  }

  recordOutcome(success: boolean): void {
    const now = this.clock.now();
    this.advance(now);

    switch (this.state) {
      case 'closed':
        this.window.record(success, now);
        this.evaluateFailureRate(now);
        return;

      case 'open':
        // Late reports from calls admitted before the breaker opened.
        return;

      case 'half_open':
        this.recordProbe(success, now);
        return;
    }
  }

  forceOpen(reason: string): void {
    const now = this.clock.now();
    this.advance(now);
    this.logger.warn(`Forcing circuit ${this.backendId} to OPEN state: ${reason}`);

    if (this.state === 'open') {
      this.openedAt = now;
      return;
    }
    this.transition('open', now, `forced: ${reason}`);
  }

  getMetrics(): CircuitBreakerMetrics {
    const now = this.clock.now();
    this.advance(now);
    const { calls, failures } = this.window.stats(now);
    return {
      backendId: this.backendId,
      state: this.state,
      calls,
      failures,
      failureRate: calls > 0 ? failures / calls : 0,
      openedAt: this.openedAt,
      halfOpenProbesIssued: this.probesIssued,
      halfOpenSuccesses: this.halfOpenSuccesses,
      halfOpenFailures: this.halfOpenFailures,
      config: this.config,
    };
  }

  private openUntil(): number {
    return (this.openedAt ?? 0) + this.config.waitDurationOpenMs;
  }

  /**
   * Applies time-driven transitions: open → half_open once the wait is over,
   * and half_open → open when probes have not reported in time.
   */
  private advance(now: number): void {
    if (this.state === 'open' && now >= this.openUntil()) {
      this.transition('half_open', now, 'wait duration elapsed');
    }
    if (
      this.state === 'half_open' &&
      this.config.maxWaitInHalfOpenMs > 0 &&
      this.halfOpenedAt !== null &&
      now - this.halfOpenedAt >= this.config.maxWaitInHalfOpenMs
    ) {
      this.transition('open', now, 'half-open probes timed out');
    }
  }

  private evaluateFailureRate(now: number): void {
    const { calls, failures } = this.window.stats(now);
    if (calls < this.config.minimumNumberOfCalls) {
      return;
    }
    const failureRate = failures / calls;
    if (failureRate > this.config.failureRateThreshold) {
      this.transition(
        'open',
        now,
        `failure rate ${failures}/${calls} above ${this.config.failureRateThreshold}`,
      );
    }
  }

  private recordProbe(success: boolean, now: number): void {
    if (success) {
      this.halfOpenSuccesses++;
    } else {
      this.halfOpenFailures++;
    }

    const { halfOpenPermittedCalls, halfOpenSuccessThreshold } = this.config;
    if (this.halfOpenSuccesses >= halfOpenSuccessThreshold) {
      this.transition('closed', now, `${this.halfOpenSuccesses} probes succeeded`);
    } else if (
      this.halfOpenFailures >
      halfOpenPermittedCalls - halfOpenSuccessThreshold
    ) {
      this.transition('open', now, `${this.halfOpenFailures} probes failed`);
    }
  }

  private transition(
    newState: CircuitBreakerState,
    now: number,
    reason: string,
  ): void {
    const previousState = this.state;
    if (!TRANSITIONS[previousState].includes(newState)) {
      throw new Error(
        `Illegal circuit transition ${previousState} -> ${newState} for ${this.backendId}`,
      );
    }

    this.state = newState;
    switch (newState) {
      case 'open':
        this.openedAt = now;
        this.halfOpenedAt = null;
        break;
      case 'half_open':
        this.halfOpenedAt = now;
        this.probesIssued = 0;
        this.halfOpenSuccesses = 0;
        this.halfOpenFailures = 0;
        break;
      case 'closed':
        this.openedAt = null;
        this.halfOpenedAt = null;
        this.window.clear();
        break;
    }

    this.logger.log(
      `Circuit ${this.backendId} state changed from ${previousState} to ${newState} (${reason})`,
    );
    this.onTransition({
      backendId: this.backendId,
      previousState,
      newState,
      timestamp: now,
      reason,
    });
  }
}

import { CircuitBreakerConfig, SlidingWindowType } from '../rules/rule.types';

export interface OutcomeStats {
  calls: number;
  failures: number;
}

/**
 * Rolling record of call outcomes a closed breaker judges its failure rate on.
 */
export interface OutcomeWindow {
  record(success: boolean, now: number): void;
  stats(now: number): OutcomeStats;
  clear(): void;
}

/**
 * Keeps the last `size` outcomes in a ring buffer.
 */
export class CountOutcomeWindow implements OutcomeWindow {
  private readonly outcomes: boolean[] = [];
  private next = 0;
  private failures = 0;

  constructor(private readonly size: number) {}

  record(success: boolean): void {
    if (this.outcomes.length < this.size) {
      this.outcomes.push(success);
    } else {
      if (!this.outcomes[this.next]) {
        this.failures--;
      }
      this.outcomes[this.next] = success;
    }
    if (!success) {
      this.failures++;
    }
    this.next = (this.next + 1) % this.size;
  }

  stats(): OutcomeStats {
    return { calls: this.outcomes.length, failures: this.failures };
  }

  clear(): void {
    this.outcomes.length = 0;
    this.next = 0;
    this.failures = 0;
  }
}

interface SecondBucket {
  second: number;
  calls: number;
  failures: number;
}

/**
 * Aggregates outcomes per second over the last `seconds` seconds.
 */
export class TimeOutcomeWindow implements OutcomeWindow {
  private readonly buckets: SecondBucket[];

  constructor(private readonly seconds: number) {
    this.buckets = Array.from({ length: seconds }, () => ({
      second: -1,
      calls: 0,
      failures: 0,
    }));
  }

  record(success: boolean, now: number): void {
    const second = Math.floor(now / 1000);
    const bucket = this.buckets[second % this.seconds];
    if (bucket.second !== second) {
      bucket.second = second;
      bucket.calls = 0;
      bucket.failures = 0;
    }
    bucket.calls++;
    if (!success) {
      bucket.failures++;
    }
  }

  stats(now: number): OutcomeStats {
    const oldest = Math.floor(now / 1000) - this.seconds + 1;
    let calls = 0;
    let failures = 0;
    for (const bucket of this.buckets) {
      if (bucket.second >= oldest) {
        calls += bucket.calls;
        failures += bucket.failures;
      }
    }
    return { calls, failures };
  }

  clear(): void {
    for (const bucket of this.buckets) {
      bucket.second = -1;
      bucket.calls = 0;
      bucket.failures = 0;
    }
  }
}

export function createOutcomeWindow(config: CircuitBreakerConfig): OutcomeWindow {
  return config.slidingWindowType === SlidingWindowType.TIME
    ? new TimeOutcomeWindow(config.slidingWindowSize)
    : new CountOutcomeWindow(config.slidingWindowSize);
}

/**
 * Fault types raised by the admission core.
 *
 * Decision outcomes (rate limited, circuit open, WAF blocked) are never
 * thrown; they are returned as verdicts. Only configuration problems,
 * dependency faults and cancellation use exceptions.
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export type CounterStoreFaultReason = 'timeout' | 'unavailable' | 'contention';

export abstract class CounterStoreError extends Error {
  abstract readonly reason: CounterStoreFaultReason;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CounterStoreTimeoutError extends CounterStoreError {
  readonly reason = 'timeout';

  constructor(readonly timeoutMs: number) {
    super(`Counter store did not answer within ${timeoutMs}ms`);
  }
}

export class CounterStoreUnavailableError extends CounterStoreError {
  readonly reason = 'unavailable';
}

export class CounterStoreContentionError extends CounterStoreError {
  readonly reason = 'contention';

  constructor(
    readonly key: string,
    readonly attempts: number,
  ) {
    super(`Gave up updating ${key} after ${attempts} conflicting writes`);
  }
}

export class AdmissionCancelledError extends Error {
  constructor(stage: string) {
    super(`Admission cancelled during ${stage}`);
    this.name = 'AdmissionCancelledError';
  }
}

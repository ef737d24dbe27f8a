import { CounterStoreFaultReason } from '../common/errors';
import { FailPolicy } from '../config/admission.config';

export type AdmissionOutcome =
  | 'allow'
  | 'rate_limited'
  | 'circuit_open'
  | 'waf_blocked'
  | 'dependency_fault';

export interface DegradedInfo {
  readonly dependency: 'counter_store';
  readonly reason: CounterStoreFaultReason;
  readonly policy: FailPolicy;
}

/**
 * The last rate-limit rule evaluated for the request.
 */
export interface RateLimitSummary {
  readonly ruleId: string;
  readonly key: string;
  readonly limit: number;
  readonly remaining: number;
  /** Epoch ms. */
  readonly resetAt: number;
}

export interface Verdict {
  readonly outcome: AdmissionOutcome;
  readonly retryAfterMs: number | null;
  readonly matchedRuleId: string | null;
  readonly diagnosticHeaders: Readonly<Record<string, string>>;
  readonly degraded: DegradedInfo | null;
  readonly rateLimit: RateLimitSummary | null;
  readonly wafLogged: readonly string[];
  readonly rulesVersion: string;
}

export interface VerdictInit {
  outcome: AdmissionOutcome;
  rulesVersion: string;
  retryAfterMs?: number | null;
  matchedRuleId?: string | null;
  degraded?: DegradedInfo | null;
  rateLimit?: RateLimitSummary | null;
  wafLogged?: readonly string[];
}

export const DEGRADED_HEADER = 'X-Admission-Degraded';

function diagnosticHeaders(init: VerdictInit): Record<string, string> {
  const headers: Record<string, string> = {};
  const retryAfterMs = init.retryAfterMs ?? null;

  if (init.rateLimit) {
    headers['X-RateLimit-Limit'] = String(init.rateLimit.limit);
    headers['X-RateLimit-Remaining'] = String(init.rateLimit.remaining);
    headers['X-RateLimit-Reset'] = String(
      Math.ceil(init.rateLimit.resetAt / 1000),
    );
  }

  switch (init.outcome) {
    case 'rate_limited':
      headers['X-RateLimit-Remaining'] = '0';
      if (retryAfterMs !== null) {
        headers['Retry-After'] = String(Math.ceil(retryAfterMs / 1000));
      }
      break;
    case 'circuit_open':
      if (retryAfterMs !== null) {
        headers['Retry-After'] = String(Math.ceil(retryAfterMs / 1000));
      }
      break;
    case 'waf_blocked':
      if (init.matchedRuleId) {
        headers['X-Block-Reason'] = init.matchedRuleId;
      }
      break;
    case 'dependency_fault':
      headers[DEGRADED_HEADER] = 'fail-closed';
      break;
    case 'allow':
      if (init.degraded) {
        headers[DEGRADED_HEADER] = 'fail-open';
      }
      break;
  }

  return headers;
}

/**
 * Builds an immutable verdict with its diagnostic headers.
 */
export function createVerdict(init: VerdictInit): Verdict {
  return Object.freeze({
    outcome: init.outcome,
    retryAfterMs: init.retryAfterMs ?? null,
    matchedRuleId: init.matchedRuleId ?? null,
    diagnosticHeaders: Object.freeze(diagnosticHeaders(init)),
    degraded: init.degraded ?? null,
    rateLimit: init.rateLimit ?? null,
    wafLogged: Object.freeze([...(init.wafLogged ?? [])]),
    rulesVersion: init.rulesVersion,
  });
}

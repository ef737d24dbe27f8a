import { HttpException, HttpStatus } from '@nestjs/common';
import { AdmissionOutcome, Verdict } from './verdict';

const STATUS: Record<Exclude<AdmissionOutcome, 'allow'>, HttpStatus> = {
  rate_limited: HttpStatus.TOO_MANY_REQUESTS,
  circuit_open: HttpStatus.SERVICE_UNAVAILABLE,
  waf_blocked: HttpStatus.FORBIDDEN,
  dependency_fault: HttpStatus.SERVICE_UNAVAILABLE,
};

const MESSAGE: Record<Exclude<AdmissionOutcome, 'allow'>, string> = {
  rate_limited: 'Rate limit exceeded',
  circuit_open: 'Backend temporarily unavailable',
  waf_blocked: 'Request blocked',
  dependency_fault: 'Admission control unavailable',
};

/**
 * Maps a denying verdict to the exception the guard throws. Returns null
 * for `allow`.
 */
export function verdictToHttpException(verdict: Verdict): HttpException | null {
  if (verdict.outcome === 'allow') {
    return null;
  }

  const retryAfterSeconds =
    verdict.retryAfterMs === null ? null : Math.ceil(verdict.retryAfterMs / 1000);
  const message =
    retryAfterSeconds === null
      ? MESSAGE[verdict.outcome]
      : `${MESSAGE[verdict.outcome]}. Retry after ${retryAfterSeconds} seconds`;

  return new HttpException(
    {
      statusCode: STATUS[verdict.outcome],
      message,
      outcome: verdict.outcome,
      matchedRuleId: verdict.matchedRuleId,
      retryAfterMs: verdict.retryAfterMs,
    },
    STATUS[verdict.outcome],
  );
}

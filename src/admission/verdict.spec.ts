import { HttpStatus } from '@nestjs/common';
import { createVerdict } from './verdict';
import { verdictToHttpException } from './verdict-http';

const rateLimit = {
  ruleId: 'per-client',
  key: 'client-a',
  limit: 5,
  remaining: 3,
  resetAt: 1_700_000_100_400,
};

describe('createVerdict', () => {
  it('adds rate limit headers to an admitted request', () => {
    const verdict = createVerdict({
      outcome: 'allow',
      rateLimit,
      rulesVersion: 'v1',
    });

    expect(verdict.diagnosticHeaders).toEqual({
      'X-RateLimit-Limit': '5',
      'X-RateLimit-Remaining': '3',
      'X-RateLimit-Reset': '1700000101',
    });
    expect(verdict).toMatchObject({
      retryAfterMs: null,
      matchedRuleId: null,
      degraded: null,
      wafLogged: [],
    });
  });

  it('rounds Retry-After up to whole seconds', () => {
    const verdict = createVerdict({
      outcome: 'rate_limited',
      retryAfterMs: 1_200,
      matchedRuleId: 'per-client',
      rateLimit,
      rulesVersion: 'v1',
    });

    expect(verdict.diagnosticHeaders['Retry-After']).toBe('2');
    expect(verdict.diagnosticHeaders['X-RateLimit-Remaining']).toBe('0');
  });

  it('leaves out Retry-After when waiting would not help', () => {
    const verdict = createVerdict({
      outcome: 'rate_limited',
      retryAfterMs: null,
      matchedRuleId: 'closed',
      rulesVersion: 'v1',
    });

    expect(verdict.diagnosticHeaders).toEqual({ 'X-RateLimit-Remaining': '0' });
  });

  it('names the WAF rule that blocked', () => {
    const verdict = createVerdict({
      outcome: 'waf_blocked',
      matchedRuleId: 'block-scanners',
      rulesVersion: 'v1',
    });

    expect(verdict.diagnosticHeaders).toEqual({
      'X-Block-Reason': 'block-scanners',
    });
  });

  it('is immutable', () => {
    const verdict = createVerdict({
      outcome: 'allow',
      wafLogged: ['audit'],
      rulesVersion: 'v1',
    });

    expect(Object.isFrozen(verdict)).toBe(true);
    expect(Object.isFrozen(verdict.wafLogged)).toBe(true);
    expect(Object.isFrozen(verdict.diagnosticHeaders)).toBe(true);
  });
});

describe('verdictToHttpException', () => {
  it('admits allowed requests', () => {
    expect(
      verdictToHttpException(createVerdict({ outcome: 'allow', rulesVersion: 'v1' })),
    ).toBeNull();
  });

  it.each([
    ['rate_limited', HttpStatus.TOO_MANY_REQUESTS],
    ['circuit_open', HttpStatus.SERVICE_UNAVAILABLE],
    ['waf_blocked', HttpStatus.FORBIDDEN],
    ['dependency_fault', HttpStatus.SERVICE_UNAVAILABLE],
  ] as const)('maps %s to %d', (outcome, status) => {
    const exception = verdictToHttpException(
      createVerdict({ outcome, rulesVersion: 'v1' }),
    );

    expect(exception?.getStatus()).toBe(status);
  });

  it('describes the denial in the response body', () => {
    const exception = verdictToHttpException(
      createVerdict({
        outcome: 'circuit_open',
        retryAfterMs: 29_500,
        matchedRuleId: 'payments',
        rulesVersion: 'v1',
      }),
    );

    expect(exception?.getResponse()).toEqual({
      statusCode: 503,
      message: 'Backend temporarily unavailable. Retry after 30 seconds',
      outcome: 'circuit_open',
      matchedRuleId: 'payments',
      retryAfterMs: 29_500,
    });
  });
});

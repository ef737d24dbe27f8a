import {
  buildSnapshot,
  requestContext,
} from '../../test/support/admission-fixtures';
import { WafEngineService } from './waf-engine.service';

type RuleInput = Record<string, unknown>;

const rule = (
  id: string,
  priority: number,
  action: string,
  match: RuleInput,
): RuleInput => ({ id, priority, action, match });

const rateLimits = [
  {
    id: 'login',
    key: '{ip}',
    algorithm: 'fixed_window',
    limit: 5,
    windowSeconds: 60,
  },
];

function snapshotOf(...wafRules: RuleInput[]) {
  return buildSnapshot({ version: 'waf', rateLimits, wafRules });
}

describe('WafEngineService', () => {
  const waf = new WafEngineService();

  it('allows a request no rule matches', () => {
    const snapshot = snapshotOf(
      rule('admin', 1, 'block', { type: 'path', pattern: '/admin' }),
    );

    expect(waf.evaluate(requestContext(), snapshot)).toEqual({
      verdict: 'allow',
      matchedRule: null,
      logged: [],
    });
  });

  it('stops at the first block and keeps earlier log matches', () => {
    const snapshot = snapshotOf(
      rule('late-block', 30, 'block', { type: 'path', pattern: '/orders' }),
      rule('early-block', 20, 'block', { type: 'path', pattern: '/orders' }),
      rule('audit', 10, 'log', { type: 'path', pattern: '/' }),
    );

    const result = waf.evaluate(requestContext(), snapshot);

    expect(result.verdict).toBe('block');
    expect(result.matchedRule?.id).toBe('early-block');
    expect(result.logged).toEqual(['audit']);
  });

  it('breaks priority ties by document order', () => {
    const snapshot = snapshotOf(
      rule('first', 5, 'allow', { type: 'path', pattern: '/orders' }),
      rule('second', 5, 'block', { type: 'path', pattern: '/orders' }),
    );

    expect(waf.evaluate(requestContext(), snapshot).matchedRule?.id).toBe(
      'first',
    );
  });

  it('lets an explicit allow skip lower-priority blocks', () => {
    const snapshot = snapshotOf(
      rule('health', 1, 'allow', { type: 'path', mode: 'exact', pattern: '/health' }),
      rule('everything', 2, 'block', { type: 'path', pattern: '/' }),
    );

    expect(
      waf.evaluate(requestContext({ route: '/health' }), snapshot),
    ).toMatchObject({ verdict: 'allow', matchedRule: { id: 'health' } });
    expect(
      waf.evaluate(requestContext({ route: '/health/deep' }), snapshot),
    ).toMatchObject({ verdict: 'block', matchedRule: { id: 'everything' } });
  });

  it('reports log when only log rules match', () => {
    const snapshot = snapshotOf(
      rule('a', 1, 'log', { type: 'path', pattern: '/orders' }),
      rule('b', 2, 'log', { type: 'path', mode: 'regex', pattern: '^/ord[a-z]+$' }),
    );

    expect(waf.evaluate(requestContext(), snapshot)).toEqual({
      verdict: 'log',
      matchedRule: null,
      logged: ['a', 'b'],
    });
  });

  it('matches headers with and without case folding', () => {
    const snapshot = snapshotOf(
      rule('scanner', 1, 'block', {
        type: 'header',
        name: 'User-Agent',
        contains: 'sqlmap',
        ignoreCase: true,
      }),
      rule('exact-tenant', 2, 'log', {
        type: 'header',
        name: 'x-tenant',
        equals: 'Acme',
      }),
    );

    expect(
      waf.evaluate(
        requestContext({ headers: { 'user-agent': 'SQLMap/1.7' } }),
        snapshot,
      ).verdict,
    ).toBe('block');
    expect(
      waf.evaluate(requestContext({ headers: { 'x-tenant': 'acme' } }), snapshot)
        .verdict,
    ).toBe('allow');
    expect(
      waf.evaluate(requestContext({ headers: { 'x-tenant': 'Acme' } }), snapshot)
        .verdict,
    ).toBe('log');
  });

  it('matches the body sample', () => {
    const snapshot = snapshotOf(
      rule('sqli', 1, 'block', {
        type: 'body',
        pattern: 'union\\s+select',
        ignoreCase: true,
      }),
    );

    expect(
      waf.evaluate(
        requestContext({ method: 'POST', body: '{"q":"1 UNION  SELECT *"}' }),
        snapshot,
      ).verdict,
    ).toBe('block');
    expect(waf.evaluate(requestContext(), snapshot).verdict).toBe('allow');
  });

  it('only evaluates rate matchers once a rate signal exists', () => {
    const snapshot = snapshotOf(
      rule('login-abuse', 1, 'block', {
        type: 'all',
        matchers: [
          { type: 'path', pattern: '/login' },
          { type: 'rate', ruleId: 'login' },
        ],
      }),
    );
    const context = requestContext({ route: '/login' });

    expect(waf.evaluate(context, snapshot).verdict).toBe('allow');
    expect(
      waf.evaluate(context, snapshot, { deniedRuleIds: new Set<string>() })
        .verdict,
    ).toBe('allow');
    expect(
      waf.evaluate(context, snapshot, { deniedRuleIds: new Set(['login']) })
        .verdict,
    ).toBe('block');
  });

  it('combines matchers with any', () => {
    const snapshot = snapshotOf(
      rule('probes', 1, 'block', {
        type: 'any',
        matchers: [
          { type: 'path', pattern: '/wp-admin' },
          { type: 'path', mode: 'exact', pattern: '/.env' },
        ],
      }),
    );

    expect(
      waf.evaluate(requestContext({ route: '/.env' }), snapshot).verdict,
    ).toBe('block');
    expect(
      waf.evaluate(requestContext({ route: '/.env.bak' }), snapshot).verdict,
    ).toBe('allow');
  });

  it('matches client addresses against exact entries and ranges', () => {
    const snapshot = snapshotOf(
      rule('deny-list', 1, 'block', {
        type: 'ip',
        addresses: ['203.0.113.7', '198.51.100.0/24', '2001:db8::/32'],
      }),
    );
    const verdictFor = (ip?: string) =>
      waf.evaluate(requestContext({ identity: { ip } }), snapshot).verdict;

    expect(verdictFor('203.0.113.7')).toBe('block');
    expect(verdictFor('198.51.100.42')).toBe('block');
    expect(verdictFor('::ffff:198.51.100.9')).toBe('block');
    expect(verdictFor('2001:db8::1')).toBe('block');
    expect(verdictFor('203.0.113.8')).toBe('allow');
    expect(verdictFor()).toBe('allow');
  });

  it('blocks clients outside an inverted address list', () => {
    const snapshot = snapshotOf(
      rule('internal-admin', 1, 'block', {
        type: 'all',
        matchers: [
          { type: 'path', pattern: '/admin' },
          { type: 'ip', addresses: ['10.0.0.0/8'], invert: true },
        ],
      }),
    );
    const verdictFor = (ip?: string) =>
      waf.evaluate(requestContext({ route: '/admin', identity: { ip } }), snapshot)
        .verdict;

    expect(verdictFor('10.1.2.3')).toBe('allow');
    expect(verdictFor('192.0.2.1')).toBe('block');
    expect(verdictFor()).toBe('block');
  });

  it('ignores disabled rules', () => {
    const snapshot = snapshotOf(
      { ...rule('maintenance', 1, 'block', { type: 'path', pattern: '/' }), enabled: false },
      rule('audit', 2, 'log', { type: 'path', pattern: '/orders' }),
    );

    expect(waf.evaluate(requestContext(), snapshot)).toEqual({
      verdict: 'log',
      matchedRule: null,
      logged: ['audit'],
    });
  });

  it('gives the same result for the same request', () => {
    const snapshot = snapshotOf(
      rule('regex', 1, 'log', { type: 'body', pattern: 'token=\\w+' }),
    );
    const context = requestContext({ method: 'POST', body: 'token=abc' });

    const first = waf.evaluate(context, snapshot);
    const second = waf.evaluate(context, snapshot);

    expect(second).toEqual(first);
    expect(first.logged).toEqual(['regex']);
  });
});

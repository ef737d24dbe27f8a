import { EventEmitter2 } from '@nestjs/event-emitter';
import { CircuitBreakerRegistry } from '../circuit-breaker/circuit-breaker.registry';
import {
  AdmissionCancelledError,
  CounterStoreUnavailableError,
} from '../common/errors';
import { CounterStore } from '../counter-store/counter-store.interface';
import { InMemoryCounterStore } from '../counter-store/in-memory-counter-store';
import { AdmissionMetricsService } from '../metrics/admission-metrics.service';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { RuleStoreService } from '../rules/rule-store.service';
import { WafEngineService } from '../waf/waf-engine.service';
import {
  T0,
  requestContext,
  testOptions,
} from '../../test/support/admission-fixtures';
import { ManualClock } from '../../test/support/manual-clock';
import { metricValue } from '../../test/support/metrics';
import { AdmissionControllerService } from './admission-controller.service';
import { RequestContextInit } from './request-context';

const gatewayRules = {
  version: 'controller-1',
  rateLimits: [
    {
      id: 'per-client',
      key: '{client_id}',
      algorithm: 'fixed_window',
      limit: 5,
      windowSeconds: 60,
      match: { routes: ['/orders*'] },
    },
  ],
  circuitBreakers: [
    {
      backendId: 'payments',
      failureRateThreshold: 0.5,
      slidingWindowSize: 10,
      waitDurationOpenSeconds: 30,
    },
  ],
  wafRules: [
    {
      id: 'escalate',
      priority: 5,
      action: 'block',
      match: {
        type: 'all',
        matchers: [
          { type: 'header', name: 'x-suspicious', equals: 'yes' },
          { type: 'rate', ruleId: 'per-client' },
        ],
      },
    },
    {
      id: 'block-scanners',
      priority: 10,
      action: 'block',
      match: {
        type: 'header',
        name: 'x-scanner',
        contains: 'sqlmap',
        ignoreCase: true,
      },
    },
    {
      id: 'probe-log',
      priority: 20,
      action: 'log',
      match: { type: 'path', pattern: '/wp-admin' },
    },
  ],
};

/** Counter store whose every update fails the same way. */
class BrokenCounterStore implements CounterStore {
  constructor(private readonly failure: () => Promise<never>) {}

  atomicUpdate<S, R>(): Promise<R> {
    return this.failure();
  }
}

interface Setup {
  env?: Record<string, string>;
  document?: Record<string, unknown>;
  store?: CounterStore;
}

function setup({ env = {}, document = gatewayRules, store }: Setup = {}) {
  const clock = new ManualClock(T0);
  const options = testOptions(env);
  const metrics = new AdmissionMetricsService();
  const events = new EventEmitter2();
  const ruleStore = new RuleStoreService(options, clock, events, metrics);
  ruleStore.load(document, 'test');

  const memoryStore = new InMemoryCounterStore(clock);
  const rateLimiter = new RateLimiterService(
    store ?? memoryStore,
    clock,
    options,
    metrics,
  );
  const breakers = new CircuitBreakerRegistry(clock, options, events, metrics);
  const controller = new AdmissionControllerService(
    ruleStore,
    new WafEngineService(),
    rateLimiter,
    breakers,
    metrics,
    options,
  );
  return { clock, metrics, memoryStore, breakers, rateLimiter, controller };
}

describe('AdmissionControllerService', () => {
  let fixture: ReturnType<typeof setup>;

  const orders = (init: Partial<RequestContextInit> = {}) =>
    requestContext({
      route: '/orders',
      identity: { clientId: 'client-a' },
      ...init,
    });

  afterEach(() => {
    fixture.memoryStore.onModuleDestroy();
    fixture.breakers.onModuleDestroy();
  });

  describe('rate limiting', () => {
    beforeEach(() => {
      fixture = setup();
    });

    it('admits five requests a minute and rejects the sixth', async () => {
      const { controller } = fixture;
      for (let i = 0; i < 5; i++) {
        expect((await controller.admit(orders())).outcome).toBe('allow');
      }

      const verdict = await controller.admit(orders());

      expect(verdict).toMatchObject({
        outcome: 'rate_limited',
        retryAfterMs: 60_000,
        matchedRuleId: 'per-client',
        rulesVersion: 'controller-1',
      });
      expect(verdict.diagnosticHeaders).toEqual({
        'X-RateLimit-Limit': '5',
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': '1700000100',
        'Retry-After': '60',
      });
      expect(
        await metricValue(fixture.metrics.registry, 'admission_decisions_total', {
          outcome: 'rate_limited',
        }),
      ).toBe(1);
    });

    it('reports the remaining allowance on admitted requests', async () => {
      const verdict = await fixture.controller.admit(orders());

      expect(verdict.diagnosticHeaders).toEqual({
        'X-RateLimit-Limit': '5',
        'X-RateLimit-Remaining': '4',
        'X-RateLimit-Reset': '1700000100',
      });
    });

    it('limits each client separately', async () => {
      const { controller } = fixture;
      for (let i = 0; i < 6; i++) {
        await controller.admit(orders());
      }

      const other = await controller.admit(
        orders({ identity: { clientId: 'client-b' } }),
      );
      expect(other.outcome).toBe('allow');
    });

    it('skips rules whose selector does not match', async () => {
      const verdict = await fixture.controller.admit(
        requestContext({ route: '/catalog', identity: { clientId: 'client-a' } }),
      );

      expect(verdict.outcome).toBe('allow');
      expect(verdict.rateLimit).toBeNull();
      expect(verdict.diagnosticHeaders).toEqual({});
    });

    it('admits again once the window has passed', async () => {
      const { controller, clock } = fixture;
      for (let i = 0; i < 6; i++) {
        await controller.admit(orders());
      }

      clock.advance(60_000);
      expect((await controller.admit(orders())).outcome).toBe('allow');
    });
  });

  describe('WAF', () => {
    beforeEach(() => {
      fixture = setup();
    });

    it('blocks before any counter is touched', async () => {
      const update = jest.spyOn(fixture.memoryStore, 'atomicUpdate');

      const verdict = await fixture.controller.admit(
        orders({ headers: { 'X-Scanner': 'SQLMap/1.7' } }),
      );

      expect(verdict).toMatchObject({
        outcome: 'waf_blocked',
        matchedRuleId: 'block-scanners',
        retryAfterMs: null,
      });
      expect(verdict.diagnosticHeaders).toEqual({
        'X-Block-Reason': 'block-scanners',
      });
      expect(update).not.toHaveBeenCalled();
    });

    it('records log matches on admitted requests', async () => {
      const verdict = await fixture.controller.admit(
        requestContext({ route: '/wp-admin/setup.php' }),
      );

      expect(verdict.outcome).toBe('allow');
      expect(verdict.wafLogged).toEqual(['probe-log']);
      expect(
        await metricValue(fixture.metrics.registry, 'waf_matches_total', {
          rule: 'probe-log',
          action: 'log',
        }),
      ).toBe(1);
    });

    it('escalates a rate denial to a block', async () => {
      const { controller } = fixture;
      const suspicious = () => orders({ headers: { 'x-suspicious': 'yes' } });
      for (let i = 0; i < 5; i++) {
        expect((await controller.admit(suspicious())).outcome).toBe('allow');
      }

      const verdict = await controller.admit(suspicious());

      expect(verdict).toMatchObject({
        outcome: 'waf_blocked',
        matchedRuleId: 'escalate',
        rateLimit: { ruleId: 'per-client', remaining: 0 },
      });
      expect(verdict.diagnosticHeaders['X-Block-Reason']).toBe('escalate');
    });
  });

  describe('circuit breaker', () => {
    beforeEach(() => {
      fixture = setup();
    });

    const charge = () =>
      requestContext({ route: '/payments/charge', backendId: 'payments' });

    it('rejects calls to a failing backend until the wait is over', async () => {
      const { controller, clock } = fixture;
      expect((await controller.admit(charge())).outcome).toBe('allow');
      for (let i = 0; i < 10; i++) {
        controller.recordOutcome('payments', false);
      }

      const verdict = await controller.admit(charge());
      expect(verdict).toMatchObject({
        outcome: 'circuit_open',
        retryAfterMs: 30_000,
        matchedRuleId: 'payments',
      });
      expect(verdict.diagnosticHeaders).toEqual({ 'Retry-After': '30' });

      clock.advance(30_000);
      expect((await controller.admit(charge())).outcome).toBe('allow');
    });

    it('ignores requests without a backend', async () => {
      for (let i = 0; i < 10; i++) {
        fixture.controller.recordOutcome('payments', false);
      }

      const verdict = await fixture.controller.admit(
        requestContext({ route: '/payments/charge' }),
      );
      expect(verdict.outcome).toBe('allow');
    });
  });

  describe('counter store faults', () => {
    const unavailable = () =>
      new BrokenCounterStore(() =>
        Promise.reject(new CounterStoreUnavailableError('connection refused')),
      );

    it('fails open by default', async () => {
      fixture = setup({ store: unavailable() });

      const verdict = await fixture.controller.admit(orders());

      expect(verdict).toMatchObject({
        outcome: 'allow',
        rateLimit: null,
        degraded: {
          dependency: 'counter_store',
          reason: 'unavailable',
          policy: 'open',
        },
      });
      expect(verdict.diagnosticHeaders).toEqual({
        'X-Admission-Degraded': 'fail-open',
      });
      expect(
        await metricValue(
          fixture.metrics.registry,
          'admission_dependency_faults_total',
          { dependency: 'counter_store', reason: 'unavailable', policy: 'open' },
        ),
      ).toBe(1);
    });

    it('fails closed when configured to', async () => {
      fixture = setup({
        env: { ADMISSION_FAIL_POLICY: 'closed' },
        store: unavailable(),
      });

      const verdict = await fixture.controller.admit(orders());

      expect(verdict).toMatchObject({
        outcome: 'dependency_fault',
        matchedRuleId: 'per-client',
        degraded: { reason: 'unavailable', policy: 'closed' },
      });
      expect(verdict.diagnosticHeaders).toEqual({
        'X-Admission-Degraded': 'fail-closed',
      });
    });

    it('treats a slow store as a fault', async () => {
      fixture = setup({
        env: { COUNTER_STORE_TIMEOUT_MS: '5' },
        store: new BrokenCounterStore(() => new Promise<never>(() => undefined)),
      });

      const verdict = await fixture.controller.admit(orders());

      expect(verdict.outcome).toBe('allow');
      expect(verdict.degraded).toEqual({
        dependency: 'counter_store',
        reason: 'timeout',
        policy: 'open',
      });
    });

    it('still applies the circuit breaker when failing open', async () => {
      fixture = setup({ store: unavailable() });
      for (let i = 0; i < 10; i++) {
        fixture.controller.recordOutcome('payments', false);
      }

      const verdict = await fixture.controller.admit(
        orders({ backendId: 'payments' }),
      );

      expect(verdict.outcome).toBe('circuit_open');
      expect(verdict.degraded?.policy).toBe('open');
    });
  });

  describe('several rate rules', () => {
    const layered = {
      version: 'layered',
      rateLimits: [
        {
          id: 'tight',
          key: '{client_id}',
          algorithm: 'fixed_window',
          limit: 1,
          windowSeconds: 60,
        },
        {
          id: 'loose',
          key: '{client_id}',
          algorithm: 'token_bucket',
          limit: 100,
          windowSeconds: 60,
        },
      ],
    };

    it('stops at the first rule that denies', async () => {
      fixture = setup({ document: layered });
      const evaluate = jest.spyOn(fixture.rateLimiter, 'evaluate');

      const first = await fixture.controller.admit(orders());
      const second = await fixture.controller.admit(orders());

      expect(first.rateLimit?.ruleId).toBe('loose');
      expect(second).toMatchObject({
        outcome: 'rate_limited',
        matchedRuleId: 'tight',
      });
      expect(evaluate.mock.calls.map(([rule]) => rule.id)).toEqual([
        'tight',
        'loose',
        'tight',
      ]);
    });
  });

  describe('cancellation', () => {
    it('stops when the client has gone away', async () => {
      fixture = setup();
      const controller = new AbortController();
      controller.abort();

      await expect(
        fixture.controller.admit(orders({ signal: controller.signal })),
      ).rejects.toBeInstanceOf(AdmissionCancelledError);
      expect(
        await metricValue(fixture.metrics.registry, 'admission_decisions_total', {
          outcome: 'cancelled',
        }),
      ).toBe(1);
    });
  });
});

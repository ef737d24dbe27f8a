import { registerAs } from '@nestjs/config';
import {
  CircuitBreakerDefaults,
  SlidingWindowType,
} from '../rules/rule.types';

export type CounterStoreDriver = 'redis' | 'memory';

/**
 * What admission does when the shared counter store cannot answer:
 * `open` admits the request, `closed` rejects it.
 */
export type FailPolicy = 'open' | 'closed';

export interface ClassifierHeaders {
  clientId: string;
  apiKey: string;
  backend: string;
}

export interface BreakerTrackingOptions {
  /** Closed breakers unused for this long are dropped. */
  idleEvictMs: number;
  /** Soft cap on tracked breakers; closed ones are dropped first. */
  maxTracked: number;
}

export interface AdmissionOptions {
  counterStore: {
    driver: CounterStoreDriver;
    redisUrl: string;
    keyPrefix: string;
    timeoutMs: number;
    maxCasRetries: number;
  };
  failPolicy: FailPolicy;
  rules: {
    path: string | null;
    watch: boolean;
    watchDebounceMs: number;
  };
  maxBodySampleBytes: number;
  defaultRateLimitScope: string;
  defaultCircuitBreaker: CircuitBreakerDefaults;
  breakerTracking: BreakerTrackingOptions;
  classifierHeaders: ClassifierHeaders;
}

export const ADMISSION_OPTIONS = Symbol('ADMISSION_OPTIONS');

function int(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function float(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Builds the admission options from environment variables. Values are
 * range-checked beforehand by `validateEnvironment`.
 */
export function buildAdmissionOptions(
  env: NodeJS.ProcessEnv,
): AdmissionOptions {
  const windowType =
    env.CIRCUIT_BREAKER_DEFAULT_WINDOW_TYPE === SlidingWindowType.TIME
      ? SlidingWindowType.TIME
      : SlidingWindowType.COUNT;
  const windowSize = int(env.CIRCUIT_BREAKER_DEFAULT_WINDOW_SIZE, 20);
  const permittedCalls = int(env.CIRCUIT_BREAKER_DEFAULT_HALF_OPEN_CALLS, 3);

  return {
    counterStore: {
      driver: env.COUNTER_STORE_DRIVER === 'memory' ? 'memory' : 'redis',
      redisUrl:
        env.REDIS_URL ||
        `redis://${env.REDIS_HOST || 'localhost'}:${env.REDIS_PORT || 6379}`,
      keyPrefix: env.COUNTER_STORE_KEY_PREFIX || 'ratelimit:',
      timeoutMs: int(env.COUNTER_STORE_TIMEOUT_MS, 50),
      maxCasRetries: int(env.COUNTER_STORE_MAX_CAS_RETRIES, 5),
    },
    failPolicy: env.ADMISSION_FAIL_POLICY === 'closed' ? 'closed' : 'open',
    rules: {
      path: env.ADMISSION_RULES_PATH || null,
      watch: env.ADMISSION_RULES_WATCH !== 'false',
      watchDebounceMs: int(env.ADMISSION_RULES_WATCH_DEBOUNCE_MS, 250),
    },
    maxBodySampleBytes: int(env.ADMISSION_MAX_BODY_SAMPLE_BYTES, 8192),
    defaultRateLimitScope: env.ADMISSION_DEFAULT_SCOPE || 'route:{route}',
    defaultCircuitBreaker: {
      failureRateThreshold: float(
        env.CIRCUIT_BREAKER_DEFAULT_FAILURE_RATE,
        0.5,
      ),
      slidingWindowType: windowType,
      slidingWindowSize: windowSize,
      minimumNumberOfCalls: int(
        env.CIRCUIT_BREAKER_DEFAULT_MINIMUM_CALLS,
        windowType === SlidingWindowType.COUNT ? windowSize : 10,
      ),
      waitDurationOpenMs: int(env.CIRCUIT_BREAKER_DEFAULT_WAIT_OPEN_MS, 30000),
      halfOpenPermittedCalls: permittedCalls,
      halfOpenSuccessThreshold: int(
        env.CIRCUIT_BREAKER_DEFAULT_HALF_OPEN_SUCCESSES,
        permittedCalls,
      ),
      maxWaitInHalfOpenMs: int(env.CIRCUIT_BREAKER_DEFAULT_MAX_HALF_OPEN_MS, 0),
    },
    breakerTracking: {
      idleEvictMs: int(env.CIRCUIT_BREAKER_IDLE_EVICT_MS, 600_000),
      maxTracked: int(env.CIRCUIT_BREAKER_MAX_TRACKED, 10_000),
    },
    classifierHeaders: {
      clientId: (env.ADMISSION_CLIENT_ID_HEADER || 'x-client-id').toLowerCase(),
      apiKey: (env.ADMISSION_API_KEY_HEADER || 'x-api-key').toLowerCase(),
      backend: (env.ADMISSION_BACKEND_HEADER || 'x-backend-id').toLowerCase(),
    },
  };
}

export default registerAs('admission', () => buildAdmissionOptions(process.env));

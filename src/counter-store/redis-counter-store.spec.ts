import {
  AdmissionCancelledError,
  CounterStoreContentionError,
  CounterStoreUnavailableError,
} from '../common/errors';
import { ScriptingClient } from '../redis/redis.service';
import { StateCodec, jsonCodec } from './counter-store.interface';
import {
  COMPARE_AND_SET_SCRIPT,
  RedisCounterStore,
} from './redis-counter-store';

interface Counter {
  count: number;
}

const counterCodec: StateCodec<Counter> = jsonCodec(
  (value: unknown): value is Counter =>
    typeof value === 'object' &&
    value !== null &&
    'count' in value &&
    typeof value.count === 'number',
);

function increment(current: Counter | null) {
  const count = (current?.count ?? 0) + 1;
  return { state: { count }, result: count };
}

/**
 * Map-backed client that applies the compare-and-set script the way Redis
 * would.
 */
function fakeClient(initial: Record<string, string> = {}) {
  const data = new Map(Object.entries(initial));
  const client = {
    data,
    get: jest.fn(async (key: string) => data.get(key) ?? null),
    eval: jest.fn(
      async (
        script: string,
        options: { keys: string[]; arguments: string[] },
      ): Promise<unknown> => {
        expect(script).toBe(COMPARE_AND_SET_SCRIPT);
        const [key] = options.keys;
        const [expected, next] = options.arguments;
        const current = data.get(key) ?? '';
        if (current !== expected) {
          return 0;
        }
        if (next === '') {
          data.delete(key);
        } else {
          data.set(key, next);
        }
        return 1;
      },
    ),
  } satisfies ScriptingClient & { data: Map<string, string> };
  return client;
}

describe('RedisCounterStore', () => {
  it('writes the first state against an absent key', async () => {
    const client = fakeClient();
    const store = new RedisCounterStore({ scriptingClient: () => client }, 5);

    const result = await store.atomicUpdate('rl:a', 1500.4, counterCodec, increment);

    expect(result).toBe(1);
    expect(client.eval).toHaveBeenCalledWith(COMPARE_AND_SET_SCRIPT, {
      keys: ['rl:a'],
      arguments: ['', '{"count":1}', '1501'],
    });
    expect(client.data.get('rl:a')).toBe('{"count":1}');
  });

  it('re-reads and retries when another replica wins the race', async () => {
    const client = fakeClient({ 'rl:a': '{"count":1}' });
    client.get.mockImplementationOnce(async (key: string) => {
      const seen = client.data.get(key) ?? null;
      // Another writer lands between our GET and our compare-and-set.
      client.data.set(key, '{"count":2}');
      return seen;
    });
    const store = new RedisCounterStore({ scriptingClient: () => client }, 5);

    const result = await store.atomicUpdate('rl:a', 1000, counterCodec, increment);

    expect(result).toBe(3);
    expect(client.get).toHaveBeenCalledTimes(2);
    expect(client.eval).toHaveBeenCalledTimes(2);
    expect(client.data.get('rl:a')).toBe('{"count":3}');
  });

  it('gives up after the configured number of retries', async () => {
    const client = fakeClient();
    client.eval.mockResolvedValue(0);
    const store = new RedisCounterStore({ scriptingClient: () => client }, 2);

    await expect(
      store.atomicUpdate('rl:a', 1000, counterCodec, increment),
    ).rejects.toBeInstanceOf(CounterStoreContentionError);
    expect(client.get).toHaveBeenCalledTimes(3);
  });

  it('skips the write when the transition keeps the state', async () => {
    const client = fakeClient({ 'rl:a': '{"count":5}' });
    const store = new RedisCounterStore({ scriptingClient: () => client }, 5);

    const result = await store.atomicUpdate('rl:a', 1000, counterCodec, (current) => ({
      result: current?.count ?? 0,
    }));

    expect(result).toBe(5);
    expect(client.eval).not.toHaveBeenCalled();
  });

  it('deletes the key for a null state', async () => {
    const client = fakeClient({ 'rl:a': '{"count":5}' });
    const store = new RedisCounterStore({ scriptingClient: () => client }, 5);

    await store.atomicUpdate('rl:a', 1000, counterCodec, () => ({
      state: null,
      result: undefined,
    }));

    expect(client.eval).toHaveBeenCalledWith(COMPARE_AND_SET_SCRIPT, {
      keys: ['rl:a'],
      arguments: ['{"count":5}', '', '1000'],
    });
    expect(client.data.has('rl:a')).toBe(false);
  });

  it('treats unreadable state as absent but still guards on the raw value', async () => {
    const client = fakeClient({ 'rl:a': 'not-json' });
    const store = new RedisCounterStore({ scriptingClient: () => client }, 5);

    const result = await store.atomicUpdate('rl:a', 1000, counterCodec, increment);

    expect(result).toBe(1);
    expect(client.eval).toHaveBeenCalledWith(COMPARE_AND_SET_SCRIPT, {
      keys: ['rl:a'],
      arguments: ['not-json', '{"count":1}', '1000'],
    });
  });

  it('reports client failures as an unavailable store', async () => {
    const client = fakeClient();
    client.get.mockRejectedValue(new Error('connection reset'));
    const store = new RedisCounterStore({ scriptingClient: () => client }, 5);

    const failure = store.atomicUpdate('rl:a', 1000, counterCodec, increment);

    await expect(failure).rejects.toBeInstanceOf(CounterStoreUnavailableError);
    await expect(failure).rejects.toThrow('connection reset');
  });

  it('reports a missing connection as an unavailable store', async () => {
    const store = new RedisCounterStore(
      {
        scriptingClient: () => {
          throw new CounterStoreUnavailableError('Redis is not connected');
        },
      },
      5,
    );

    await expect(
      store.atomicUpdate('rl:a', 1000, counterCodec, increment),
    ).rejects.toThrow('Redis is not connected');
  });

  it('stops before reading once the request is cancelled', async () => {
    const client = fakeClient();
    const controller = new AbortController();
    controller.abort();
    const store = new RedisCounterStore({ scriptingClient: () => client }, 5);

    await expect(
      store.atomicUpdate('rl:a', 1000, counterCodec, increment, {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(AdmissionCancelledError);
    expect(client.get).not.toHaveBeenCalled();
  });
});

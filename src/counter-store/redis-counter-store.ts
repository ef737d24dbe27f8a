import { Logger } from '@nestjs/common';
import {
  AdmissionCancelledError,
  CounterStoreContentionError,
  CounterStoreError,
  CounterStoreUnavailableError,
} from '../common/errors';
import {
  ScriptingClient,
  ScriptingClientProvider,
} from '../redis/redis.service';
import {
  AtomicUpdateOptions,
  CounterStore,
  StateCodec,
  StateTransition,
} from './counter-store.interface';

/**
 * Writes ARGV[2] (or deletes the key when it is empty) only if the key still
 * holds ARGV[1]; an empty ARGV[1] means "key absent".
 */
export const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if (current == false and ARGV[1] == '') or current == ARGV[1] then
  if ARGV[2] == '' then
    redis.call('DEL', KEYS[1])
  else
    redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
  end
  return 1
end
return 0
`;

/**
 * Counter store on Redis: GET, compute, then a scripted compare-and-set.
 * A lost race re-reads and retries up to `maxCasRetries` times.
 */
export class RedisCounterStore implements CounterStore {
  private readonly logger = new Logger(RedisCounterStore.name);

  constructor(
    private readonly redis: ScriptingClientProvider,
    private readonly maxCasRetries: number,
  ) {}

  async atomicUpdate<S, R>(
    key: string,
    ttlMs: number,
    codec: StateCodec<S>,
    transition: (current: S | null) => StateTransition<S, R>,
    options: AtomicUpdateOptions = {},
  ): Promise<R> {
    const attempts = this.maxCasRetries + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (options.signal?.aborted) {
        throw new AdmissionCancelledError('counter store update');
      }

      const raw = await this.call(key, (client) => client.get(key));
      const current = raw === null ? null : codec.decode(raw);
      if (raw !== null && current === null) {
        this.logger.warn(`Discarding unreadable counter state at ${key}`);
      }

      const { state, result } = transition(current);
      if (state === undefined) {
        return result;
      }

      const next = state === null ? '' : codec.encode(state);
      const applied = await this.call(key, (client) =>
        client.eval(COMPARE_AND_SET_SCRIPT, {
          keys: [key],
          arguments: [raw ?? '', next, String(Math.max(1, Math.ceil(ttlMs)))],
        }),
      );
      if (applied === 1) {
        return result;
      }
      this.logger.debug(`Compare-and-set lost on ${key} (attempt ${attempt})`);
    }

    throw new CounterStoreContentionError(key, attempts);
  }

  private async call<T>(
    key: string,
    command: (client: ScriptingClient) => Promise<T>,
  ): Promise<T> {
    try {
      return await command(this.redis.scriptingClient());
    } catch (error) {
      if (error instanceof CounterStoreError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CounterStoreUnavailableError(
        `Redis command for ${key} failed: ${message}`,
        { cause: error },
      );
    }
  }
}

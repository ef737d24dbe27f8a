export const COUNTER_STORE = Symbol('COUNTER_STORE');

/**
 * Serialises one kind of counter state. `decode` returns null for anything
 * it does not recognise; such a value is then treated as absent.
 */
export interface StateCodec<S> {
  encode(state: S): string;
  decode(raw: string): S | null;
}

/**
 * Outcome of a transition. `state` undefined leaves the stored value
 * untouched, null deletes it.
 */
export interface StateTransition<S, R> {
  state?: S | null;
  result: R;
}

export interface AtomicUpdateOptions {
  signal?: AbortSignal;
}

/**
 * Shared, cross-replica counter storage.
 *
 * `atomicUpdate` reads the state under `key`, applies `transition` and
 * writes the new state with a fresh TTL as a single atomic step: no other
 * update of the same key may interleave between the read and the write.
 * `transition` must be pure since it may run more than once.
 */
export interface CounterStore {
  atomicUpdate<S, R>(
    key: string,
    ttlMs: number,
    codec: StateCodec<S>,
    transition: (current: S | null) => StateTransition<S, R>,
    options?: AtomicUpdateOptions,
  ): Promise<R>;
}

export function jsonCodec<S>(
  guard: (value: unknown) => value is S,
): StateCodec<S> {
  return {
    encode: (state) => JSON.stringify(state),
    decode: (raw) => {
      try {
        const value: unknown = JSON.parse(raw);
        return guard(value) ? value : null;
      } catch {
        return null;
      }
    },
  };
}

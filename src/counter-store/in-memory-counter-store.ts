import { OnModuleDestroy } from '@nestjs/common';
import { Clock } from '../common/clock';
import { AdmissionCancelledError } from '../common/errors';
import {
  AtomicUpdateOptions,
  CounterStore,
  StateCodec,
  StateTransition,
} from './counter-store.interface';

interface Entry {
  raw: string;
  expiresAt: number;
}

const SWEEP_INTERVAL_MS = 60_000;

/**
 * Process-local counter store for single-replica deployments and tests.
 * Updates never yield to the event loop between read and write, which makes
 * them atomic within the process.
 */
export class InMemoryCounterStore implements CounterStore, OnModuleDestroy {
  private readonly entries = new Map<string, Entry>();
  private readonly sweeper: NodeJS.Timeout;

  constructor(private readonly clock: Clock) {
    this.sweeper = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweeper.unref();
  }

  async atomicUpdate<S, R>(
    key: string,
    ttlMs: number,
    codec: StateCodec<S>,
    transition: (current: S | null) => StateTransition<S, R>,
    options: AtomicUpdateOptions = {},
  ): Promise<R> {
    if (options.signal?.aborted) {
      throw new AdmissionCancelledError('counter store update');
    }

    const now = this.clock.now();
    const entry = this.entries.get(key);
    const live = entry && entry.expiresAt > now ? entry : undefined;
    const current = live ? codec.decode(live.raw) : null;

    const { state, result } = transition(current);
    if (state === null) {
      this.entries.delete(key);
    } else if (state !== undefined) {
      this.entries.set(key, {
        raw: codec.encode(state),
        expiresAt: now + ttlMs,
      });
    }
    return result;
  }

  /** Number of live keys. */
  size(): number {
    this.sweep();
    return this.entries.size;
  }

  sweep(): void {
    const now = this.clock.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  onModuleDestroy(): void {
    clearInterval(this.sweeper);
  }
}

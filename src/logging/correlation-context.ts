import { AsyncLocalStorage } from 'async_hooks';

interface CorrelationStore {
  correlationId: string;
}

const storage = new AsyncLocalStorage<CorrelationStore>();

/**
 * Carries the correlation id of the request being handled so log lines
 * written anywhere below the middleware can include it.
 */
export const CorrelationContext = {
  run<T>(correlationId: string, callback: () => T): T {
    return storage.run({ correlationId }, callback);
  },

  correlationId(): string | undefined {
    return storage.getStore()?.correlationId;
  },
};

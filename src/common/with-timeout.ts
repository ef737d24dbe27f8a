import { CounterStoreTimeoutError } from './errors';

/**
 * Races `operation` against a timer. The timer is always cleared; the
 * operation itself is not cancelled and may still complete later.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new CounterStoreTimeoutError(timeoutMs)),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

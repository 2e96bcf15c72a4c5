import { firstValueFrom, from, timeout, TimeoutError } from 'rxjs';
import { OperationTimeoutError } from './errors';

/**
 * Races a network operation against a deadline.
 *
 * @param operation - The pending operation
 * @param timeoutMs - Deadline in milliseconds
 * @param label - Operation name used in the timeout message
 * @throws {OperationTimeoutError} When the deadline passes first
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  try {
    return await firstValueFrom(from(operation).pipe(timeout(timeoutMs)));
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new OperationTimeoutError(label, timeoutMs);
    }
    throw error;
  }
}

/**
 * Suspends the worker. Resolves early, without error, when the signal aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };

    const timer = setTimeout(finish, ms);
    signal?.addEventListener('abort', finish, { once: true });
  });

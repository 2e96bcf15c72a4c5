import { sleep, withTimeout } from '../async.utils';
import { OperationTimeoutError } from '../errors';

describe('withTimeout', () => {
  it('should resolve with the operation result', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'NOOP')).resolves.toBe('done');
  });

  it('should pass the operation error through', async () => {
    const failure = new Error('Socket closed');

    await expect(withTimeout(Promise.reject(failure), 1000, 'NOOP')).rejects.toBe(failure);
  });

  it('should raise OperationTimeoutError when the deadline passes first', async () => {
    const stalled = new Promise<never>(() => undefined);

    const error = await withTimeout(stalled, 10, 'FETCH').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OperationTimeoutError);
    expect(error).toMatchObject({ operation: 'FETCH', timeoutMs: 10, message: 'FETCH timed out after 10ms' });
  });
});

describe('sleep', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve after the given delay', async () => {
    let resolved = false;
    const pending = sleep(1000).then(() => {
      resolved = true;
    });

    await jest.advanceTimersByTimeAsync(999);
    expect(resolved).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    await pending;
    expect(resolved).toBe(true);
  });

  it('should resolve immediately for a zero delay or an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(0)).resolves.toBeUndefined();
    await expect(sleep(5000, controller.signal)).resolves.toBeUndefined();
  });

  it('should resolve early when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
    expect(jest.getTimerCount()).toBe(0);
  });
});

describe('error classes', () => {
  it('should name errors after their class', () => {
    expect(new OperationTimeoutError('LOGIN', 5).name).toBe('OperationTimeoutError');
  });
});

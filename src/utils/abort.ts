import { CancellationError } from '../errors/LifecycleErrors';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export class CallTimeoutError extends Error {
  constructor(
    public readonly operationName: string,
    public readonly timeoutMs: number
  ) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

/**
 * Sleep that rejects with CancellationError as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancellationError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancellationError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an async call with its own timeout, composed with an outer signal.
 *
 * The call receives a signal that aborts on either the timeout or the outer
 * signal. The returned promise rejects with CallTimeoutError on timeout and
 * with CancellationError when the outer signal aborts; the timer is always
 * cleared.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CancellationError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      return true;
    };

    const onAbort = (): void => {
      if (finish()) {
        controller.abort();
        reject(new CancellationError());
      }
    };

    const timer = setTimeout(() => {
      if (finish()) {
        controller.abort();
        reject(new CallTimeoutError(operationName, timeoutMs));
      }
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      value => {
        if (finish()) {
          resolve(value);
        }
      },
      (error: unknown) => {
        if (finish()) {
          reject(error);
        }
      }
    );
  });
}

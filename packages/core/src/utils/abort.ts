import { CancelledError } from '../errors';

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Races `promise` against `signal`. The returned promise rejects with
 * CancelledError as soon as the signal fires, whether or not the underlying
 * work honours the signal itself.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }

  if (signal.aborted) {
    // the raced promise may still settle later
    promise.catch(() => undefined);
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new CancelledError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return raceAbort(new Promise((resolve) => setTimeout(resolve, ms)), signal);
}

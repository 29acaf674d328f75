// ============================================
// Timeout and Abort Helpers
// ============================================

import { abortErrorFrom } from "../errors/index.js";

/**
 * Wait for `promise`, but stop waiting when `signal` aborts.
 * The underlying work is not cancelled; only this caller's wait ends.
 *
 * @throws AbortError when the signal fires first
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(abortErrorFrom(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortErrorFrom(signal));
    signal.addEventListener("abort", onAbort, { once: true });

    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Wait for `promise` for at most `timeoutMs`. The underlying work keeps
 * running after a timeout.
 *
 * @param onTimeout - Builds the error to reject with
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      settle();
    };

    const timer = setTimeout(() => finish(() => reject(onTimeout())), timeoutMs);

    void promise.then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}

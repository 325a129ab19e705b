import { OperationTimeoutError } from "@packsmith/errors";

/**
 * Wraps a promise with a deadline. Rejects with the error built by
 * `onTimeout` (an OperationTimeoutError by default) if the promise has
 * not settled within `ms`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error = () => new OperationTimeoutError("operation", ms),
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = globalThis.setTimeout(() => {
      reject(onTimeout());
    }, ms);

    promise.then(
      (value) => {
        globalThis.clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        globalThis.clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/** Resolves after `ms` milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    globalThis.setTimeout(resolve, ms);
  });
}

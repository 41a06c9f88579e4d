import { TimeoutError } from "./errors.js";

/**
 * Races a promise against a timeout. Rejects with a TimeoutError if the
 * timeout fires first, after running `onTimeout` so the caller can drop
 * whatever the promise was waiting on. The timer never keeps the process alive.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number | undefined,
  label = "Operation",
  onTimeout?: () => void,
): Promise<T> {
  if (ms === undefined || ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

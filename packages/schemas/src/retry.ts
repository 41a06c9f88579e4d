import { IoRetryExhaustedError, errorCode } from "./errors.js";

/** Error codes a socket reports when it is momentarily unable to make progress. */
const TRANSIENT_IO_CODES: ReadonlySet<string> = new Set([
  "EAGAIN",
  "EWOULDBLOCK",
  "EINTR",
  "ENOBUFS",
]);

export const DEFAULT_MAX_IO_ATTEMPTS = 100;

export interface RetryIoOptions {
  /** Label used in the error raised once attempts run out. */
  operation: string;
  maxAttempts?: number;
  isTransient?: (err: unknown) => boolean;
  /** Called before each retry with the attempt number that just failed. */
  onRetry?: (err: unknown, attempt: number) => void;
}

export function isTransientIoError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && TRANSIENT_IO_CODES.has(code);
}

/**
 * Runs an I/O operation, retrying transient failures up to `maxAttempts`.
 * Non-transient errors are rethrown on the spot. The cap is a safety valve
 * against sockets that keep failing; it is not a delivery guarantee.
 */
export async function retryIo<T>(fn: () => Promise<T>, options: RetryIoOptions): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_IO_ATTEMPTS;
  const isTransient = options.isTransient ?? isTransientIoError;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransient(err)) throw err;
      lastError = err;
      if (attempt < maxAttempts) options.onRetry?.(err, attempt);
      // Yield so the socket gets a chance to drain before the next attempt.
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  throw new IoRetryExhaustedError(options.operation, maxAttempts, lastError);
}

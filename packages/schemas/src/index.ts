export type {
  SessionPhase,
  SessionOutcome,
  SessionEventType,
  SessionEvent,
  SessionClosedPayload,
  SessionEventListener,
  Logger,
} from "./types.js";
export {
  PeerClosedError,
  IoRetryExhaustedError,
  TimeoutError,
  UnknownWordError,
  ConfigError,
  errorCode,
} from "./errors.js";
export { withTimeout } from "./timeout.js";
export { retryIo, DEFAULT_MAX_IO_ATTEMPTS } from "./retry.js";
export type { RetryIoOptions } from "./retry.js";

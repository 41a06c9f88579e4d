export class PeerClosedError extends Error {
  readonly code = "EPIPE";

  constructor(message = "peer closed the connection") {
    super(message);
    this.name = "PeerClosedError";
  }
}

export class IoRetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed after ${attempts} attempts: ${reason}`, { cause });
    this.name = "IoRetryExhaustedError";
    this.attempts = attempts;
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class UnknownWordError extends Error {
  readonly word: string;

  constructor(word: string) {
    super(`couldn't find word in word table: "${word}"`);
    this.name = "UnknownWordError";
    this.word = word;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Node system errors carry a string `code` such as "ECONNRESET". */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

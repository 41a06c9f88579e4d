import type { Logger } from "@wordgate/schemas";
import { redactPayload, redactString, secretStrings } from "./redact.js";

/**
 * Console logger with a `[scope]` prefix. Anything that matches one of the
 * secrets is replaced before it reaches the console.
 */
export class SessionLogger implements Logger {
  private readonly prefix: string;
  private readonly secrets: string[];

  constructor(scope: string, secrets: ReadonlyArray<string | Buffer> = []) {
    // Sanitize the scope to prevent log injection via newlines/control chars
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.prefix = `[${safeScope}]`;
    this.secrets = secretStrings(secrets);
  }

  /** A logger for a narrower scope that redacts the same secrets. */
  child(scope: string): SessionLogger {
    const child = new SessionLogger(scope);
    child.secrets.push(...this.secrets);
    return child;
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(...this.format(message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(...this.format(message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(...this.format(message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!process.env.WORDGATE_DEBUG) return;
    console.debug(...this.format(message, data));
  }

  private format(message: string, data?: Record<string, unknown>): [string, unknown] {
    const line = `${this.prefix} ${redactString(message, this.secrets)}`;
    return [line, data !== undefined ? redactPayload(data, this.secrets) : ""];
  }
}

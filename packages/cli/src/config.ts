import { DEFAULT_TIME_LIMIT_SECONDS } from "@wordgate/protocol";
import { ConfigError } from "@wordgate/schemas";

/** Options as commander hands them over: every value is still a string. */
export interface CliOptions {
  port: string;
  flag?: string;
  timeLimit?: string;
  readTimeout?: string;
  metricsPort?: string;
}

export interface WordgateConfig {
  port: number;
  flag: Buffer;
  timeLimitSeconds: number;
  readTimeoutMs: number | undefined;
  metricsPort: number | undefined;
}

export const MISSING_FLAG_MESSAGE =
  "couldn't get flag (either provide it in `--flag`, or a `FLAG` env var)";

export function parsePort(value: string, label = "port"): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be 1–65535)`);
  }
  return port;
}

export function parseNonNegativeInt(value: string, label: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return n;
}

export function parsePositiveInt(value: string, label: string): number {
  const n = parseNonNegativeInt(value, label);
  if (n < 1) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

/**
 * Merges command-line options with the environment. Flags win over
 * environment variables; the flag itself is required from one or the other.
 */
export function resolveConfig(opts: CliOptions, env: NodeJS.ProcessEnv): WordgateConfig {
  const port = parsePort(opts.port);

  const flag = opts.flag ?? env.FLAG;
  if (flag === undefined) throw new ConfigError(MISSING_FLAG_MESSAGE);

  const timeLimit = opts.timeLimit ?? env.WORDGATE_TIME_LIMIT;
  const readTimeout = opts.readTimeout ?? env.WORDGATE_READ_TIMEOUT_MS;
  const metricsPort = opts.metricsPort ?? env.WORDGATE_METRICS_PORT;

  return {
    port,
    flag: Buffer.from(flag, "utf-8"),
    timeLimitSeconds: timeLimit !== undefined
      ? parseNonNegativeInt(timeLimit, "time limit")
      : DEFAULT_TIME_LIMIT_SECONDS,
    readTimeoutMs: readTimeout !== undefined ? parsePositiveInt(readTimeout, "read timeout") : undefined,
    metricsPort: metricsPort !== undefined ? parsePort(metricsPort, "metrics port") : undefined,
  };
}

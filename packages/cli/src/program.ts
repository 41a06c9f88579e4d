import { Command } from "commander";
import { resolveConfig } from "./config.js";
import type { CliOptions, WordgateConfig } from "./config.js";
import { startWordgate } from "./run.js";
import type { RunningWordgate } from "./run.js";

export { resolveConfig, parsePort, parsePositiveInt, parseNonNegativeInt, MISSING_FLAG_MESSAGE } from "./config.js";
export type { CliOptions, WordgateConfig } from "./config.js";
export { startWordgate } from "./run.js";
export type { RunningWordgate } from "./run.js";

export const VERSION = "0.1.0";

export interface ProgramDeps {
  start?: (config: WordgateConfig) => Promise<RunningWordgate>;
  env?: NodeJS.ProcessEnv;
  onStarted?: (running: RunningWordgate) => void;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const start = deps.start ?? ((config: WordgateConfig) => startWordgate(config));
  const env = deps.env ?? process.env;

  const program = new Command();
  program
    .name("wordgate")
    .description("Word-association challenge server: answer four rounds in time to get the flag")
    .version(VERSION)
    .requiredOption("-p, --port <port>", "Port for the server to listen on")
    .option("-f, --flag <flag>", "Flag handed out on completion (default: FLAG env var)")
    .option("--time-limit <seconds>", "Whole seconds a player may take (default: WORDGATE_TIME_LIMIT or 5)")
    .option("--read-timeout <ms>", "Per-read idle timeout (default: WORDGATE_READ_TIMEOUT_MS, none)")
    .option("--metrics-port <port>", "Serve /health and /metrics on this port (default: WORDGATE_METRICS_PORT)")
    .action(async (opts: CliOptions) => {
      const config = resolveConfig(opts, env);
      const running = await start(config);
      deps.onStarted?.(running);
    });

  return program;
}

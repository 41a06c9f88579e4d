#!/usr/bin/env -S node --import tsx
import "dotenv/config";
import { buildProgram } from "./program.js";
import type { RunningWordgate } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[wordgate] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[wordgate] Uncaught exception:", err);
  process.exit(1);
});

function installShutdown(running: RunningWordgate): void {
  const shutdown = () => {
    running.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[wordgate] shutdown failed:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

buildProgram({ onStarted: installShutdown })
  .parseAsync()
  .catch((err: unknown) => {
    console.error(`[wordgate] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });

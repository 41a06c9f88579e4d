import type { AddressInfo } from "node:net";
import { MetricsCollector, MetricsServer } from "@wordgate/metrics";
import { ChallengeServer, DEFAULT_HOST, SessionLogger } from "@wordgate/server";
import type { WordgateConfig } from "./config.js";

export interface RunningWordgate {
  address: AddressInfo;
  metricsAddress: AddressInfo | undefined;
  shutdown(): Promise<void>;
}

/**
 * Binds the challenge listener (and the metrics endpoint when a port is
 * configured). A bind failure is reported as a single fatal error.
 */
export async function startWordgate(
  config: WordgateConfig,
  logger: SessionLogger = new SessionLogger("wordgate", [config.flag]),
): Promise<RunningWordgate> {
  const metrics = config.metricsPort !== undefined ? new MetricsCollector() : undefined;
  const server = new ChallengeServer({
    port: config.port,
    flag: config.flag,
    timeLimitSeconds: config.timeLimitSeconds,
    readTimeoutMs: config.readTimeoutMs,
    logger,
    metrics,
  });

  let address: AddressInfo;
  try {
    address = await server.listen();
  } catch (err) {
    throw new Error(`could not bind to ${DEFAULT_HOST}:${config.port}, dying`, { cause: err });
  }

  let metricsServer: MetricsServer | undefined;
  let metricsAddress: AddressInfo | undefined;
  if (metrics && config.metricsPort !== undefined) {
    metricsServer = new MetricsServer({ collector: metrics, port: config.metricsPort, logger });
    try {
      metricsAddress = await metricsServer.listen();
    } catch (err) {
      await server.close();
      throw new Error(`could not bind metrics to ${DEFAULT_HOST}:${config.metricsPort}, dying`, { cause: err });
    }
  }

  return {
    address,
    metricsAddress,
    async shutdown() {
      logger.info("shutting down");
      await Promise.all([server.close(), metricsServer?.shutdown()]);
    },
  };
}

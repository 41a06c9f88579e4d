import express from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "@wordgate/schemas";
import type { MetricsCollector } from "./metrics-collector.js";

export interface MetricsServerConfig {
  collector: MetricsCollector;
  port?: number;
  host?: string;
  logger?: Logger;
}

/** Serves `/health` and `/metrics` for the challenge server. */
export class MetricsServer {
  private readonly collector: MetricsCollector;
  private readonly port: number;
  private readonly host: string;
  private readonly logger: Logger | undefined;
  private readonly app: express.Application;
  private server: Server | null = null;
  private readonly startTime = Date.now();

  constructor(config: MetricsServerConfig) {
    this.collector = config.collector;
    this.port = config.port ?? 9464;
    this.host = config.host ?? "127.0.0.1";
    this.logger = config.logger;
    this.app = express();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", async (_req, res) => {
      try {
        res.json({
          status: "ok",
          uptime_ms: Date.now() - this.startTime,
          sessions_active: await this.collector.getActiveSessions(),
        });
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        res.status(500).json({ status: "error", error: message });
      }
    });

    this.app.get("/metrics", async (_req, res) => {
      try {
        const body = await this.collector.getMetrics();
        res.type(this.collector.getContentType()).send(body);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        res.status(500).json({ error: message });
      }
    });
  }

  async listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host);
      server.once("error", reject);
      server.once("listening", () => {
        server.off("error", reject);
        this.server = server;
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("metrics server is not listening on a TCP port"));
          return;
        }
        this.logger?.info(`metrics server listening on http://${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  async shutdown(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

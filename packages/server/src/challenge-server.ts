import { createServer } from "node:net";
import type { AddressInfo, Server, Socket } from "node:net";
import { v4 as uuid } from "uuid";
import type { MetricsCollector } from "@wordgate/metrics";
import { FramedStream, SessionEngine } from "@wordgate/protocol";
import type { SessionEvent, SessionEventListener, SessionOutcome } from "@wordgate/schemas";
import { permute } from "@wordgate/words";
import type { RandomSource } from "@wordgate/words";
import { SessionLogger } from "./session-logger.js";

export const DEFAULT_HOST = "127.0.0.1";
const SHUTDOWN_GRACE_MS = 2000;

export interface ChallengeServerConfig {
  port: number;
  flag: Buffer;
  host?: string;
  timeLimitSeconds?: number;
  readTimeoutMs?: number;
  coalesceMs?: number;
  maxIoAttempts?: number;
  logger?: SessionLogger;
  metrics?: MetricsCollector;
  onSessionEvent?: SessionEventListener;
  /** Source for the per-session shuffle. Default: the CSPRNG */
  random?: RandomSource;
  clock?: () => number;
}

/**
 * Accepts connections and runs one game per socket. Sessions run side by
 * side; a failing session is logged and never takes the listener down.
 */
export class ChallengeServer {
  private readonly config: ChallengeServerConfig;
  private readonly host: string;
  private readonly logger: SessionLogger;
  private readonly server: Server;
  private readonly sockets = new Map<string, Socket>();

  constructor(config: ChallengeServerConfig) {
    this.config = config;
    this.host = config.host ?? DEFAULT_HOST;
    this.logger = config.logger ?? new SessionLogger("wordgate", [config.flag]);
    this.server = createServer((socket) => {
      this.serve(socket).catch((err: unknown) => {
        this.logger.error(`session crashed: ${describeError(err)}`);
      });
    });
  }

  get activeSessions(): number {
    return this.sockets.size;
  }

  async listen(): Promise<AddressInfo> {
    const address = await new Promise<AddressInfo>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen(this.config.port, this.host, () => {
        this.server.off("error", onError);
        const bound = this.server.address();
        if (bound === null || typeof bound === "string") {
          reject(new Error("listener is not bound to a TCP port"));
          return;
        }
        resolve(bound);
      });
    });
    this.server.on("error", (err) => {
      this.logger.error(`listener error: ${err.message}`);
    });
    this.logger.info(`starting server on ${address.address}:${address.port}`);
    return address;
  }

  /** Stops accepting, drops live sessions and waits for the listener to close. */
  async close(): Promise<void> {
    for (const socket of this.sockets.values()) socket.destroy();
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Runs one session on an accepted socket, then shuts the socket down both ways. */
  async serve(socket: Socket): Promise<SessionOutcome> {
    const sessionId = uuid();
    const log = this.logger.child(`session:${sessionId}`);
    log.info(`received connection: ${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`);
    this.sockets.set(sessionId, socket);

    const framed = new FramedStream(socket, {
      coalesceMs: this.config.coalesceMs,
      readTimeoutMs: this.config.readTimeoutMs,
      maxIoAttempts: this.config.maxIoAttempts,
    });
    const engine = new SessionEngine({
      sessionId,
      channel: framed,
      flag: this.config.flag,
      words: permute(this.config.random),
      clock: this.config.clock,
      timeLimitSeconds: this.config.timeLimitSeconds,
      logger: log,
      onEvent: (event) => this.handleEvent(event, log),
    });

    let outcome: SessionOutcome = "io_error";
    try {
      outcome = await engine.run();
      if (outcome === "peer_closed") log.info("peer closed the connection");
    } catch (err) {
      log.error(`handling connection failed: ${describeError(err)}`);
    } finally {
      framed.detach();
      await this.shutdown(socket, log);
      this.sockets.delete(sessionId);
    }
    return outcome;
  }

  private handleEvent(event: SessionEvent, log: SessionLogger): void {
    log.debug(event.type, event.payload);
    this.config.metrics?.handleEvent(event);
    this.config.onSessionEvent?.(event);
  }

  private shutdown(socket: Socket, log: SessionLogger): Promise<void> {
    log.info("shutting down connection");
    if (socket.destroyed) {
      log.info("successfully shut down connection");
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      let failure: Error | null = null;
      const force = setTimeout(() => socket.destroy(), SHUTDOWN_GRACE_MS);
      force.unref();
      socket.once("error", (err) => { failure = err; });
      socket.once("close", () => {
        clearTimeout(force);
        if (failure) log.warn(`failed to shut down connection: ${failure.message}`);
        else log.info("successfully shut down connection");
        resolve();
      });
      socket.end(() => socket.destroy());
    });
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

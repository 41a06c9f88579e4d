import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { SessionEvent } from "@wordgate/schemas";

export interface MetricsCollectorConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
}

export class MetricsCollector {
  private readonly registry: Registry;
  private readonly prefix: string;

  // ─── Session Metrics ───────────────────────────────────────────────
  private readonly sessionsTotal: Counter;
  private readonly sessionsActive: Gauge;
  private readonly sessionDurationSeconds: Histogram;

  // ─── Game Metrics ──────────────────────────────────────────────────
  private readonly roundsPassedTotal: Counter;

  constructor(config?: MetricsCollectorConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "wordgate_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.sessionsTotal = new Counter({
      name: `${this.prefix}sessions_total`,
      help: "Finished sessions by outcome",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    this.sessionsActive = new Gauge({
      name: `${this.prefix}sessions_active`,
      help: "Number of sessions currently connected",
      registers: [this.registry],
    });

    this.sessionDurationSeconds = new Histogram({
      name: `${this.prefix}session_duration_seconds`,
      help: "Session duration in seconds by outcome",
      labelNames: ["outcome"] as const,
      buckets: [0.05, 0.1, 0.5, 1, 2, 3, 4, 5, 6, 10, 30, 60],
      registers: [this.registry],
    });

    this.roundsPassedTotal = new Counter({
      name: `${this.prefix}rounds_passed_total`,
      help: "Rounds answered correctly, by round index",
      labelNames: ["round"] as const,
      registers: [this.registry],
    });
  }

  handleEvent(event: SessionEvent): void {
    switch (event.type) {
      case "session.opened":
        this.sessionsActive.inc();
        break;

      case "session.round_passed": {
        const round = event.payload.round;
        this.roundsPassedTotal.inc({ round: typeof round === "number" ? String(round) : "unknown" });
        break;
      }

      case "session.closed": {
        const outcome = typeof event.payload.outcome === "string" ? event.payload.outcome : "unknown";
        this.sessionsTotal.inc({ outcome });
        this.sessionsActive.dec();
        const durationMs = event.payload.duration_ms;
        if (typeof durationMs === "number") {
          this.sessionDurationSeconds.observe({ outcome }, durationMs / 1000);
        }
        break;
      }

      default:
        // Phase changes are only interesting to the logs
        break;
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  /** Current value of the active-sessions gauge. */
  async getActiveSessions(): Promise<number> {
    const metric = await this.sessionsActive.get();
    return metric.values[0]?.value ?? 0;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}

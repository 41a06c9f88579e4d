export { MetricsCollector } from "./metrics-collector.js";
export type { MetricsCollectorConfig } from "./metrics-collector.js";
export { MetricsServer } from "./metrics-server.js";
export type { MetricsServerConfig } from "./metrics-server.js";

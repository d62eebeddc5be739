/**
 * Monitoring Module - Public API
 */

// Types
export type {
  MonitorSnapshot,
  MonitorStats,
  PartitionSummary,
} from "./schema.js";

export { INITIAL_MONITOR_STATS } from "./schema.js";

export type { MonitorOptions } from "./service.js";
export { Monitor } from "./service.js";

/**
 * Monitoring Module - Schemas and Types
 *
 * Defines the run loop's counters and the status snapshot served by
 * the API.
 */
import type { ArmedMode } from "../panel/index.js";
import type { SupervisorSnapshot } from "../supervisor/index.js";

// =============================================================================
// Counters
// =============================================================================

export type MonitorStats = {
  /** Run loop passes completed. */
  cycles: number;
  /** Change events dispatched. */
  changes: number;
  /** Bus publishes attempted. */
  published: number;
  notificationsSent: number;
  notificationsFailed: number;
  /** Buffer overflow advisories seen. */
  overflows: number;
  /** Commands received on the bus. */
  commands: number;
};

export const INITIAL_MONITOR_STATS: Readonly<MonitorStats> = {
  cycles: 0,
  changes: 0,
  published: 0,
  notificationsSent: 0,
  notificationsFailed: 0,
  overflows: 0,
  commands: 0,
};

// =============================================================================
// Snapshot
// =============================================================================

export type PartitionSummary = Readonly<{
  partition: number;
  armed: boolean;
  armedMode: ArmedMode;
  exitDelay: boolean;
  alarm: boolean;
  fire: boolean;
  disabled: boolean;
}>;

/**
 * Current system state snapshot.
 */
export type MonitorSnapshot = Readonly<{
  running: boolean;
  busEnabled: boolean;
  notificationsEnabled: boolean;
  supervisor: SupervisorSnapshot | null;
  keybusConnected: boolean;
  powerTrouble: boolean;
  trouble: boolean;
  partitions: ReadonlyArray<PartitionSummary>;
  openZones: ReadonlyArray<number>;
  alarmZones: ReadonlyArray<number>;
  stats: Readonly<MonitorStats>;
}>;

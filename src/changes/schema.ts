/**
 * Changes Module - Schemas and Types
 *
 * Structured change events produced by the change tracker.
 * One event per consumed changed flag.
 */
import type { ArmedMode, KeypadButton } from "../panel/index.js";

// =============================================================================
// Partition Snapshot
// =============================================================================

/**
 * Partition values at the moment a flag was consumed.
 */
export type PartitionSnapshot = Readonly<{
  armed: boolean;
  armedMode: ArmedMode;
  exitDelay: boolean;
  alarm: boolean;
}>;

// =============================================================================
// Change Events
// =============================================================================

export type PartitionChange = Readonly<{
  subject: "armed" | "exitDelay" | "alarm";
  partition: number;
  value: boolean;
  state: PartitionSnapshot;
}>;

export type FireChange = Readonly<{
  subject: "fire";
  partition: number;
  value: boolean;
}>;

export type ZoneChange = Readonly<{
  subject: "openZone" | "alarmZone";
  zone: number;
  value: boolean;
}>;

export type SystemChange = Readonly<{
  subject: "power" | "keybus" | "trouble";
  value: boolean;
}>;

export type KeypadAlarmChange = Readonly<{
  subject: "keypadAlarm";
  button: KeypadButton;
}>;

/**
 * Union of all change events.
 */
export type Change =
  | PartitionChange
  | FireChange
  | ZoneChange
  | SystemChange
  | KeypadAlarmChange;

export type ChangeSubject = Change["subject"];

// =============================================================================
// Advisories
// =============================================================================

/**
 * Non-fatal condition reported by the panel source. Not a change:
 * nothing is published for it and nothing can be recovered.
 */
export type Advisory = Readonly<{
  subject: "advisory";
  advisory: "BUFFER_OVERFLOW";
}>;

export type TrackerEvent = Change | Advisory;

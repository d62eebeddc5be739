/**
 * Panel Module - Schemas and Types
 *
 * Defines the status model published by the panel-bus decoder.
 * The decoder owns and mutates the values; consumers read them and
 * clear the paired changed flags.
 */
import type { ZoneBitset } from "./bitset.js";

// =============================================================================
// Limits
// =============================================================================

/** Partitions supported by the panel bus. */
export const MAX_PARTITIONS = 8;

/** Zone groups of 8 zones each. */
export const ZONE_GROUPS = 8;

/** Zones per group. */
export const ZONES_PER_GROUP = 8;

/** Total addressable zones (1-based numbering). */
export const MAX_ZONES = ZONE_GROUPS * ZONES_PER_GROUP;

// =============================================================================
// Partition Status
// =============================================================================

/**
 * How an armed partition was armed.
 */
export type ArmedMode = "away" | "stay" | "none";

/**
 * Status of a single partition.
 *
 * Each observable carries a one-shot changed flag, set by the decoder
 * on a transition and cleared by the change tracker on consumption.
 */
export type PartitionStatus = {
  armed: boolean;
  armedMode: ArmedMode;
  exitDelay: boolean;
  alarm: boolean;
  fire: boolean;
  /** Partition not in service - skipped by the change tracker. */
  disabled: boolean;

  armedChanged: boolean;
  exitDelayChanged: boolean;
  alarmChanged: boolean;
  fireChanged: boolean;
};

/**
 * Partition fields the decoder may update.
 */
export type PartitionUpdate = Partial<
  Pick<
    PartitionStatus,
    "armed" | "armedMode" | "exitDelay" | "alarm" | "fire" | "disabled"
  >
>;

/**
 * Initial partition status - disarmed, idle, in service.
 */
export const INITIAL_PARTITION_STATUS: Readonly<PartitionStatus> = {
  armed: false,
  armedMode: "none",
  exitDelay: false,
  alarm: false,
  fire: false,
  disabled: false,
  armedChanged: false,
  exitDelayChanged: false,
  alarmChanged: false,
  fireChanged: false,
};

// =============================================================================
// Keypad Alarm Buttons
// =============================================================================

export type KeypadButton = "fire" | "aux" | "panic";

export const KEYPAD_BUTTONS: ReadonlyArray<KeypadButton> = [
  "fire",
  "aux",
  "panic",
];

// =============================================================================
// Panel Source Contract
// =============================================================================

/**
 * Contract fulfilled by the panel-bus decoder.
 *
 * `partitions[0]` is partition 1. Zone bitsets address zones 1..64.
 */
export interface PanelSource {
  readonly partitions: ReadonlyArray<PartitionStatus>;

  readonly openZones: ZoneBitset;
  readonly openZonesChanged: ZoneBitset;
  readonly alarmZones: ZoneBitset;
  readonly alarmZonesChanged: ZoneBitset;

  readonly powerTrouble: boolean;
  powerChanged: boolean;
  readonly keybusConnected: boolean;
  keybusChanged: boolean;
  readonly trouble: boolean;
  troubleChanged: boolean;

  /** One-shot keypad alarm button presses, true until consumed. */
  readonly keypadAlarms: Record<KeypadButton, boolean>;

  /** Decoder fell behind and dropped data. */
  bufferOverflow: boolean;

  /** Summary flag - some changed flag was set since last cleared. */
  statusChanged: boolean;

  /**
   * Service the decoder. Must be called frequently, including while
   * waiting on network I/O, or the decoder buffer overflows.
   *
   * @returns true if the status changed during this call
   */
  handlePanel(): boolean;

  /**
   * Mark every tracked fact as changed so the next tracker pass
   * republishes the complete current state.
   */
  resetStatus(): void;

  /**
   * Write keypad keys to the given partition (1-based).
   */
  write(keys: string, partition: number): void;
}

/**
 * Commands Module - Schemas and Types
 *
 * Inbound arm/disarm commands received on the bus command topic.
 * Payload format: optional partition digit, then one command letter.
 * "1S" arm stay, "2A" arm away, "D" disarm partition 1.
 */

export type CommandAction = "armStay" | "armAway" | "disarm";

/**
 * Command letter to action.
 */
export const COMMAND_CODES: Readonly<Record<string, CommandAction>> = {
  S: "armStay",
  A: "armAway",
  D: "disarm",
};

/**
 * Keypad keys that arm a partition.
 */
export const ARM_KEYS: Readonly<Record<"armStay" | "armAway", string>> = {
  armStay: "s",
  armAway: "w",
};

/** Partition used when the payload carries no digit. */
export const DEFAULT_COMMAND_PARTITION = 1;

/**
 * A parsed command.
 */
export type PanelCommand = Readonly<{
  partition: number;
  action: CommandAction;
}>;

/**
 * Keys to write for an accepted command.
 */
export type PanelWriteRequest = Readonly<{
  partition: number;
  keys: string;
}>;

/**
 * Partition values a command is checked against.
 */
export type CommandPartitionState = Readonly<{
  armed: boolean;
  exitDelay: boolean;
  disabled: boolean;
}>;

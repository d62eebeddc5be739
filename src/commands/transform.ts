/**
 * Commands Module - Pure Transformations
 *
 * Parsing and acceptance rules for bus commands.
 */
import { type Result, err, ok } from "neverthrow";

import type { CommandError } from "./errors.js";
import {
  accessCodeMissing,
  disabledPartition,
  invalidPayload,
  partitionOutOfRange,
  rejectedState,
} from "./errors.js";
import type {
  CommandPartitionState,
  PanelCommand,
  PanelWriteRequest,
} from "./schema.js";
import {
  ARM_KEYS,
  COMMAND_CODES,
  DEFAULT_COMMAND_PARTITION,
} from "./schema.js";

const COMMAND_PATTERN = /^(\d)?([A-Z])$/;

/**
 * Parse a command payload.
 *
 * @param payload - Raw payload text, e.g. "1A"
 * @param partitionCount - Partitions in service
 */
export function parseCommand(
  payload: string,
  partitionCount: number,
): Result<PanelCommand, CommandError> {
  const text = payload.trim();
  const match = COMMAND_PATTERN.exec(text);
  if (!match) {
    return err(invalidPayload(text));
  }

  const [, digit, code] = match;
  const action = code !== undefined ? COMMAND_CODES[code] : undefined;
  if (!action) {
    return err(invalidPayload(text));
  }

  const partition =
    digit !== undefined ? Number(digit) : DEFAULT_COMMAND_PARTITION;
  if (partition < 1 || partition > partitionCount) {
    return err(partitionOutOfRange(partition, partitionCount));
  }

  return ok({ partition, action });
}

/**
 * Decide which keys an accepted command writes, against the partition
 * state at the time the command is received.
 *
 * - Arm stay/away: only when neither armed nor in exit delay
 * - Disarm: only when armed or in exit delay, writes the access code
 */
export function resolveCommand(
  command: PanelCommand,
  state: CommandPartitionState,
  accessCode: string | undefined,
): Result<PanelWriteRequest, CommandError> {
  const { partition, action } = command;

  if (state.disabled) {
    return err(disabledPartition(partition));
  }

  switch (action) {
    case "armStay":
    case "armAway":
      if (state.armed || state.exitDelay) {
        return err(
          rejectedState(
            action,
            partition,
            `Partition ${partition} is already armed or arming`,
          ),
        );
      }
      return ok({ partition, keys: ARM_KEYS[action] });
    case "disarm":
      if (!state.armed && !state.exitDelay) {
        return err(
          rejectedState(action, partition, `Partition ${partition} is not armed`),
        );
      }
      if (!accessCode) {
        return err(accessCodeMissing());
      }
      return ok({ partition, keys: accessCode });
  }
}

/**
 * Key identifying a command within one loop pass.
 */
export function commandKey(command: PanelCommand): string {
  return `${command.partition}:${command.action}`;
}

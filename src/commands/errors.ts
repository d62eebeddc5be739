/**
 * Commands Module - Error Types
 *
 * Typed error union for rejected bus commands.
 * Errors are values, not exceptions.
 */
import type { CommandAction } from "./schema.js";

/**
 * Union type of all command errors.
 */
export type CommandError =
  | {
      readonly type: "INVALID_PAYLOAD";
      readonly message: string;
      readonly payload: string;
    }
  | {
      readonly type: "PARTITION_OUT_OF_RANGE";
      readonly message: string;
      readonly partition: number;
    }
  | {
      readonly type: "DISABLED_PARTITION";
      readonly message: string;
      readonly partition: number;
    }
  | {
      readonly type: "REJECTED_STATE";
      readonly message: string;
      readonly action: CommandAction;
      readonly partition: number;
    }
  | {
      readonly type: "ACCESS_CODE_MISSING";
      readonly message: string;
    }
  | {
      readonly type: "DUPLICATE_IN_PASS";
      readonly message: string;
      readonly payload: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function invalidPayload(payload: string): CommandError {
  return {
    type: "INVALID_PAYLOAD",
    message: `Unrecognised command payload: "${payload}"`,
    payload,
  };
}

export function partitionOutOfRange(
  partition: number,
  partitionCount: number,
): CommandError {
  return {
    type: "PARTITION_OUT_OF_RANGE",
    message: `Partition ${partition} is outside the configured 1-${partitionCount}`,
    partition,
  };
}

export function disabledPartition(partition: number): CommandError {
  return {
    type: "DISABLED_PARTITION",
    message: `Partition ${partition} is not in service`,
    partition,
  };
}

export function rejectedState(
  action: CommandAction,
  partition: number,
  message: string,
): CommandError {
  return { type: "REJECTED_STATE", message, action, partition };
}

export function accessCodeMissing(): CommandError {
  return {
    type: "ACCESS_CODE_MISSING",
    message: "Disarm requires an access code but none is configured",
  };
}

export function duplicateInPass(payload: string): CommandError {
  return {
    type: "DUPLICATE_IN_PASS",
    message: `Command "${payload}" already handled in this pass`,
    payload,
  };
}

/**
 * Format a command error for logging.
 */
export function formatCommandError(error: CommandError): string {
  return `${error.type}: ${error.message}`;
}

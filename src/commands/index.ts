/**
 * Commands Module - Public API
 */

// Types
export type {
  CommandAction,
  CommandPartitionState,
  PanelCommand,
  PanelWriteRequest,
} from "./schema.js";

export {
  ARM_KEYS,
  COMMAND_CODES,
  DEFAULT_COMMAND_PARTITION,
} from "./schema.js";

// Error types
export type { CommandError } from "./errors.js";

export {
  accessCodeMissing,
  disabledPartition,
  duplicateInPass,
  formatCommandError,
  invalidPayload,
  partitionOutOfRange,
  rejectedState,
} from "./errors.js";

// Service
export type { CommandHandlerOptions } from "./service.js";
export { CommandHandler } from "./service.js";

// Pure transformations
export { commandKey, parseCommand, resolveCommand } from "./transform.js";

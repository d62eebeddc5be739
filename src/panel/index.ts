/**
 * Panel Module - Public API
 *
 * Exports the panel-state contract, the zone bitset, and the
 * in-process panel state the decoder writes into.
 */

// Types
export type {
  ArmedMode,
  KeypadButton,
  PanelSource,
  PartitionStatus,
  PartitionUpdate,
} from "./schema.js";

export {
  INITIAL_PARTITION_STATUS,
  KEYPAD_BUTTONS,
  MAX_PARTITIONS,
  MAX_ZONES,
  ZONE_GROUPS,
  ZONES_PER_GROUP,
} from "./schema.js";

export { ZoneBitset } from "./bitset.js";

export type { PanelStateOptions, PanelWrite } from "./state.js";
export { PanelState, WRITE_LOG_SIZE } from "./state.js";

/**
 * Encoding Module - Public API
 *
 * Pure mapping from change events to bus messages and notification texts.
 */

// Types
export type { BusMessage, BusTopics, PartitionStatusCode } from "./schema.js";

export {
  BIRTH_MESSAGE,
  BusTopicsSchema,
  DEFAULT_BUS_TOPICS,
  LAST_WILL_MESSAGE,
} from "./schema.js";

// Pure transformations
export {
  encodeBusMessage,
  factKey,
  formatNotificationMessage,
  formatPartitionPayload,
  partitionStatusCode,
  restingStatusCode,
} from "./transform.js";

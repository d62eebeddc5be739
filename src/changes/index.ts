/**
 * Changes Module - Public API
 */

// Types
export type {
  Advisory,
  Change,
  ChangeSubject,
  FireChange,
  KeypadAlarmChange,
  PartitionChange,
  PartitionSnapshot,
  SystemChange,
  TrackerEvent,
  ZoneChange,
} from "./schema.js";

export { ChangeTracker } from "./service.js";

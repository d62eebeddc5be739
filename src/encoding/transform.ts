/**
 * Encoding Module - Pure Transformations
 *
 * Maps change events to bus messages and notification texts.
 * No side effects, no I/O - the same change always encodes to the
 * same strings, so retained topics converge whatever the order of a
 * burst of changes.
 */
import type { Change, PartitionSnapshot } from "../changes/index.js";
import type { BusMessage, BusTopics, PartitionStatusCode } from "./schema.js";
import { BIRTH_MESSAGE, LAST_WILL_MESSAGE } from "./schema.js";

// =============================================================================
// Partition Status Codes
// =============================================================================

/**
 * Status code of a partition when no transient condition is active:
 * exit delay, then armed mode, then disarmed.
 */
export function restingStatusCode(state: PartitionSnapshot): PartitionStatusCode {
  if (state.exitDelay) return "P";
  if (state.armed) return state.armedMode === "stay" ? "S" : "A";
  return "D";
}

/**
 * Status code for a partition change.
 */
export function partitionStatusCode(
  change: Readonly<{
    subject: "armed" | "exitDelay" | "alarm";
    value: boolean;
    state: PartitionSnapshot;
  }>,
): PartitionStatusCode {
  switch (change.subject) {
    case "armed":
      if (!change.value) return "D";
      return change.state.armedMode === "stay" ? "S" : "A";
    case "exitDelay":
      // Exit delay completion is not evidence of arming
      return change.value ? "P" : restingStatusCode(change.state);
    case "alarm":
      return change.value ? "T" : restingStatusCode(change.state);
  }
}

/**
 * Partition payload: 1-based partition number followed by the code.
 */
export function formatPartitionPayload(
  partition: number,
  code: PartitionStatusCode,
): string {
  return `${partition}${code}`;
}

// =============================================================================
// Bus Encoding
// =============================================================================

const flag = (value: boolean): string => (value ? "1" : "0");

/**
 * Encode a change as a bus message.
 */
export function encodeBusMessage(change: Change, topics: BusTopics): BusMessage {
  switch (change.subject) {
    case "armed":
    case "exitDelay":
    case "alarm":
      return {
        topic: `${topics.partition}${change.partition}`,
        payload: formatPartitionPayload(
          change.partition,
          partitionStatusCode(change),
        ),
        retain: true,
      };
    case "fire":
      return {
        topic: `${topics.fire}${change.partition}`,
        payload: flag(change.value),
        retain: true,
      };
    case "openZone":
      return {
        topic: `${topics.zone}${change.zone}`,
        payload: flag(change.value),
        retain: true,
      };
    case "alarmZone":
      return {
        topic: `${topics.zoneAlarm}${change.zone}`,
        payload: flag(change.value),
        retain: true,
      };
    case "trouble":
      return { topic: topics.trouble, payload: flag(change.value), retain: true };
    case "power":
      return { topic: topics.power, payload: flag(change.value), retain: true };
    case "keybus":
      return {
        topic: topics.status,
        payload: change.value ? BIRTH_MESSAGE : LAST_WILL_MESSAGE,
        retain: true,
      };
    case "keypadAlarm":
      // Button presses are events, not state
      return { topic: topics.keypad, payload: change.button, retain: false };
  }
}

// =============================================================================
// Notification Text
// =============================================================================

/**
 * Notification text for a change, or null if the change is not worth
 * a push/SMS (zone open/close, exit delay start, exit delay ending in
 * an armed partition - the armed change already reports it).
 */
export function formatNotificationMessage(change: Change): string | null {
  switch (change.subject) {
    case "armed":
      if (!change.value) return `Partition ${change.partition} disarmed`;
      return change.state.armedMode === "stay"
        ? `Partition ${change.partition} armed stay`
        : `Partition ${change.partition} armed away`;
    case "exitDelay":
      return change.value || change.state.armed
        ? null
        : `Partition ${change.partition} disarmed`;
    case "alarm":
      return change.value
        ? `Partition ${change.partition} in alarm`
        : `Partition ${change.partition} alarm restored`;
    case "fire":
      return change.value
        ? `Partition ${change.partition} fire alarm`
        : `Partition ${change.partition} fire alarm restored`;
    case "openZone":
      return null;
    case "alarmZone":
      return change.value
        ? `Zone alarm: ${change.zone}`
        : `Zone alarm restored: ${change.zone}`;
    case "power":
      return change.value ? "AC power trouble" : "AC power restored";
    case "keybus":
      return change.value ? "Keybus connected" : "Keybus disconnected";
    case "trouble":
      return change.value ? "Trouble status on" : "Trouble status restored";
    case "keypadAlarm":
      return `Keypad ${change.button} alarm`;
  }
}

/**
 * Identity of the fact a change reports, used to tell a repeated
 * notification from a new one. Keypad presses are events and have none.
 */
export function factKey(change: Change): string | null {
  switch (change.subject) {
    case "armed":
    case "exitDelay":
      return `partition:${change.partition}`;
    case "alarm":
      return `alarm:${change.partition}`;
    case "fire":
      return `fire:${change.partition}`;
    case "openZone":
    case "alarmZone":
      return `${change.subject}:${change.zone}`;
    case "power":
    case "keybus":
    case "trouble":
      return change.subject;
    case "keypadAlarm":
      return null;
  }
}

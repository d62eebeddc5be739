/**
 * Changes Module - Change Tracker
 *
 * Reads the one-shot changed flags of a panel source and yields one
 * event per set flag. Each flag is cleared immediately before its
 * event is yielded; the generator is lazy, so the consumer finishes
 * dispatching one fact before the next flag is read.
 *
 * Scan order: advisory, keybus, power, trouble, keypad buttons,
 * partitions 1..N (disabled skipped), open zones 1..64, alarm zones 1..64.
 */
import type { PanelSource, PartitionStatus, ZoneBitset } from "../panel/index.js";
import { KEYPAD_BUTTONS } from "../panel/index.js";
import type {
  PartitionSnapshot,
  TrackerEvent,
  ZoneChange,
} from "./schema.js";

export class ChangeTracker {
  constructor(private readonly panel: PanelSource) {}

  /**
   * True if a pass would yield at least one event.
   */
  hasPending(): boolean {
    return this.panel.statusChanged || this.panel.bufferOverflow;
  }

  /**
   * Consume every set changed flag, in scan order.
   */
  *changes(): Generator<TrackerEvent, void, undefined> {
    const panel = this.panel;
    panel.statusChanged = false;

    if (panel.bufferOverflow) {
      panel.bufferOverflow = false;
      yield { subject: "advisory", advisory: "BUFFER_OVERFLOW" };
    }

    if (panel.keybusChanged) {
      panel.keybusChanged = false;
      yield { subject: "keybus", value: panel.keybusConnected };
    }

    if (panel.powerChanged) {
      panel.powerChanged = false;
      yield { subject: "power", value: panel.powerTrouble };
    }

    if (panel.troubleChanged) {
      panel.troubleChanged = false;
      yield { subject: "trouble", value: panel.trouble };
    }

    for (const button of KEYPAD_BUTTONS) {
      if (panel.keypadAlarms[button]) {
        panel.keypadAlarms[button] = false;
        yield { subject: "keypadAlarm", button };
      }
    }

    for (let index = 0; index < panel.partitions.length; index++) {
      const status = panel.partitions[index];
      if (!status || status.disabled) continue;
      yield* this.partitionChanges(index + 1, status);
    }

    yield* this.zoneChanges("openZone", panel.openZones, panel.openZonesChanged);
    yield* this.zoneChanges(
      "alarmZone",
      panel.alarmZones,
      panel.alarmZonesChanged,
    );
  }

  private *partitionChanges(
    partition: number,
    status: PartitionStatus,
  ): Generator<TrackerEvent, void, undefined> {
    if (status.armedChanged) {
      status.armedChanged = false;
      yield {
        subject: "armed",
        partition,
        value: status.armed,
        state: snapshot(status),
      };
    }

    // Exit delay ending is reported even when the partition never armed
    if (status.exitDelayChanged) {
      status.exitDelayChanged = false;
      yield {
        subject: "exitDelay",
        partition,
        value: status.exitDelay,
        state: snapshot(status),
      };
    }

    if (status.alarmChanged) {
      status.alarmChanged = false;
      yield {
        subject: "alarm",
        partition,
        value: status.alarm,
        state: snapshot(status),
      };
    }

    if (status.fireChanged) {
      status.fireChanged = false;
      yield { subject: "fire", partition, value: status.fire };
    }
  }

  private *zoneChanges(
    subject: ZoneChange["subject"],
    state: ZoneBitset,
    changed: ZoneBitset,
  ): Generator<TrackerEvent, void, undefined> {
    for (const zone of changed.zones()) {
      // Skip slots cleared after the group was read
      if (!changed.get(zone)) continue;
      changed.clear(zone);
      yield { subject, zone, value: state.get(zone) };
    }
  }
}

function snapshot(status: PartitionStatus): PartitionSnapshot {
  return {
    armed: status.armed,
    armedMode: status.armedMode,
    exitDelay: status.exitDelay,
    alarm: status.alarm,
  };
}

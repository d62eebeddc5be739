/**
 * Panel Module - In-Process Panel State
 *
 * Implementation of the PanelSource contract that the panel-bus decoder
 * writes into. Mutators only raise a changed flag on a real transition,
 * so every flag means "differs from what was last delivered".
 */
import { createLogger } from "../logger.js";
import { ZoneBitset } from "./bitset.js";
import type {
  KeypadButton,
  PanelSource,
  PartitionStatus,
  PartitionUpdate,
} from "./schema.js";
import { INITIAL_PARTITION_STATUS, MAX_PARTITIONS } from "./schema.js";

const log = createLogger("panel");

/**
 * Keys written to the panel, for diagnostics and tests.
 */
export type PanelWrite = Readonly<{ keys: string; partition: number }>;

/** Most recent writes kept by getWrites(). */
export const WRITE_LOG_SIZE = 32;

export type PanelStateOptions = {
  /** Partitions in service (1-8). */
  partitionCount: number;
  /** Called on every service pass - the decoder hooks in here. */
  onService?: () => void;
  /** Called for every keypad write - the decoder sends the keys. */
  onWrite?: (write: PanelWrite) => void;
};

export class PanelState implements PanelSource {
  readonly partitions: PartitionStatus[];

  readonly openZones = new ZoneBitset();
  readonly openZonesChanged = new ZoneBitset();
  readonly alarmZones = new ZoneBitset();
  readonly alarmZonesChanged = new ZoneBitset();

  powerTrouble = false;
  powerChanged = false;
  keybusConnected = false;
  keybusChanged = false;
  trouble = false;
  troubleChanged = false;

  readonly keypadAlarms: Record<KeypadButton, boolean> = {
    fire: false,
    aux: false,
    panic: false,
  };

  bufferOverflow = false;
  statusChanged = false;

  private readonly writes: PanelWrite[] = [];
  private readonly onService: (() => void) | undefined;
  private readonly onWrite: ((write: PanelWrite) => void) | undefined;

  constructor(options: PanelStateOptions) {
    const { partitionCount } = options;
    if (
      !Number.isInteger(partitionCount) ||
      partitionCount < 1 ||
      partitionCount > MAX_PARTITIONS
    ) {
      throw new RangeError(`Partition count out of range: ${partitionCount}`);
    }

    this.partitions = Array.from({ length: partitionCount }, () => ({
      ...INITIAL_PARTITION_STATUS,
    }));
    this.onService = options.onService;
    this.onWrite = options.onWrite;
  }

  // ===========================================================================
  // PanelSource
  // ===========================================================================

  handlePanel(): boolean {
    this.onService?.();
    return this.statusChanged;
  }

  resetStatus(): void {
    this.statusChanged = true;
    this.keybusChanged = true;
    this.powerChanged = true;
    this.troubleChanged = true;

    for (const partition of this.partitions) {
      if (partition.disabled) continue;
      partition.armedChanged = true;
      partition.exitDelayChanged = true;
      partition.alarmChanged = true;
      partition.fireChanged = true;
    }

    this.openZonesChanged.fill();
    this.alarmZonesChanged.fill();
  }

  write(keys: string, partition: number): void {
    const entry = { keys, partition };
    this.writes.push(entry);
    if (this.writes.length > WRITE_LOG_SIZE) {
      this.writes.shift();
    }
    log.debug({ partition, length: keys.length }, "Writing keys to panel");
    this.onWrite?.(entry);
  }

  // ===========================================================================
  // Decoder-side Mutators
  // ===========================================================================

  /**
   * Apply a partition update (1-based partition number).
   */
  updatePartition(partition: number, update: PartitionUpdate): void {
    const status = this.getPartition(partition);

    if (update.disabled !== undefined) {
      status.disabled = update.disabled;
    }

    const armed = update.armed ?? status.armed;
    const armedMode = armed ? (update.armedMode ?? status.armedMode) : "none";
    if (armed !== status.armed || armedMode !== status.armedMode) {
      status.armed = armed;
      status.armedMode = armedMode;
      status.armedChanged = true;
      this.statusChanged = true;
    }

    if (update.exitDelay !== undefined && update.exitDelay !== status.exitDelay) {
      status.exitDelay = update.exitDelay;
      status.exitDelayChanged = true;
      this.statusChanged = true;
    }

    if (update.alarm !== undefined && update.alarm !== status.alarm) {
      status.alarm = update.alarm;
      status.alarmChanged = true;
      this.statusChanged = true;
    }

    if (update.fire !== undefined && update.fire !== status.fire) {
      status.fire = update.fire;
      status.fireChanged = true;
      this.statusChanged = true;
    }
  }

  setZoneOpen(zone: number, open: boolean): void {
    if (this.openZones.get(zone) === open) return;
    this.openZones.set(zone, open);
    this.openZonesChanged.set(zone);
    this.statusChanged = true;
  }

  setZoneAlarm(zone: number, alarm: boolean): void {
    if (this.alarmZones.get(zone) === alarm) return;
    this.alarmZones.set(zone, alarm);
    this.alarmZonesChanged.set(zone);
    this.statusChanged = true;
  }

  setPowerTrouble(powerTrouble: boolean): void {
    if (this.powerTrouble === powerTrouble) return;
    this.powerTrouble = powerTrouble;
    this.powerChanged = true;
    this.statusChanged = true;
  }

  setKeybusConnected(connected: boolean): void {
    if (this.keybusConnected === connected) return;
    this.keybusConnected = connected;
    this.keybusChanged = true;
    this.statusChanged = true;
  }

  setTrouble(trouble: boolean): void {
    if (this.trouble === trouble) return;
    this.trouble = trouble;
    this.troubleChanged = true;
    this.statusChanged = true;
  }

  pressKeypadAlarm(button: KeypadButton): void {
    this.keypadAlarms[button] = true;
    this.statusChanged = true;
  }

  flagBufferOverflow(): void {
    this.bufferOverflow = true;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /**
   * Get a partition's status (1-based).
   */
  getPartition(partition: number): PartitionStatus {
    const status = this.partitions[partition - 1];
    if (!status) {
      throw new RangeError(`Partition out of range: ${partition}`);
    }
    return status;
  }

  /**
   * The most recent keys written to the panel, oldest first.
   */
  getWrites(): ReadonlyArray<PanelWrite> {
    return this.writes;
  }
}

/**
 * Monitoring Module - Service Layer
 *
 * Main run loop of the bridge. One pass:
 * 1. Service the panel source
 * 2. Tick the connection supervisor (may force a resync)
 * 3. Open a new command pass
 * 4. For each change, in order: encode -> publish -> notify
 *
 * Dispatch is sequential: a change is published and its notification
 * finished (or abandoned) before the next flag is consumed.
 */
import type { CommandHandler } from "../commands/index.js";
import { ChangeTracker } from "../changes/index.js";
import type { Change } from "../changes/index.js";
import type { BusTopics } from "../encoding/index.js";
import {
  BusTopicsSchema,
  encodeBusMessage,
  factKey,
  formatNotificationMessage,
} from "../encoding/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { BusPublisher } from "../mqtt/index.js";
import type { NotifyClient } from "../notifications/index.js";
import type { PanelSource } from "../panel/index.js";
import { ConnectionSupervisor } from "../supervisor/index.js";
import type { MonitorSnapshot, MonitorStats } from "./schema.js";
import { INITIAL_MONITOR_STATS } from "./schema.js";

const log = createLogger("monitoring");

export type MonitorOptions = {
  panel: PanelSource;
  commands: CommandHandler;
  topics: BusTopics;
  /** Null when no broker is configured. */
  bus: BusPublisher | null;
  /** Null when notifications are not configured. */
  notifier: NotifyClient | null;
  notifyPrefix: string;
  retryIntervalMs: number;
  loopIntervalMs: number;
  /** Monotonic milliseconds. */
  clock?: () => number;
};

export class Monitor {
  private readonly panel: PanelSource;
  private readonly commands: CommandHandler;
  private readonly topics: BusTopics;
  private readonly bus: BusPublisher | null;
  private readonly notifier: NotifyClient | null;
  private readonly notifyPrefix: string;
  private readonly loopIntervalMs: number;
  private readonly clock: () => number;

  private readonly tracker: ChangeTracker;
  private readonly supervisor: ConnectionSupervisor | null;

  /** Last notification text per fact. */
  private readonly notified = new Map<string, string>();
  /** Fact/text pairs notified in the current pass. */
  private readonly notifiedThisPass = new Set<string>();
  private resyncPending = false;

  private stats: MonitorStats = { ...INITIAL_MONITOR_STATS };
  private running = false;
  private stopRequested = false;

  constructor(options: MonitorOptions) {
    this.panel = options.panel;
    this.commands = options.commands;
    this.topics = BusTopicsSchema.parse(options.topics);
    this.bus = options.bus;
    this.notifier = options.notifier;
    this.notifyPrefix = options.notifyPrefix;
    this.loopIntervalMs = options.loopIntervalMs;
    this.clock = options.clock ?? (() => performance.now());

    this.tracker = new ChangeTracker(this.panel);

    const bus = this.bus;
    if (bus) {
      bus.onMessage((topic, payload) => this.handleBusMessage(topic, payload));
      this.supervisor = new ConnectionSupervisor({
        transport: bus,
        retryIntervalMs: options.retryIntervalMs,
        resync: () => {
          this.panel.resetStatus();
          this.resyncPending = true;
        },
        onConnected: () => {
          bus.ensureSubscribed(this.topics.command);
          if (this.panel.keybusConnected) {
            bus.publishBirth();
          }
        },
      });
    } else {
      this.supervisor = null;
    }
  }

  // ===========================================================================
  // Run Loop
  // ===========================================================================

  /**
   * Single pass of the run loop.
   */
  async runCycle(now: number = this.clock()): Promise<void> {
    this.panel.handlePanel();

    if (this.supervisor?.tick(now) === "CONNECTED") {
      this.bus?.ensureSubscribed(this.topics.command);
    }

    this.commands.beginPass();
    this.notifiedThisPass.clear();

    if (this.tracker.hasPending()) {
      const resync = this.resyncPending;
      this.resyncPending = false;

      for (const event of this.tracker.changes()) {
        if (event.subject === "advisory") {
          this.stats.overflows += 1;
          log.warn("Panel buffer overflow - status updates were lost upstream");
          continue;
        }
        await this.dispatch(event, resync);
      }
    }

    this.stats.cycles += 1;
  }

  /**
   * Start the main run loop. Resolves once stop() is called.
   */
  async start(): Promise<void> {
    if (this.running) {
      log.warn("Run loop already running");
      return;
    }

    log.info(
      {
        bus: this.bus !== null,
        notifications: this.notifier?.isConfigured() ?? false,
      },
      "Starting run loop...",
    );
    this.running = true;
    this.stopRequested = false;

    while (!this.stopRequested) {
      try {
        await this.runCycle();
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        log.error({ error: message }, "Error in run loop pass");
      }

      await new Promise((resolve) => setTimeout(resolve, this.loopIntervalMs));
    }

    this.running = false;
    log.info("Run loop stopped");
  }

  /**
   * Stop the run loop and disconnect the bus.
   */
  stop(): void {
    if (!this.running) {
      log.warn("Run loop not running");
    }
    this.stopRequested = true;
    this.bus?.end();
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private async dispatch(change: Change, resync: boolean): Promise<void> {
    this.stats.changes += 1;

    if (this.bus) {
      const message = encodeBusMessage(change, this.topics);
      this.bus.publish(message.topic, message.payload, message.retain);
      this.stats.published += 1;
    }

    const notifier = this.notifier;
    if (!notifier?.isConfigured()) return;

    const text = formatNotificationMessage(change);
    if (text === null || !this.shouldNotify(change, text, resync)) return;

    const startTime = Date.now();
    logOperationStart(log, "notify", { subject: change.subject });

    const result = await notifier.send(this.notifyPrefix, text);
    if (result.isOk()) {
      this.stats.notificationsSent += 1;
      logOperationComplete(log, "notify", startTime);
    } else {
      this.stats.notificationsFailed += 1;
      logOperationFailed(log, "notify", result.error.message, {
        errorType: result.error.type,
      });
    }
  }

  /**
   * Every real transition is notified, once per fact and text within a
   * pass (armed and exit delay can both report "disarmed"). A resync
   * re-reports every fact: there only texts that differ from the last
   * one recorded are sent, and facts first seen are recorded silently.
   */
  private shouldNotify(change: Change, text: string, resync: boolean): boolean {
    const key = factKey(change);
    if (key === null) return true;

    const previous = this.notified.get(key);
    this.notified.set(key, text);

    if (resync) {
      return previous !== undefined && previous !== text;
    }

    const passKey = `${key}=${text}`;
    if (this.notifiedThisPass.has(passKey)) return false;
    this.notifiedThisPass.add(passKey);
    return true;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private handleBusMessage(topic: string, payload: string): void {
    if (topic !== this.topics.command) {
      log.debug({ topic }, "Ignoring message on unknown topic");
      return;
    }
    this.stats.commands += 1;
    this.commands.handle(payload);
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  isRunning(): boolean {
    return this.running;
  }

  getSnapshot(): MonitorSnapshot {
    const panel = this.panel;

    return {
      running: this.running,
      busEnabled: this.bus !== null,
      notificationsEnabled: this.notifier?.isConfigured() ?? false,
      supervisor: this.supervisor?.getSnapshot() ?? null,
      keybusConnected: panel.keybusConnected,
      powerTrouble: panel.powerTrouble,
      trouble: panel.trouble,
      partitions: panel.partitions.map((status, index) => ({
        partition: index + 1,
        armed: status.armed,
        armedMode: status.armedMode,
        exitDelay: status.exitDelay,
        alarm: status.alarm,
        fire: status.fire,
        disabled: status.disabled,
      })),
      openZones: [...panel.openZones.zones()],
      alarmZones: [...panel.alarmZones.zones()],
      stats: { ...this.stats },
    };
  }
}

/**
 * Supervisor Module - Connection Supervisor
 *
 * DISCONNECTED -> CONNECTING -> CONNECTED, and CONNECTED -> DISCONNECTED
 * on link loss. tick() never blocks: a reconnect is attempted only when
 * the retry interval has elapsed since the previous attempt.
 *
 * Every entry into CONNECTED, the first one included, forces a full
 * resync: retained topics only hold the last value and consumers may
 * have restarted while the link was down.
 */
import { createLogger } from "../logger.js";
import type {
  ConnectionState,
  SupervisedTransport,
  SupervisorSnapshot,
} from "./schema.js";
import { DEFAULT_RETRY_INTERVAL_MS } from "./schema.js";

const log = createLogger("supervisor");

export type ConnectionSupervisorOptions = {
  transport: SupervisedTransport;
  /** Marks all tracked facts as changed. */
  resync: () => void;
  /** Runs after resync on every connection (subscribe, birth message). */
  onConnected?: () => void;
  retryIntervalMs?: number;
};

export class ConnectionSupervisor {
  private state: ConnectionState = "DISCONNECTED";
  private attempts = 0;
  private connections = 0;
  private lastAttemptAt: number | null = null;
  private connectedSince: number | null = null;

  private readonly transport: SupervisedTransport;
  private readonly resync: () => void;
  private readonly onConnected: (() => void) | undefined;
  private readonly retryIntervalMs: number;

  constructor(options: ConnectionSupervisorOptions) {
    this.transport = options.transport;
    this.resync = options.resync;
    this.onConnected = options.onConnected;
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
  }

  /**
   * Advance the connection state machine.
   *
   * @param now - Monotonic milliseconds
   * @returns The state after this tick
   */
  tick(now: number): ConnectionState {
    if (this.state === "CONNECTED") {
      if (this.transport.service()) {
        return this.state;
      }
      log.warn("Bus connection lost");
      this.state = "DISCONNECTED";
      this.connectedSince = null;
    }

    if (this.state === "CONNECTING") {
      if (this.transport.isConnected()) {
        this.enterConnected(now);
        return this.state;
      }
      if (!this.intervalElapsed(now)) {
        return this.state;
      }
      log.warn({ attempt: this.attempts }, "Bus connection attempt failed");
      this.state = "DISCONNECTED";
    }

    if (this.intervalElapsed(now)) {
      this.attempt(now);
    }

    return this.state;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === "CONNECTED";
  }

  getSnapshot(): SupervisorSnapshot {
    return {
      state: this.state,
      attempts: this.attempts,
      connections: this.connections,
      lastAttemptAt: this.lastAttemptAt,
      connectedSince: this.connectedSince,
    };
  }

  private intervalElapsed(now: number): boolean {
    return (
      this.lastAttemptAt === null ||
      now - this.lastAttemptAt >= this.retryIntervalMs
    );
  }

  private attempt(now: number): void {
    this.attempts += 1;
    this.lastAttemptAt = now;
    this.state = "CONNECTING";
    log.debug({ attempt: this.attempts }, "Attempting bus connection");

    this.transport.connect();

    if (this.transport.isConnected()) {
      this.enterConnected(now);
    }
  }

  private enterConnected(now: number): void {
    this.state = "CONNECTED";
    this.connections += 1;
    this.connectedSince = now;
    // First attempt after a later loss is immediate
    this.lastAttemptAt = null;

    log.info(
      { attempts: this.attempts, connections: this.connections },
      "Bus connected, resyncing full state",
    );
    this.resync();
    this.onConnected?.();
  }
}

/**
 * Supervisor Module - Schemas and Types
 *
 * Connection states and the transport contract the supervisor drives.
 */

export type ConnectionState = "DISCONNECTED" | "CONNECTING" | "CONNECTED";

/**
 * A transport whose connection the supervisor manages.
 */
export interface SupervisedTransport {
  /** Start a connection attempt without blocking. */
  connect(): void;
  isConnected(): boolean;
  /**
   * Per-cycle service call while connected.
   *
   * @returns false once the link is lost
   */
  service(): boolean;
}

/** Fixed interval between reconnection attempts. */
export const DEFAULT_RETRY_INTERVAL_MS = 5000;

/**
 * Supervisor state exposed for status reporting.
 */
export type SupervisorSnapshot = Readonly<{
  state: ConnectionState;
  /** Connection attempts since start. */
  attempts: number;
  /** Successful connections since start. */
  connections: number;
  lastAttemptAt: number | null;
  connectedSince: number | null;
}>;

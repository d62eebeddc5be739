/**
 * Notifications Module - Service Layer
 *
 * Synchronous push/SMS delivery over a hand-framed HTTP/1.1 POST.
 *
 * send(): connect -> write request -> wait loop { service panel;
 * check elapsed; check data available } -> classify -> drain -> close.
 *
 * Both waits, for the connection and for the response, keep calling
 * panel.handlePanel() at its normal cadence and are bounded by the
 * response timeout: the decoder buffer overflows if it is starved for
 * the length of an HTTP round trip.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { PanelSource } from "../panel/index.js";
import { connectTls } from "./connection.js";
import {
  nonSuccessStatus,
  notConfigured,
  responseTimeout,
  transportUnavailable,
} from "./errors.js";
import type { NotificationError } from "./errors.js";
import type { ConnectFn, NotifyConnection, NotifyEndpoint } from "./schema.js";
import {
  buildNotifyRequest,
  isSuccessDigit,
  readStatusDigit,
} from "./transform.js";

const log = createLogger("notifications");

/**
 * Yield to the event loop so socket data can arrive.
 */
const yieldToEventLoop = (): Promise<void> =>
  new Promise((resolve) => setImmediate(resolve));

export type NotifyClientOptions = {
  /** Null when notifications are not configured. */
  endpoint: NotifyEndpoint | null;
  /** Serviced while waiting for the response. */
  panel: Pick<PanelSource, "handlePanel">;
  connect?: ConnectFn;
  /** Monotonic milliseconds. */
  clock?: () => number;
  /** One wait-loop step. */
  pause?: () => Promise<void>;
};

export class NotifyClient {
  private readonly endpoint: NotifyEndpoint | null;
  private readonly panel: Pick<PanelSource, "handlePanel">;
  private readonly connect: ConnectFn;
  private readonly clock: () => number;
  private readonly pause: () => Promise<void>;

  constructor(options: NotifyClientOptions) {
    this.endpoint = options.endpoint;
    this.panel = options.panel;
    this.connect = options.connect ?? connectTls;
    this.clock = options.clock ?? (() => performance.now());
    this.pause = options.pause ?? yieldToEventLoop;
  }

  isConfigured(): boolean {
    return this.endpoint !== null;
  }

  /**
   * Send one notification. Never retried here.
   *
   * @param prefix - Text placed before the message, e.g. "[Security system] "
   * @param message - Message text
   */
  async send(
    prefix: string,
    message: string,
  ): Promise<Result<void, NotificationError>> {
    const endpoint = this.endpoint;
    if (!endpoint) {
      return err(notConfigured("Notification endpoint not configured"));
    }

    const connected = await this.waitForConnection(endpoint);
    if (connected.isErr()) {
      log.error(
        { host: endpoint.host, error: connected.error.message },
        "Notification endpoint unavailable",
      );
      return err(connected.error);
    }

    const connection = connected.value;
    try {
      return await this.exchange(connection, endpoint, prefix, message);
    } finally {
      // Drain whatever is left so the next call starts clean
      const leftover = connection.read();
      if (leftover.length > 0) {
        log.trace({ bytes: leftover.length }, "Drained unread response bytes");
      }
      connection.destroy();
    }
  }

  private async exchange(
    connection: NotifyConnection,
    endpoint: NotifyEndpoint,
    prefix: string,
    message: string,
  ): Promise<Result<void, NotificationError>> {
    try {
      connection.write(buildNotifyRequest(endpoint, prefix, message));
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      log.error({ error: cause?.message }, "Failed to write notification request");
      return err(transportUnavailable("Failed to write request", cause));
    }

    const arrived = await this.waitForStatus(
      connection,
      endpoint.responseTimeoutMs,
    );
    if (!arrived) {
      log.warn(
        { timeoutMs: endpoint.responseTimeoutMs },
        "Notification response timed out",
      );
      return err(responseTimeout(endpoint.responseTimeoutMs));
    }

    const response = connection.read();
    const digit = readStatusDigit(response);

    if (!isSuccessDigit(digit)) {
      log.error(
        { statusDigit: digit, response },
        "Notification endpoint returned an error",
      );
      return err(nonSuccessStatus(digit, response));
    }

    log.info({ length: message.length }, "Notification sent");
    return ok(undefined);
  }

  /**
   * Open the connection while servicing the panel. A connection that
   * arrives after the timeout is torn down.
   */
  private async waitForConnection(
    endpoint: NotifyEndpoint,
  ): Promise<Result<NotifyConnection, NotificationError>> {
    const pending: {
      result: Result<NotifyConnection, NotificationError> | null;
      abandoned: boolean;
    } = { result: null, abandoned: false };

    void this.connect(endpoint.host, endpoint.port).then(
      (result) => {
        if (pending.abandoned) {
          if (result.isOk()) result.value.destroy();
          return;
        }
        pending.result = result;
      },
      (error: unknown) => {
        pending.result = err(
          transportUnavailable(
            "Connection failed",
            error instanceof Error ? error : undefined,
          ),
        );
      },
    );

    const start = this.clock();
    while (pending.result === null) {
      this.panel.handlePanel();

      if (this.clock() - start >= endpoint.responseTimeoutMs) {
        pending.abandoned = true;
        return err(
          transportUnavailable(
            `No connection within ${endpoint.responseTimeoutMs}ms`,
          ),
        );
      }

      await this.pause();
    }

    return pending.result;
  }

  /**
   * Wait until the leading status digit has arrived or the peer closed.
   *
   * @returns false on timeout
   */
  private async waitForStatus(
    connection: NotifyConnection,
    timeoutMs: number,
  ): Promise<boolean> {
    const start = this.clock();

    while (readStatusDigit(connection.peek()) === null) {
      if (connection.isClosed()) return true;

      this.panel.handlePanel();

      if (this.clock() - start >= timeoutMs) return false;

      await this.pause();
    }

    return true;
  }
}

/**
 * Notifications Module - TLS Connection
 *
 * NotifyConnection over a node:tls socket. Incoming bytes are buffered
 * as they arrive; the client polls the buffer while it keeps servicing
 * the panel.
 */
import tls from "node:tls";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { NotificationError } from "./errors.js";
import { transportUnavailable } from "./errors.js";
import type { NotifyConnection } from "./schema.js";

const log = createLogger("notifications");

/** Bound on TLS connection establishment. */
const CONNECT_TIMEOUT_MS = 10_000;

export class TlsConnection implements NotifyConnection {
  private buffer = "";
  private closed = false;

  constructor(private readonly socket: tls.TLSSocket) {
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      this.buffer += chunk;
    });
    socket.on("end", () => {
      this.closed = true;
    });
    socket.on("close", () => {
      this.closed = true;
    });
    socket.on("error", (error) => {
      log.warn({ error: error.message }, "Notification socket error");
      this.closed = true;
    });
  }

  write(data: string): void {
    this.socket.write(data, "utf8");
  }

  peek(): string {
    return this.buffer;
  }

  read(): string {
    const data = this.buffer;
    this.buffer = "";
    return data;
  }

  isClosed(): boolean {
    return this.closed;
  }

  destroy(): void {
    this.closed = true;
    this.socket.destroy();
  }
}

/**
 * Open a TLS connection. Fails fast: no retry here.
 */
export function connectTls(
  host: string,
  port: number,
): Promise<Result<NotifyConnection, NotificationError>> {
  return new Promise((resolve) => {
    const socket = tls.connect({ host, port, servername: host });

    const timer = setTimeout(() => {
      socket.destroy();
      resolve(err(transportUnavailable(`Timed out connecting to ${host}:${port}`)));
    }, CONNECT_TIMEOUT_MS);

    const onError = (error: Error) => {
      clearTimeout(timer);
      socket.destroy();
      resolve(
        err(
          transportUnavailable(
            `Could not connect to ${host}:${port}: ${error.message}`,
            error,
          ),
        ),
      );
    };

    socket.once("error", onError);
    socket.once("secureConnect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      resolve(ok(new TlsConnection(socket)));
    });
  });
}

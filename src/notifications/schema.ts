/**
 * Notifications Module - Schemas and Types
 *
 * Defines the notification endpoint and the connection contract the
 * client writes its hand-framed HTTP request to.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { NotificationError } from "./errors.js";

// =============================================================================
// Endpoint
// =============================================================================

/** Bound on the wait for a response. */
export const DEFAULT_RESPONSE_TIMEOUT_MS = 3000;

/**
 * Push/SMS endpoint. Numbers are digits only; the "+" is added when
 * the body is built.
 */
export const NotifyEndpointSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(443),
  path: z.string().startsWith("/"),
  accountId: z.string().min(1).describe("Basic auth user"),
  authToken: z.string().min(1).describe("Basic auth password"),
  to: z.string().regex(/^\d+$/, "digits only"),
  from: z.string().regex(/^\d+$/, "digits only"),
  responseTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_RESPONSE_TIMEOUT_MS),
  userAgent: z.string().default("alarm-panel-bridge/1.0"),
});

export type NotifyEndpoint = z.infer<typeof NotifyEndpointSchema>;

// =============================================================================
// Connection
// =============================================================================

/**
 * A single-use, byte-buffered connection. Connections are never reused:
 * one request, one response, drain, destroy.
 */
export interface NotifyConnection {
  /** Queue request bytes for sending. */
  write(data: string): void;
  /** Buffered response bytes, left in place. */
  peek(): string;
  /** Take and clear the buffered response bytes. */
  read(): string;
  /** True once the peer closed or the socket failed. */
  isClosed(): boolean;
  /** Tear the connection down. */
  destroy(): void;
}

/**
 * Opens a secured connection to the endpoint.
 */
export type ConnectFn = (
  host: string,
  port: number,
) => Promise<Result<NotifyConnection, NotificationError>>;

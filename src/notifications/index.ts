/**
 * Notifications Module - Public API
 *
 * Exports types, the notification client, and the pure request builders.
 */

// Types
export type {
  ConnectFn,
  NotifyConnection,
  NotifyEndpoint,
} from "./schema.js";

export {
  DEFAULT_RESPONSE_TIMEOUT_MS,
  NotifyEndpointSchema,
} from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";

export {
  nonSuccessStatus,
  notConfigured,
  responseTimeout,
  transportUnavailable,
} from "./errors.js";

// Service
export type { NotifyClientOptions } from "./service.js";
export { NotifyClient } from "./service.js";
export { connectTls, TlsConnection } from "./connection.js";

// Pure transformations
export {
  basicAuthToken,
  buildNotifyBody,
  buildNotifyRequest,
  isSuccessDigit,
  readStatusDigit,
} from "./transform.js";

/**
 * Supervisor Module - Public API
 */

// Types
export type {
  ConnectionState,
  SupervisedTransport,
  SupervisorSnapshot,
} from "./schema.js";

export { DEFAULT_RETRY_INTERVAL_MS } from "./schema.js";

export type { ConnectionSupervisorOptions } from "./service.js";
export { ConnectionSupervisor } from "./service.js";

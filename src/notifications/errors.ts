/**
 * Notifications Module - Error Types
 *
 * Typed error union for all notification failures.
 * Errors are values, not exceptions. None is retried: notifications are
 * one-shot and the caller moves on.
 */

/**
 * Union type of all possible notification errors.
 */
export type NotificationError =
  | { type: "NOT_CONFIGURED"; message: string }
  | { type: "TRANSPORT_UNAVAILABLE"; message: string; cause?: Error }
  | { type: "RESPONSE_TIMEOUT"; message: string; timeoutMs: number }
  | {
      type: "NON_SUCCESS_STATUS";
      message: string;
      statusDigit: string | null;
      response: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create a NOT_CONFIGURED error.
 */
export function notConfigured(message: string): NotificationError {
  return { type: "NOT_CONFIGURED", message };
}

/**
 * Create a TRANSPORT_UNAVAILABLE error.
 */
export function transportUnavailable(
  message: string,
  cause?: Error,
): NotificationError {
  return cause !== undefined
    ? { type: "TRANSPORT_UNAVAILABLE", message, cause }
    : { type: "TRANSPORT_UNAVAILABLE", message };
}

/**
 * Create a RESPONSE_TIMEOUT error.
 */
export function responseTimeout(timeoutMs: number): NotificationError {
  return {
    type: "RESPONSE_TIMEOUT",
    message: `No response within ${timeoutMs}ms`,
    timeoutMs,
  };
}

/**
 * Create a NON_SUCCESS_STATUS error carrying the raw response.
 */
export function nonSuccessStatus(
  statusDigit: string | null,
  response: string,
): NotificationError {
  return {
    type: "NON_SUCCESS_STATUS",
    message:
      statusDigit !== null
        ? `Endpoint returned a ${statusDigit}xx status`
        : "Endpoint returned no status line",
    statusDigit,
    response,
  };
}

/**
 * Error boundary for the status API.
 * Unhandled errors are logged with the request id and answered as JSON;
 * the run loop is unaffected by anything that fails here.
 */
import type { ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Global error handler. HTTPExceptions keep their own response.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  if (err instanceof HTTPException) {
    log.warn(
      { requestId, status: err.status, path: c.req.path },
      `HTTP ${err.status}: ${err.message}`,
    );
    return err.getResponse();
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Internal details stay out of production responses
  const message =
    process.env.NODE_ENV === "production"
      ? "Internal server error"
      : err.message;

  return c.json({ error: message, requestId, path: c.req.path }, 500);
};

/**
 * JSON 404 for unknown routes.
 */
export const notFoundHandler: NotFoundHandler = (c) => {
  return c.json(
    { error: "Not found", requestId: c.get("requestId"), path: c.req.path },
    404,
  );
};

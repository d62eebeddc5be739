/**
 * Tags each status API request with an id, taken from x-request-id when
 * the caller sent a usable one, and echoes it in the response.
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";

import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

/** Longest caller-supplied id kept as is. */
const MAX_REQUEST_ID_LENGTH = 128;

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const supplied = c.req.header("x-request-id")?.trim();
  const requestId =
    supplied && supplied.length <= MAX_REQUEST_ID_LENGTH
      ? supplied
      : randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "Status API request",
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}

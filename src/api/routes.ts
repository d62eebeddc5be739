/**
 * API routes for the Alarm Panel Bridge.
 *
 * - /api/health - Health check with connection state
 * - /api/status - Partition and zone status
 * - /api/version - App version
 */
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import type { Monitor } from "../monitoring/index.js";
import { errorHandler, notFoundHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

export type RouteDeps = {
  monitor: Pick<Monitor, "getSnapshot">;
};

/**
 * Build the API app around a running monitor.
 */
export function createApp(deps: RouteDeps): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Health endpoint - degraded while the bus is configured but down.
   */
  app.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const snapshot = deps.monitor.getSnapshot();
    const busState = snapshot.supervisor?.state ?? null;
    const healthy = snapshot.running && (busState === null || busState === "CONNECTED");

    return c.json(
      {
        status: healthy ? "ok" : "degraded",
        timestamp: new Date().toISOString(),
        requestId,
        version: APP_VERSION,
        bus: {
          enabled: snapshot.busEnabled,
          state: busState,
        },
        notificationsEnabled: snapshot.notificationsEnabled,
        keybusConnected: snapshot.keybusConnected,
      },
      healthy ? 200 : 503,
    );
  });

  /**
   * Version endpoint - returns app version.
   */
  app.get("/api/version", (c) => {
    return c.json({ version: APP_VERSION });
  });

  // ===========================================================================
  // Panel Status
  // ===========================================================================

  app.get("/api/status", (c) => {
    const requestId = c.get("requestId");
    const snapshot = deps.monitor.getSnapshot();

    return c.json({
      requestId,
      keybusConnected: snapshot.keybusConnected,
      powerTrouble: snapshot.powerTrouble,
      trouble: snapshot.trouble,
      partitions: snapshot.partitions,
      openZones: snapshot.openZones,
      alarmZones: snapshot.alarmZones,
      supervisor: snapshot.supervisor,
      stats: snapshot.stats,
    });
  });

  return app;
}

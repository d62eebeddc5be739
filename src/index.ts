/**
 * Alarm Panel Bridge - Application Entry Point
 *
 * Sets up:
 * - Panel state for the panel-bus decoder to write into
 * - MQTT bus publisher under the connection supervisor
 * - HTTP push/SMS notification client
 * - Status API (Hono on @hono/node-server)
 * - Main run loop
 */
import { serve } from "@hono/node-server";
import type { ServerType } from "@hono/node-server";

import { createBridge } from "./bridge.js";
import { config, getBusConfig, getNotifyConfig } from "./config.js";
import { createLogger } from "./logger.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  ALARM PANEL BRIDGE");
console.log("========================================");
console.log("");

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    partitions: config.PARTITION_COUNT,
    accessCodeConfigured: config.ACCESS_CODE !== undefined,
    retryIntervalMs: config.RETRY_INTERVAL_MS,
    responseTimeoutMs: config.RESPONSE_TIMEOUT_MS,
  },
  "Configuration loaded",
);

const busConfig = getBusConfig();
if (busConfig) {
  log.info(
    { broker: busConfig.brokerUrl, clientId: busConfig.clientId },
    "MQTT bus: ENABLED",
  );
} else {
  log.info("MQTT bus: DISABLED");
}

const notifyConfig = getNotifyConfig();
if (notifyConfig) {
  log.info({ host: notifyConfig.host }, "Notifications: ENABLED");
} else {
  log.info("Notifications: DISABLED");
}

console.log("");

// =============================================================================
// BRIDGE SETUP
// =============================================================================

export const bridge = createBridge(config);

// =============================================================================
// START RUN LOOP
// =============================================================================

// Start the main run loop (runs in background)
bridge.monitor.start().catch((error: unknown) => {
  log.error({ error }, "Run loop crashed");
});

// =============================================================================
// START SERVER
// =============================================================================

let server: ServerType | null = null;

if (config.ENABLE_API) {
  server = serve(
    { fetch: bridge.app.fetch, port: config.PORT, hostname: "0.0.0.0" },
    (info) => {
      log.info(
        { port: info.port, appName: config.APP_NAME },
        `🚀 ${config.APP_NAME} listening on port ${info.port}`,
      );
    },
  );
}

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Stop run loop and close MQTT client
  bridge.monitor.stop();

  server?.close();

  log.info("Shutdown complete");
  process.exit(0);
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

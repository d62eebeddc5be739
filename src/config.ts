/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Alarm Panel Bridge configuration covering:
 * - Server settings
 * - Panel (partition count, access code)
 * - MQTT bus (broker, credentials, topic prefixes)
 * - HTTP push/SMS notifications
 * - Run loop and connection supervisor timings
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8084).describe("HTTP status server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("AlarmPanelBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),
  ENABLE_API: envBoolean(true).describe("Serve the HTTP status API"),

  // ==========================================================================
  // Panel Configuration
  // ==========================================================================
  PARTITION_COUNT: z.coerce
    .number()
    .int()
    .min(1)
    .max(8)
    .default(1)
    .describe("Number of partitions in service (1-8)"),
  ACCESS_CODE: optionalString.describe(
    "Panel access code written on disarm commands",
  ),

  // ==========================================================================
  // MQTT Configuration
  // ==========================================================================
  MQTT_BROKER_URL: optionalString.describe(
    "MQTT broker connection URL - bus disabled when unset",
  ),
  MQTT_CLIENT_ID: z
    .string()
    .default("alarm-panel-bridge")
    .describe("MQTT client identifier"),
  MQTT_USERNAME: optionalString.describe("MQTT username"),
  MQTT_PASSWORD: optionalString.describe("MQTT password"),
  MQTT_TOPIC_PARTITION: z.string().default("dsc/Get/Partition"),
  MQTT_TOPIC_FIRE: z.string().default("dsc/Get/Fire"),
  MQTT_TOPIC_ZONE: z.string().default("dsc/Get/Zone"),
  MQTT_TOPIC_ZONE_ALARM: z.string().default("dsc/Get/ZoneAlarm"),
  MQTT_TOPIC_TROUBLE: z.string().default("dsc/Get/Trouble"),
  MQTT_TOPIC_POWER: z.string().default("dsc/Get/Power"),
  MQTT_TOPIC_KEYPAD: z.string().default("dsc/Get/Keypad"),
  MQTT_TOPIC_STATUS: z
    .string()
    .default("dsc/Status")
    .describe("Availability topic (birth/last-will)"),
  MQTT_TOPIC_COMMAND: z
    .string()
    .default("dsc/Set")
    .describe("Inbound arm/disarm command topic"),

  // ==========================================================================
  // HTTP Notifications (push/SMS endpoint)
  // ==========================================================================
  NOTIFY_HOST: optionalString.describe("Notification endpoint host"),
  NOTIFY_PORT: z.coerce.number().int().default(443),
  NOTIFY_ACCOUNT_ID: optionalString.describe("Endpoint account identifier"),
  NOTIFY_AUTH_TOKEN: optionalString.describe("Endpoint auth token"),
  NOTIFY_PATH: optionalString.describe(
    "Request path - defaults to /2010-04-01/Accounts/<account>/Messages.json",
  ),
  NOTIFY_TO: optionalString.describe("Destination number (digits, no +)"),
  NOTIFY_FROM: optionalString.describe("Sender number (digits, no +)"),
  NOTIFY_PREFIX: z
    .string()
    .default("[Security system] ")
    .describe("Text prepended to every notification"),
  ENABLE_NOTIFICATIONS: envBoolean(true).describe(
    "Enable HTTP push/SMS notifications",
  ),

  // ==========================================================================
  // Timings
  // ==========================================================================
  RETRY_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("Fixed interval between bus reconnection attempts (ms)"),
  RESPONSE_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("Notification response wait bound (ms)"),
  LOOP_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(10)
    .describe("Pause between run loop passes (ms)"),
});

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse an environment map into a typed config.
 */
export function parseConfig(env: Record<string, string | undefined>) {
  return ConfigSchema.safeParse(env);
}

// Parse at startup - crashes immediately if invalid
const parsed = parseConfig(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config: Config = parsed.data;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT bus configuration for the publisher and supervisor.
 * Returns null if no broker is configured.
 */
export function getBusConfig(source: Config = config): Readonly<{
  brokerUrl: string;
  clientId: string;
  username: string | undefined;
  password: string | undefined;
  retryIntervalMs: number;
}> | null {
  if (!source.MQTT_BROKER_URL) {
    return null;
  }

  return {
    brokerUrl: source.MQTT_BROKER_URL,
    clientId: source.MQTT_CLIENT_ID,
    username: source.MQTT_USERNAME,
    password: source.MQTT_PASSWORD,
    retryIntervalMs: source.RETRY_INTERVAL_MS,
  };
}

/**
 * Notification endpoint configuration.
 * Returns null if notifications are disabled or not fully configured.
 */
export function getNotifyConfig(source: Config = config): Readonly<{
  host: string;
  port: number;
  path: string;
  accountId: string;
  authToken: string;
  to: string;
  from: string;
  responseTimeoutMs: number;
}> | null {
  if (
    !source.ENABLE_NOTIFICATIONS ||
    !source.NOTIFY_HOST ||
    !source.NOTIFY_ACCOUNT_ID ||
    !source.NOTIFY_AUTH_TOKEN ||
    !source.NOTIFY_TO ||
    !source.NOTIFY_FROM
  ) {
    return null;
  }

  return {
    host: source.NOTIFY_HOST,
    port: source.NOTIFY_PORT,
    path:
      source.NOTIFY_PATH ??
      `/2010-04-01/Accounts/${source.NOTIFY_ACCOUNT_ID}/Messages.json`,
    accountId: source.NOTIFY_ACCOUNT_ID,
    authToken: source.NOTIFY_AUTH_TOKEN,
    to: source.NOTIFY_TO,
    from: source.NOTIFY_FROM,
    responseTimeoutMs: source.RESPONSE_TIMEOUT_MS,
  };
}

/**
 * MQTT topic prefixes.
 */
export function getBusTopics(source: Config = config) {
  return {
    partition: source.MQTT_TOPIC_PARTITION,
    fire: source.MQTT_TOPIC_FIRE,
    zone: source.MQTT_TOPIC_ZONE,
    zoneAlarm: source.MQTT_TOPIC_ZONE_ALARM,
    trouble: source.MQTT_TOPIC_TROUBLE,
    power: source.MQTT_TOPIC_POWER,
    keypad: source.MQTT_TOPIC_KEYPAD,
    status: source.MQTT_TOPIC_STATUS,
    command: source.MQTT_TOPIC_COMMAND,
  } as const;
}

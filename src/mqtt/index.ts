/**
 * MQTT Module - Public API
 *
 * Exports the bus publisher and its client contract.
 */

// Types
export type {
  AvailabilityOptions,
  BusClient,
  BusClientFactory,
  BusClientHandlers,
  BusConnection,
} from "./schema.js";

export { BusConnectionSchema } from "./schema.js";

// Service
export type { BusMessageHandler, BusPublisherOptions } from "./service.js";
export { BusPublisher } from "./service.js";

// Client adapter
export { buildClientOptions, createMqttBusClient } from "./client.js";

/**
 * MQTT Module - Client Adapter
 *
 * Adapts the mqtt package's client to the BusClient contract.
 * Automatic reconnection is off: the connection supervisor decides
 * when to retry. QoS 0 publishes are not queued while offline.
 */
import mqtt from "mqtt";
import type { IClientOptions } from "mqtt";

import type {
  AvailabilityOptions,
  BusClient,
  BusClientHandlers,
  BusConnection,
} from "./schema.js";

/**
 * Build mqtt client options, including the retained last will.
 */
export function buildClientOptions(
  connection: BusConnection,
  availability: AvailabilityOptions,
): IClientOptions {
  const options: IClientOptions = {
    clientId: connection.clientId,
    clean: true,
    keepalive: connection.keepaliveSeconds,
    connectTimeout: connection.connectTimeoutMs,
    reconnectPeriod: 0,
    queueQoSZero: false,
    will: {
      topic: availability.statusTopic,
      payload: availability.lastWillMessage,
      qos: 0,
      retain: true,
    },
  };

  if (connection.username !== undefined) {
    options.username = connection.username;
  }
  if (connection.password !== undefined) {
    options.password = connection.password;
  }

  return options;
}

/**
 * Connect to the broker through the mqtt package.
 */
export function createMqttBusClient(
  connection: BusConnection,
  availability: AvailabilityOptions,
  handlers: BusClientHandlers,
): BusClient {
  const client = mqtt.connect(
    connection.brokerUrl,
    buildClientOptions(connection, availability),
  );

  client.on("connect", () => handlers.onConnect());
  client.on("close", () => handlers.onClose());
  client.on("error", (error) => handlers.onError(error));
  client.on("message", (topic, payload) =>
    handlers.onMessage(topic, payload.toString("utf8")),
  );

  return {
    get connected() {
      return client.connected;
    },
    publish(topic, payload, retain, callback) {
      client.publish(topic, payload, { qos: 0, retain }, (error) =>
        callback(error),
      );
    },
    subscribe(topic, callback) {
      client.subscribe(topic, { qos: 0 }, (error) =>
        callback(error ?? undefined),
      );
    },
    reconnect() {
      client.reconnect();
    },
    end() {
      client.end(true);
    },
  };
}

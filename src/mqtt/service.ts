/**
 * MQTT Module - Service Layer
 *
 * Fire-and-forget retained publishing to the broker. No queue inside:
 * a publish while offline is dropped, and the connection supervisor
 * re-drives full state after reconnecting.
 */
import { createLogger } from "../logger.js";
import { createMqttBusClient } from "./client.js";
import type {
  AvailabilityOptions,
  BusClient,
  BusClientFactory,
  BusConnection,
} from "./schema.js";

const log = createLogger("mqtt");

/**
 * Inbound message handler (command topic).
 */
export type BusMessageHandler = (topic: string, payload: string) => void;

export type BusPublisherOptions = {
  connection: BusConnection;
  availability: AvailabilityOptions;
  createClient?: BusClientFactory;
};

export class BusPublisher {
  private client: BusClient | null = null;
  private readonly subscribed = new Set<string>();
  private messageHandler: BusMessageHandler | null = null;

  private readonly connection: BusConnection;
  private readonly availability: AvailabilityOptions;
  private readonly createClient: BusClientFactory;

  constructor(options: BusPublisherOptions) {
    this.connection = options.connection;
    this.availability = options.availability;
    this.createClient = options.createClient ?? createMqttBusClient;
  }

  // ===========================================================================
  // Connection
  // ===========================================================================

  /**
   * Start a connection attempt. Returns immediately; the outcome shows
   * up in isConnected() on a later cycle.
   */
  connect(): void {
    if (this.client) {
      log.info({ broker: this.connection.brokerUrl }, "Reconnecting to MQTT broker...");
      this.client.reconnect();
      return;
    }

    log.info({ broker: this.connection.brokerUrl }, "Connecting to MQTT broker...");
    this.client = this.createClient(this.connection, this.availability, {
      onConnect: () => {
        log.info("Connected to MQTT broker");
      },
      onClose: () => {
        // Subscriptions do not survive the session (clean start)
        this.subscribed.clear();
        log.warn("MQTT connection closed");
      },
      onMessage: (topic, payload) => {
        log.debug({ topic, payload }, "MQTT message received");
        this.messageHandler?.(topic, payload);
      },
      onError: (error) => {
        log.error({ error: error.message }, "MQTT client error");
      },
    });
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  /**
   * Per-cycle service call. The client pumps keepalive and inbound
   * traffic on its own; this reports whether the link is still up.
   */
  service(): boolean {
    return this.isConnected();
  }

  /**
   * Disconnect and clean up the client.
   */
  end(): void {
    if (this.client) {
      log.info("Disconnecting MQTT client...");
      this.client.end();
      this.client = null;
      this.subscribed.clear();
    }
  }

  // ===========================================================================
  // Publish / Subscribe
  // ===========================================================================

  /**
   * Publish one message. Failures are logged and absorbed.
   */
  publish(topic: string, payload: string, retain = true): void {
    const client = this.client;
    if (!client?.connected) {
      log.debug({ topic, payload }, "Not connected, publish dropped");
      return;
    }

    client.publish(topic, payload, retain, (error) => {
      if (error) {
        log.warn({ topic, error: error.message }, "Publish failed");
      }
    });
    log.debug({ topic, payload, retain }, "Published");
  }

  /**
   * Subscribe to a topic unless already subscribed on this connection.
   * Safe to call every cycle.
   */
  ensureSubscribed(topic: string): void {
    const client = this.client;
    if (!client?.connected || this.subscribed.has(topic)) return;

    this.subscribed.add(topic);
    client.subscribe(topic, (error) => {
      if (error) {
        // Retried on the next cycle
        this.subscribed.delete(topic);
        log.error({ topic, error: error.message }, "Failed to subscribe to topic");
      } else {
        log.debug({ topic }, "Subscribed to topic");
      }
    });
  }

  isSubscribed(topic: string): boolean {
    return this.subscribed.has(topic);
  }

  /**
   * Set the handler for inbound messages.
   */
  onMessage(handler: BusMessageHandler): void {
    this.messageHandler = handler;
  }

  /**
   * Publish the retained birth message on the availability topic.
   */
  publishBirth(): void {
    this.publish(this.availability.statusTopic, this.availability.birthMessage, true);
  }
}

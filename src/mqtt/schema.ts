/**
 * MQTT Module - Schemas and Types
 *
 * Bus connection options and the narrow client contract the publisher
 * drives. The mqtt package's client is adapted to it in client.ts.
 */
import { z } from "zod";

// =============================================================================
// Connection Options
// =============================================================================

export const BusConnectionSchema = z.object({
  brokerUrl: z.string().min(1).describe("MQTT broker connection URL"),
  clientId: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  connectTimeoutMs: z.number().int().positive().default(10_000),
  keepaliveSeconds: z.number().int().positive().default(60),
});

export type BusConnection = z.infer<typeof BusConnectionSchema>;

/**
 * Retained availability message, published as the birth message after
 * each connect and registered as the last will.
 */
export type AvailabilityOptions = Readonly<{
  statusTopic: string;
  birthMessage: string;
  lastWillMessage: string;
}>;

// =============================================================================
// Client Contract
// =============================================================================

export type BusClientHandlers = {
  onConnect: () => void;
  onClose: () => void;
  onMessage: (topic: string, payload: string) => void;
  onError: (error: Error) => void;
};

/**
 * What the publisher needs from an MQTT client.
 */
export interface BusClient {
  readonly connected: boolean;
  publish(
    topic: string,
    payload: string,
    retain: boolean,
    callback: (error?: Error) => void,
  ): void;
  subscribe(topic: string, callback: (error?: Error) => void): void;
  /** Start a new connection attempt on the existing client. */
  reconnect(): void;
  end(): void;
}

/**
 * Creates a client and starts its first connection attempt.
 */
export type BusClientFactory = (
  connection: BusConnection,
  availability: AvailabilityOptions,
  handlers: BusClientHandlers,
) => BusClient;

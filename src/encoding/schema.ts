/**
 * Encoding Module - Schemas and Types
 *
 * Topic prefixes and outbound message shapes.
 */
import { z } from "zod";

// =============================================================================
// Bus Topics
// =============================================================================

/**
 * Topic prefixes. Partition and zone numbers are appended as 1-based
 * decimals.
 */
export const BusTopicsSchema = z.object({
  partition: z.string().min(1),
  fire: z.string().min(1),
  zone: z.string().min(1),
  zoneAlarm: z.string().min(1),
  trouble: z.string().min(1),
  power: z.string().min(1),
  keypad: z.string().min(1),
  status: z.string().min(1).describe("Availability topic (birth/last-will)"),
  command: z.string().min(1).describe("Inbound command topic"),
});

export type BusTopics = z.infer<typeof BusTopicsSchema>;

export const DEFAULT_BUS_TOPICS: BusTopics = {
  partition: "dsc/Get/Partition",
  fire: "dsc/Get/Fire",
  zone: "dsc/Get/Zone",
  zoneAlarm: "dsc/Get/ZoneAlarm",
  trouble: "dsc/Get/Trouble",
  power: "dsc/Get/Power",
  keypad: "dsc/Get/Keypad",
  status: "dsc/Status",
  command: "dsc/Set",
};

// =============================================================================
// Messages
// =============================================================================

/**
 * One outbound bus publish.
 */
export type BusMessage = Readonly<{
  topic: string;
  payload: string;
  retain: boolean;
}>;

/**
 * Partition status suffix letters.
 * A = armed away, S = armed stay, D = disarmed,
 * P = exit delay in progress, T = alarm triggered.
 */
export type PartitionStatusCode = "A" | "S" | "D" | "P" | "T";

/** Availability payloads on the status topic. */
export const BIRTH_MESSAGE = "online";
export const LAST_WILL_MESSAGE = "offline";

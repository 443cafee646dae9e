/**
 * Event log schema: JSONL audit stream of filter changes and deliveries.
 */

import { z } from "zod";

/** Event types: exhaustive list of observable actions. */
export const EventType = z.enum([
  // Filters
  "filter.changed",
  "filter.rejected",

  // Relay
  "relay.matched",
  "relay.skipped",

  // Delivery
  "delivery.sent",
  "delivery.updated",
  "delivery.failed",

  // System
  "system.startup",
  "system.shutdown",
]);
export type EventType = z.infer<typeof EventType>;

/** Base event structure. */
export const BaseEvent = z.object({
  /** Monotonic event ID (set by event logger). */
  eventId: z.number().int().positive(),
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Channel, admin or system that caused this event. */
  actor: z.string(),
  /** Topic the event concerns, when there is one. */
  topicId: z.number().int().positive().optional(),
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;

/** Delivery event payload. */
export const DeliveryPayload = z.object({
  channel: z.string(),
  mode: z.enum(["token", "webhook"]),
  action: z.enum(["create", "update"]),
  ts: z.string().optional(),
  error: z.string().optional(),
});
export type DeliveryPayload = z.infer<typeof DeliveryPayload>;

/**
 * Core domain types for the analytics event model.
 *
 * These types define the canonical shape of an event as it flows
 * from `trackEvent` through the durable queue to the collector.
 * They carry no framework dependencies.
 */

/**
 * Closed value type for property bags and rule operands.
 *
 * Exactly the JSON value space: every persisted or transmitted
 * property round-trips through JSON without loss.
 */
export type PropertyValue =
  | null
  | boolean
  | number
  | string
  | PropertyValue[]
  | { [key: string]: PropertyValue };

/** Ordered key/value payload attached to every event. */
export type EventProperties = Record<string, PropertyValue>;

/** Device facts captured once at event creation. */
export type DeviceSnapshot = Record<string, PropertyValue>;

export interface LocationSnapshot {
  readonly latitude: number;
  readonly longitude: number;
  readonly accuracy: number;
  readonly timestamp: number; // epoch ms
}

/**
 * Canonical Event entity.
 *
 * Immutable once created. `event_id` is assigned at creation time,
 * so every enqueued event is addressable for acknowledgement.
 */
export interface AnalyticsEvent {
  readonly event_id: string;
  readonly name: string;
  readonly timestamp: string; // ISO-8601
  readonly session_id: string | null;
  readonly user_id: string | null;
  readonly properties: EventProperties;
  readonly device: DeviceSnapshot;
  readonly location: LocationSnapshot | null;
}

/** An event waiting in the durable queue, with its delivery metadata. */
export interface QueuedEvent {
  readonly event: AnalyticsEvent;
  readonly enqueued_at: number; // epoch ms
  readonly delivery_attempts: number;
}

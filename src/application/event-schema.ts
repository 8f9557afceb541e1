import { z } from 'zod';
import type { PropertyValue } from '../domain/index.js';
import { CONSENT_STATUSES, SESSION_SOURCES } from '../domain/index.js';

export const MAX_EVENT_NAME_LENGTH = 100;
export const MAX_PROPERTY_KEY_LENGTH = 50;
export const MAX_STRING_VALUE_LENGTH = 500;
export const MAX_PROPERTIES = 50;

const EVENT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Closed JSON value. Numbers must be finite so every value survives
 * a JSON round-trip through the queue.
 */
export const propertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(propertyValueSchema),
    z.record(z.string(), propertyValueSchema),
  ]),
);

export const eventNameSchema = z
  .string()
  .trim()
  .min(1, 'Event name must not be blank')
  .max(MAX_EVENT_NAME_LENGTH, `Event name exceeds ${MAX_EVENT_NAME_LENGTH} characters`)
  .regex(EVENT_NAME_PATTERN, 'Event name may only contain letters, digits, "_" and "-"');

/**
 * Property bag accepted from host code.
 *
 * - at most 50 keys, each non-empty and at most 50 characters
 * - top-level strings at most 500 characters
 */
export const eventPropertiesSchema = z
  .record(
    z.string().min(1, 'Property key must not be empty').max(MAX_PROPERTY_KEY_LENGTH),
    propertyValueSchema,
  )
  .superRefine((props, ctx) => {
    const keys = Object.keys(props);
    if (keys.length > MAX_PROPERTIES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `At most ${MAX_PROPERTIES} properties are allowed`,
      });
    }
    for (const key of keys) {
      const value = props[key];
      if (typeof value === 'string' && value.length > MAX_STRING_VALUE_LENGTH) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `String value exceeds ${MAX_STRING_VALUE_LENGTH} characters`,
        });
      }
    }
  });

export const trackInputSchema = z.object({
  name: eventNameSchema,
  properties: eventPropertiesSchema.default({}),
});

export type TrackInput = z.infer<typeof trackInputSchema>;

const locationSnapshotSchema = z.object({
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  accuracy: z.number().finite(),
  timestamp: z.number().finite(),
});

/** A fully built event as stored in the queue and sent on the wire. */
export const analyticsEventSchema = z.object({
  event_id: z.string().min(1),
  name: z.string().min(1),
  timestamp: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }),
  session_id: z.string().nullable(),
  user_id: z.string().nullable(),
  properties: z.record(z.string(), propertyValueSchema),
  device: z.record(z.string(), propertyValueSchema),
  location: locationSnapshotSchema.nullable(),
});

export const queuedEventSchema = z.object({
  event: analyticsEventSchema,
  enqueued_at: z.number().finite(),
  delivery_attempts: z.number().int().min(0),
});

export const sessionSchema = z.object({
  session_id: z.string().min(1),
  start_time: z.number().finite(),
  end_time: z.number().finite().nullable(),
  duration_ms: z.number().finite().min(0),
  last_activity_time: z.number().finite(),
  screen_count: z.number().int().min(0),
  event_count: z.number().int().min(0),
  interaction_count: z.number().int().min(0),
  max_scroll_depth: z.number().finite().min(0),
  interruption_count: z.number().int().min(0),
  screens_viewed: z.array(z.string()),
  source: z.enum(SESSION_SOURCES),
});

export const consentRecordSchema = z.object({
  status: z.enum(CONSENT_STATUSES),
  granted_at: z.number().finite(),
});

const exportedRecordSchema = consentRecordSchema.optional();

/** Every purpose is optional on import; purposes missing from the export are left alone. */
export const consentExportSchema = z.object({
  export_timestamp: z.number().finite(),
  consents: z.object({
    analytics: exportedRecordSchema,
    advertising: exportedRecordSchema,
    location: exportedRecordSchema,
    functional: exportedRecordSchema,
    performance: exportedRecordSchema,
  }),
});

export const userProfileSchema = z.object({
  user_id: z.string().nullable(),
  attributes: z.record(z.string(), propertyValueSchema),
});

/** Joins zod issues into one log-friendly line. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

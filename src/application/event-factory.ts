import { randomUUID } from 'node:crypto';
import type { AnalyticsEvent, EventProperties } from '../domain/index.js';
import { AnalyticsError } from '../domain/index.js';
import type { DeviceInfoProvider, LocationProvider } from './ports.js';
import type { TrackInput } from './event-schema.js';
import { describeIssues, eventNameSchema, trackInputSchema } from './event-schema.js';

export type TrackValidation =
  | { readonly ok: true; readonly value: TrackInput }
  | { readonly ok: false; readonly error: AnalyticsError };

/**
 * Validates a host `trackEvent` call.
 * A bad name maps to `invalid_event_name`, a bad property bag to `invalid_event_data`.
 */
export function validateTrackInput(name: unknown, properties: unknown): TrackValidation {
  const nameCheck = eventNameSchema.safeParse(name);
  if (!nameCheck.success) {
    return { ok: false, error: new AnalyticsError('invalid_event_name', describeIssues(nameCheck.error)) };
  }

  const parsed = trackInputSchema.safeParse({ name, properties: properties ?? undefined });
  if (!parsed.success) {
    return { ok: false, error: new AnalyticsError('invalid_event_data', describeIssues(parsed.error)) };
  }
  return { ok: true, value: parsed.data };
}

export interface EventFactoryOptions {
  readonly sdkVersion: string;
  readonly device: DeviceInfoProvider;
  readonly location?: LocationProvider | undefined;
  /** Whether a location snapshot may be attached right now. */
  readonly locationAllowed?: () => boolean;
  readonly idFn?: () => string;
  readonly nowFn?: () => number;
}

export interface EventDraft {
  readonly name: string;
  readonly properties: EventProperties;
  readonly session_id: string | null;
  readonly user_id: string | null;
}

/** Stamps ids, timestamps and device/location snapshots onto validated drafts. */
export class EventFactory {
  private readonly sdkVersion: string;
  private readonly device: DeviceInfoProvider;
  private readonly location: LocationProvider | undefined;
  private readonly locationAllowed: () => boolean;
  private readonly idFn: () => string;
  private readonly nowFn: () => number;

  constructor(options: EventFactoryOptions) {
    this.sdkVersion = options.sdkVersion;
    this.device = options.device;
    this.location = options.location;
    this.locationAllowed = options.locationAllowed ?? (() => false);
    this.idFn = options.idFn ?? randomUUID;
    this.nowFn = options.nowFn ?? Date.now;
  }

  build(draft: EventDraft): AnalyticsEvent {
    const location = this.location && this.locationAllowed() ? this.location.currentLocation() : null;

    return {
      event_id: this.idFn(),
      name: draft.name,
      timestamp: new Date(this.nowFn()).toISOString(),
      session_id: draft.session_id,
      user_id: draft.user_id,
      properties: { ...draft.properties, sdk_version: this.sdkVersion },
      device: { ...this.device.currentDeviceSnapshot() },
      location,
    };
  }
}

export const CONSENT_PURPOSES = ['analytics', 'advertising', 'location', 'functional', 'performance'] as const;

/** A named category of data use with its own grant state. */
export type ConsentPurpose = (typeof CONSENT_PURPOSES)[number];

export const CONSENT_STATUSES = ['unknown', 'granted', 'denied', 'restricted', 'not_required'] as const;

export type ConsentStatus = (typeof CONSENT_STATUSES)[number];

/**
 * Stored consent decision for one purpose.
 *
 * `granted_at` is the (monotonic) time of the last write, whatever
 * the status; a `granted` record expires once it is older than the TTL.
 */
export interface ConsentRecord {
  readonly status: ConsentStatus;
  readonly granted_at: number; // epoch ms
}

/** Published to observers whenever a purpose changes status. */
export interface ConsentChange {
  readonly purpose: ConsentPurpose;
  readonly status: ConsentStatus;
  readonly previous: ConsentStatus;
}

/**
 * Portable copy of every decision, for moving consent between installs.
 * An export is only accepted while it is younger than 30 days.
 */
export interface ConsentExport {
  readonly export_timestamp: number; // epoch ms
  readonly consents: Readonly<Record<ConsentPurpose, ConsentRecord>>;
}

import type { Logger } from 'pino';
import type { ConsentChange, ConsentExport, ConsentPurpose, ConsentRecord, ConsentStatus } from '../domain/index.js';
import { AnalyticsError, CONSENT_PURPOSES } from '../domain/index.js';
import type { KeyValueStore } from './ports.js';
import { consentExportSchema, consentRecordSchema } from './event-schema.js';
import { StorageKeys, readRecord, writeRecord } from './persistence.js';
import { SerialLane } from './serial-lane.js';

export const DEFAULT_CONSENT_TTL_MS = 365 * 24 * 60 * 60 * 1000;
export const CONSENT_EXPORT_MAX_AGE_MS = 30 * 24 * 60 * 60 * 1000;

export type ConsentImportResult =
  | { readonly ok: true; readonly imported: number }
  | { readonly ok: false; readonly error: AnalyticsError };

export type ConsentListener = (change: ConsentChange) => void;

export interface ConsentGateOptions {
  readonly log: Logger;
  readonly storage: KeyValueStore;
  readonly ttlMs?: number;
  /** When false, tracking is allowed unless analytics is explicitly refused. */
  readonly requiresUserConsent?: boolean;
  readonly nowFn?: () => number;
}

const UNKNOWN: ConsentRecord = { status: 'unknown', granted_at: 0 };

/**
 * Per-purpose consent state with expiry.
 *
 * Reads are served from memory. Writes update memory first, notify
 * listeners, then persist in order through a write lane; a failed write is
 * logged and the in-memory decision stays authoritative for this process.
 */
export class ConsentGate {
  private readonly log: Logger;
  private readonly storage: KeyValueStore;
  private readonly ttlMs: number;
  private readonly requiresUserConsent: boolean;
  private readonly nowFn: () => number;
  private readonly records = new Map<ConsentPurpose, ConsentRecord>();
  private readonly listeners = new Set<ConsentListener>();
  private readonly writes = new SerialLane();
  private lastTimestamp = 0;

  constructor(options: ConsentGateOptions) {
    this.log = options.log;
    this.storage = options.storage;
    this.ttlMs = options.ttlMs ?? DEFAULT_CONSENT_TTL_MS;
    this.requiresUserConsent = options.requiresUserConsent ?? true;
    this.nowFn = options.nowFn ?? Date.now;
  }

  /** Restores persisted decisions. Corrupt records are discarded. */
  async load(): Promise<void> {
    for (const purpose of CONSENT_PURPOSES) {
      const record = await readRecord(this.storage, StorageKeys.consent(purpose), consentRecordSchema, this.log);
      if (record === null) continue;
      this.records.set(purpose, record);
      this.lastTimestamp = Math.max(this.lastTimestamp, record.granted_at);
    }
    this.log.debug({ statuses: this.statuses() }, 'Consent state loaded');
  }

  /**
   * Records a decision with a strictly increasing timestamp.
   *
   * The new status is visible to `hasConsent` as soon as this returns;
   * the returned promise settles once the record is persisted.
   */
  setConsent(purpose: ConsentPurpose, status: ConsentStatus): Promise<void> {
    const previous = this.current(purpose).status;
    const record: ConsentRecord = { status, granted_at: this.nextTimestamp() };
    this.records.set(purpose, record);

    this.log.info({ purpose, status, previous }, 'Consent updated');
    if (previous !== status) {
      this.publish({ purpose, status, previous });
    }
    return this.persist(purpose, record);
  }

  /** True iff the purpose is granted and the grant is younger than the TTL. */
  hasConsent(purpose: ConsentPurpose): boolean {
    return this.current(purpose).status === 'granted';
  }

  getStatus(purpose: ConsentPurpose): ConsentStatus {
    return this.current(purpose).status;
  }

  statuses(): Record<ConsentPurpose, ConsentStatus> {
    return {
      analytics: this.getStatus('analytics'),
      advertising: this.getStatus('advertising'),
      location: this.getStatus('location'),
      functional: this.getStatus('functional'),
      performance: this.getStatus('performance'),
    };
  }

  /**
   * Whether analytics events may be collected.
   *
   * `granted` and `not_required` always allow. Without a user-consent
   * requirement anything except `denied`/`restricted` allows.
   */
  isTrackingAllowed(): boolean {
    const status = this.getStatus('analytics');
    if (status === 'granted' || status === 'not_required') return true;
    if (!this.requiresUserConsent) return status !== 'denied' && status !== 'restricted';
    return false;
  }

  async revokeAll(): Promise<void> {
    await Promise.all(CONSENT_PURPOSES.map((purpose) => this.setConsent(purpose, 'denied')));
  }

  exportConsentData(): ConsentExport {
    return {
      export_timestamp: this.nowFn(),
      consents: {
        analytics: this.current('analytics'),
        advertising: this.current('advertising'),
        location: this.current('location'),
        functional: this.current('functional'),
        performance: this.current('performance'),
      },
    };
  }

  /**
   * Applies the statuses of an export produced by `exportConsentData`.
   *
   * Imported decisions are stamped now, like any other `setConsent`.
   * Exports older than 30 days are refused as a whole.
   */
  async importConsentData(data: unknown): Promise<ConsentImportResult> {
    const parsed = consentExportSchema.safeParse(data);
    if (!parsed.success) {
      const error = new AnalyticsError('data_corrupted', 'Malformed consent export', { cause: parsed.error });
      this.log.warn({ err: error }, 'Consent import rejected');
      return { ok: false, error };
    }

    const age = this.nowFn() - parsed.data.export_timestamp;
    if (age >= CONSENT_EXPORT_MAX_AGE_MS) {
      const error = new AnalyticsError('data_expired', 'Consent export is older than 30 days');
      this.log.warn({ age_ms: age }, 'Consent import rejected');
      return { ok: false, error };
    }

    const writes: Promise<void>[] = [];
    for (const purpose of CONSENT_PURPOSES) {
      const record = parsed.data.consents[purpose];
      if (record) writes.push(this.setConsent(purpose, record.status));
    }
    await Promise.all(writes);
    this.log.info({ imported: writes.length }, 'Consent imported');
    return { ok: true, imported: writes.length };
  }

  /** Registers a change listener; returns its unsubscribe function. */
  onChange(listener: ConsentListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once every write issued so far has been attempted. */
  settled(): Promise<void> {
    return this.writes.idle();
  }

  /** Current record, lazily reverting an expired grant to `unknown`. */
  private current(purpose: ConsentPurpose): ConsentRecord {
    const record = this.records.get(purpose) ?? UNKNOWN;
    if (record.status !== 'granted') return record;

    const age = this.nowFn() - record.granted_at;
    if (age < this.ttlMs) return record;

    const expired: ConsentRecord = { status: 'unknown', granted_at: this.nextTimestamp() };
    this.records.set(purpose, expired);
    this.log.info({ purpose, age_ms: age }, 'Consent expired');
    this.publish({ purpose, status: 'unknown', previous: 'granted' });
    void this.persist(purpose, expired);
    return expired;
  }

  private nextTimestamp(): number {
    this.lastTimestamp = Math.max(this.nowFn(), this.lastTimestamp + 1);
    return this.lastTimestamp;
  }

  private persist(purpose: ConsentPurpose, record: ConsentRecord): Promise<void> {
    return this.writes.run(async () => {
      const ok = await writeRecord(this.storage, StorageKeys.consent(purpose), record, this.log);
      if (!ok) {
        this.log.warn({ purpose }, 'Consent kept in memory only');
      }
    });
  }

  private publish(change: ConsentChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err: unknown) {
        this.log.warn({ err, purpose: change.purpose }, 'Consent listener failed');
      }
    }
  }
}

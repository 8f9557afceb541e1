import type { Logger } from 'pino';
import type { AnalyticsEvent } from '../domain/index.js';
import { AnalyticsError, errorForStatus } from '../domain/index.js';
import type { CryptoProvider, Transport, TransportResponse } from './ports.js';
import { TransportError } from './ports.js';
import { encodeJson } from './persistence.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_MAX_BACKOFF_MS = 60_000;

export const EVENTS_PATH = '/events';

/** Who is talking to the collector. Sent on every request. */
export interface ClientIdentity {
  readonly appId: string;
  /** Read per request; the id is only known once persisted state is loaded. */
  readonly deviceId: () => string;
  readonly sdkVersion: string;
  readonly platform: string;
  /** Bearer token, read per request so a refreshed token is picked up. */
  readonly authToken?: () => string | null;
}

export function identityHeaders(identity: ClientIdentity): Record<string, string> {
  const headers: Record<string, string> = {
    'X-App-ID': identity.appId,
    'X-Device-ID': identity.deviceId(),
    'X-SDK-Version': identity.sdkVersion,
    'X-Platform': identity.platform,
  };
  const token = identity.authToken?.() ?? null;
  if (token) headers['Authorization'] = `Bearer ${token}`;
  return headers;
}

export function isSuccess(response: TransportResponse): boolean {
  return response.status >= 200 && response.status <= 299;
}

export type DeliveryOutcome =
  | { readonly kind: 'delivered'; readonly event_ids: readonly string[]; readonly attempts: number }
  | { readonly kind: 'transient_failure'; readonly error: AnalyticsError; readonly attempts: number }
  | { readonly kind: 'permanent_failure'; readonly error: AnalyticsError; readonly attempts: number }
  | { readonly kind: 'unauthorized'; readonly error: AnalyticsError; readonly attempts: number };

export interface DeliveryClientOptions {
  readonly log: Logger;
  readonly transport: Transport;
  readonly crypto: CryptoProvider;
  readonly identity: ClientIdentity;
  readonly maxAttempts?: number;
  readonly maxBackoffMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (1-based), i.e. after the
 * `attempt`-th failed try: 1 s, 2 s, 4 s ... capped.
 */
export function backoffDelayMs(attempt: number, maxBackoffMs: number = DEFAULT_MAX_BACKOFF_MS): number {
  return Math.min(2 ** (attempt - 1) * 1000, maxBackoffMs);
}

export type AttemptResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: AnalyticsError; readonly transient: boolean };

/**
 * Uploads event batches to `POST /events`.
 *
 * The body is `encrypt(json(events))` signed with `X-Signature =
 * hmac(ciphertext)`. Only transient causes (unreachable, timeout, 5xx) are
 * retried; 4xx are permanent and 401/403 are reported as `unauthorized`
 * after a single attempt.
 */
export class DeliveryClient {
  private readonly log: Logger;
  private readonly transport: Transport;
  private readonly crypto: CryptoProvider;
  private readonly identity: ClientIdentity;
  private readonly maxAttempts: number;
  private readonly maxBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: DeliveryClientOptions) {
    this.log = options.log;
    this.transport = options.transport;
    this.crypto = options.crypto;
    this.identity = options.identity;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async sendBatch(events: readonly AnalyticsEvent[]): Promise<DeliveryOutcome> {
    const eventIds = events.map((e) => e.event_id);
    if (events.length === 0) {
      return { kind: 'delivered', event_ids: [], attempts: 0 };
    }

    const prepared = this.prepare(events);
    if (prepared instanceof AnalyticsError) {
      this.log.error({ err: prepared, count: events.length }, 'Batch not sent');
      return { kind: 'transient_failure', error: prepared, attempts: 0 };
    }
    const { headers, ciphertext } = prepared;

    for (let attempt = 1; ; attempt++) {
      const result = await this.attempt(headers, ciphertext);

      if (result.ok) {
        this.log.info({ count: events.length, attempts: attempt }, 'Batch delivered');
        return { kind: 'delivered', event_ids: eventIds, attempts: attempt };
      }

      const { error } = result;
      if (error.code === 'unauthorized') {
        this.log.warn({ err: error, status: error.status }, 'Collector rejected credentials');
        return { kind: 'unauthorized', error, attempts: attempt };
      }
      if (!result.transient) {
        this.log.error({ err: error, status: error.status, count: events.length }, 'Batch permanently rejected');
        return { kind: 'permanent_failure', error, attempts: attempt };
      }
      if (attempt >= this.maxAttempts) {
        this.log.warn({ err: error, attempts: attempt }, 'Batch delivery failed, giving up for now');
        return { kind: 'transient_failure', error, attempts: attempt };
      }

      const delay = backoffDelayMs(attempt, this.maxBackoffMs);
      this.log.debug({ attempt, delayMs: delay, code: error.code }, 'Retrying batch delivery');
      await this.sleep(delay);
    }
  }

  /**
   * Encrypts and signs the batch. Host callbacks (auth token, crypto) run
   * here, so their failures become an error value instead of a rejection.
   */
  private prepare(
    events: readonly AnalyticsEvent[],
  ): { headers: Record<string, string>; ciphertext: Uint8Array } | AnalyticsError {
    try {
      const ciphertext = this.crypto.encrypt(encodeJson(events));
      if (ciphertext === null) {
        return new AnalyticsError('encryption_error', 'Failed to encrypt event batch');
      }
      const headers = {
        ...identityHeaders(this.identity),
        'Content-Type': 'application/octet-stream',
        'X-Signature': this.crypto.hmac(ciphertext),
      };
      return { headers, ciphertext };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      return new AnalyticsError('unknown', `Failed to prepare batch request: ${message}`, { cause: err });
    }
  }

  private async attempt(headers: Record<string, string>, body: Uint8Array): Promise<AttemptResult> {
    let response: TransportResponse;
    try {
      response = await this.transport.request({ method: 'POST', path: EVENTS_PATH, headers, body });
    } catch (err: unknown) {
      return classifyTransportFailure(err);
    }

    if (isSuccess(response)) return { ok: true };
    const error = errorForStatus(response.status);
    return { ok: false, error, transient: error.retryable };
  }
}

/** Maps a thrown transport error onto the SDK error taxonomy. */
export function classifyTransportFailure(err: unknown): AttemptResult {
  if (err instanceof TransportError) {
    if (err.kind === 'permanent') {
      return { ok: false, transient: false, error: new AnalyticsError('invalid_request', err.message, { cause: err }) };
    }
    const code = err.timedOut ? 'timeout' : 'network_unavailable';
    return { ok: false, transient: true, error: new AnalyticsError(code, err.message, { cause: err }) };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { ok: false, transient: true, error: new AnalyticsError('network_unavailable', message, { cause: err }) };
}

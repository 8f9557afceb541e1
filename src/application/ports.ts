import type { DeviceSnapshot, LocationSnapshot } from '../domain/index.js';

/**
 * Durable, crash-safe byte store.
 *
 * Keys are opaque strings (`event_queue`, `current_session`, `rules`,
 * `consent_<purpose>`, ...). Implementations live in infrastructure/storage.
 */
export interface KeyValueStore {
  put(key: string, value: Uint8Array): Promise<void>;
  get(key: string): Promise<Uint8Array | null>;
  delete(key: string): Promise<void>;
}

/** Payload crypto. The core never sees key material. */
export interface CryptoProvider {
  encrypt(plaintext: Uint8Array): Uint8Array | null;
  decrypt(ciphertext: Uint8Array): Uint8Array | null;
  hmac(data: Uint8Array): string;
}

export interface TransportRequest {
  readonly method: 'GET' | 'POST';
  readonly path: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: Uint8Array | undefined;
}

export interface TransportResponse {
  readonly status: number;
  readonly body: Uint8Array;
}

export type TransportErrorKind = 'transient' | 'permanent';

/**
 * Raised by a transport when no HTTP response was obtained.
 *
 * `transient` covers unreachable network and timeouts; `permanent`
 * covers requests that can never be issued (malformed URL, ...).
 */
export class TransportError extends Error {
  readonly kind: TransportErrorKind;
  readonly timedOut: boolean;

  constructor(kind: TransportErrorKind, message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.timedOut = options.timedOut ?? false;
  }
}

/** Issues one HTTP-like request; never retries on its own. */
export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
}

export interface DeviceInfoProvider {
  currentDeviceSnapshot(): DeviceSnapshot;
}

export interface LocationProvider {
  currentLocation(): LocationSnapshot | null;
}

import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  CryptoProvider,
  DeviceInfoProvider,
  KeyValueStore,
  Transport,
  TransportRequest,
  TransportResponse,
} from '../src/application/ports.js';
import type { AnalyticsEvent, Rule, Session } from '../src/domain/index.js';
import { MemoryKeyValueStore } from '../src/infrastructure/storage/memory-store.js';

/** Fixed "now" for deterministic time-based tests (a Wednesday). */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Mutable clock for `nowFn` injection. */
export function fakeClock(start: number = FIXED_NOW) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
    set(value: number) {
      now = value;
    },
  };
}

/** Sequential ids: `<prefix>-1`, `<prefix>-2`, ... */
export function sequentialIds(prefix: string = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<AnalyticsEvent> = {}): AnalyticsEvent {
  counter++;
  return {
    event_id: overrides.event_id ?? `evt-${counter}`,
    name: overrides.name ?? 'purchase',
    timestamp: overrides.timestamp ?? new Date(FIXED_NOW).toISOString(),
    session_id: overrides.session_id ?? null,
    user_id: overrides.user_id ?? null,
    properties: overrides.properties ?? {},
    device: overrides.device ?? { platform: 'ios' },
    location: overrides.location ?? null,
  };
}

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    session_id: 's-1',
    start_time: FIXED_NOW,
    end_time: null,
    duration_ms: 0,
    last_activity_time: FIXED_NOW,
    screen_count: 0,
    event_count: 0,
    interaction_count: 0,
    max_scroll_depth: 0,
    interruption_count: 0,
    screens_viewed: [],
    source: 'app_launch',
    ...overrides,
  };
}

export function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    id: 'rule-1',
    name: 'test rule',
    conditions: [],
    actions: [],
    priority: 0,
    is_active: true,
    ...overrides,
  };
}

/** A store whose operations can be switched to fail. */
export class FlakyStore implements KeyValueStore {
  readonly inner = new MemoryKeyValueStore();
  failWrites = false;
  failReads = false;

  async put(key: string, value: Uint8Array): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    await this.inner.put(key, value);
  }

  async get(key: string): Promise<Uint8Array | null> {
    if (this.failReads) throw new Error('io error');
    return this.inner.get(key);
  }

  async delete(key: string): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    await this.inner.delete(key);
  }
}

export function jsonBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

export function parseBytes(bytes: Uint8Array | null): unknown {
  return bytes === null ? null : JSON.parse(new TextDecoder().decode(bytes));
}

type Scripted = TransportResponse | Error;

/**
 * Transport that replays scripted responses in order and records every
 * request. Once the script runs out it answers `fallback`.
 */
export class ScriptedTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly script: Scripted[];

  constructor(
    script: Scripted[] = [],
    private readonly fallback: Scripted = { status: 200, body: new Uint8Array() },
  ) {
    this.script = [...script];
  }

  push(...responses: Scripted[]): void {
    this.script.push(...responses);
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const next = this.script.shift() ?? this.fallback;
    if (next instanceof Error) throw next;
    return next;
  }
}

export function status(code: number, body: unknown = {}): TransportResponse {
  return { status: code, body: jsonBytes(body) };
}

/** Reversible stand-in: prefixes a 0x01 marker; signature is `sig:<length>`. */
export const stubCrypto: CryptoProvider = {
  encrypt: (plaintext) => new Uint8Array([1, ...plaintext]),
  decrypt: (ciphertext) => (ciphertext[0] === 1 ? ciphertext.slice(1) : null),
  hmac: (data) => `sig:${data.length}`,
};

/** Decodes a body produced by `stubCrypto.encrypt`. */
export function decodeStubBody(body: Uint8Array | undefined): unknown {
  if (!body) return undefined;
  return JSON.parse(new TextDecoder().decode(body.slice(1)));
}

export const staticDevice: DeviceInfoProvider = {
  currentDeviceSnapshot: () => ({ platform: 'ios', os_version: '17.4', device_model: 'iPhone15,2' }),
};

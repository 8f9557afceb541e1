import type { Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import type { KeyValueStore } from './ports.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Storage keys shared by all components. */
export const StorageKeys = {
  eventQueue: 'event_queue',
  currentSession: 'current_session',
  lastSession: 'last_session',
  rules: 'rules',
  rulesLastSync: 'rules_last_sync',
  userProfile: 'user_profile',
  deviceId: 'device_id',
  appInstalled: 'app_installed',
  appLaunched: 'app_launched',
  consent: (purpose: string): string => `consent_${purpose}`,
} as const;

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

/** Parses UTF-8 JSON bytes. Returns `undefined` for anything unparseable. */
export function decodeJson(bytes: Uint8Array): unknown {
  try {
    const value: unknown = JSON.parse(decoder.decode(bytes));
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Writes a JSON record.
 *
 * Storage failures are logged and reported as `false`; the caller keeps
 * its in-memory state and carries on with degraded durability.
 */
export async function writeRecord(
  store: KeyValueStore,
  key: string,
  value: unknown,
  log: Logger,
): Promise<boolean> {
  try {
    await store.put(key, encodeJson(value));
    return true;
  } catch (err: unknown) {
    log.error({ err, key }, 'Failed to persist record');
    return false;
  }
}

export async function removeRecord(store: KeyValueStore, key: string, log: Logger): Promise<boolean> {
  try {
    await store.delete(key);
    return true;
  } catch (err: unknown) {
    log.error({ err, key }, 'Failed to remove record');
    return false;
  }
}

/**
 * Reads a key and returns its decoded JSON, or `undefined` when the key is
 * absent, unreadable or not JSON. Corrupt bytes are removed from the store.
 */
export async function readJson(store: KeyValueStore, key: string, log: Logger): Promise<unknown> {
  let bytes: Uint8Array | null;
  try {
    bytes = await store.get(key);
  } catch (err: unknown) {
    log.error({ err, key }, 'Failed to read record');
    return undefined;
  }

  if (bytes === null) return undefined;

  const decoded = decodeJson(bytes);
  if (decoded === undefined) {
    log.warn({ key }, 'Discarding unparseable record');
    await removeRecord(store, key, log);
  }
  return decoded;
}

/**
 * Reads and validates a single record. A record that fails the schema is
 * discarded (removed from the store) and reported as `null`.
 */
export async function readRecord<T>(
  store: KeyValueStore,
  key: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  log: Logger,
): Promise<T | null> {
  const raw = await readJson(store, key, log);
  if (raw === undefined) return null;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ key, issues: parsed.error.issues.length }, 'Discarding corrupt record');
    await removeRecord(store, key, log);
    return null;
  }
  return parsed.data;
}

import type { Logger } from 'pino';
import { AnalyticsClient } from './application/index.js';
import type {
  CryptoProvider,
  DeviceInfoProvider,
  HostHooks,
  KeyValueStore,
  LocationProvider,
  Transport,
} from './application/index.js';
import type { AnalyticsError } from './domain/index.js';
import {
  FetchTransport,
  MemoryKeyValueStore,
  NodeDeviceInfo,
  createLogger,
  loadSdkConfig,
} from './infrastructure/index.js';

export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';

export interface InitializeOptions {
  /** Raw SDK options; validated and completed with defaults. */
  readonly config: unknown;
  readonly crypto: CryptoProvider;
  /** Defaults to an in-memory store, which does not survive a restart. */
  readonly storage?: KeyValueStore;
  /** Defaults to `fetch` against `base_url`. */
  readonly transport?: Transport;
  readonly device?: DeviceInfoProvider;
  readonly location?: LocationProvider;
  readonly hooks?: HostHooks;
  readonly authToken?: () => string | null;
  readonly logger?: Logger;
  readonly env?: NodeJS.ProcessEnv;
}

export type InitializeResult =
  | { readonly ok: true; readonly client: AnalyticsClient }
  | { readonly ok: false; readonly error: AnalyticsError };

/**
 * Validates the configuration and wires the client with its collaborators.
 *
 * Never throws: an invalid configuration is logged and returned as an
 * `invalid_configuration` error. Call `client.start()` afterwards.
 */
export function initialize(options: InitializeOptions): InitializeResult {
  const env = options.env ?? process.env;
  const loaded = loadSdkConfig(options.config, env);
  if (!loaded.ok) {
    const log = options.logger ?? createLogger({}, env);
    log.error({ err: loaded.error }, 'Analytics SDK not initialized');
    return { ok: false, error: loaded.error };
  }

  const { config } = loaded;
  const log = options.logger ?? createLogger({ level: config.log_level, name: 'analytics' }, env);

  const storage = options.storage ?? new MemoryKeyValueStore();
  if (!options.storage) {
    log.warn('No storage configured, queued events will not survive a restart');
  }

  const client = new AnalyticsClient({
    config,
    log,
    storage,
    transport:
      options.transport ??
      new FetchTransport({ baseUrl: config.base_url, timeoutMs: config.request_timeout_seconds * 1000 }),
    crypto: options.crypto,
    device: options.device ?? new NodeDeviceInfo({ appVersion: config.app_version }),
    location: options.location,
    hooks: options.hooks,
    authToken: options.authToken,
  });

  log.info({ app_id: config.app_id, base_url: config.base_url }, 'Analytics SDK initialized');
  return { ok: true, client };
}

export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export { sdkConfigSchema, loadSdkConfig, LOG_LEVELS } from './config.js';
export type { SdkConfig, SdkConfigInput, ConfigResult, LogLevel } from './config.js';
export { MemoryKeyValueStore } from './storage/memory-store.js';
export { FileKeyValueStore } from './storage/file-store.js';
export { RedisKeyValueStore, connectRedisStore } from './storage/redis-store.js';
export type { RedisBytesClient } from './storage/redis-store.js';
export { createNodeCrypto } from './crypto/node-crypto.js';
export type { NodeCryptoOptions } from './crypto/node-crypto.js';
export { FetchTransport, DEFAULT_REQUEST_TIMEOUT_MS } from './transport/fetch-transport.js';
export type { FetchTransportOptions } from './transport/fetch-transport.js';
export { NodeDeviceInfo } from './device/node-device.js';
export type { NodeDeviceInfoOptions } from './device/node-device.js';

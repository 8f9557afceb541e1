import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { KeyValueStore } from '../../application/ports.js';

/** The subset of ioredis the store needs. */
export type RedisBytesClient = Pick<Redis, 'getBuffer' | 'set' | 'del'>;

/**
 * Key/value store backed by Redis strings.
 *
 * Keys are namespaced (`<prefix>:<key>`) so several apps or devices can
 * share one Redis database.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly redis: RedisBytesClient,
    private readonly prefix: string = 'analytics',
  ) {}

  async put(key: string, value: Uint8Array): Promise<void> {
    await this.redis.set(this.keyFor(key), Buffer.from(value));
  }

  async get(key: string): Promise<Uint8Array | null> {
    const value = await this.redis.getBuffer(this.keyFor(key));
    return value ? new Uint8Array(value) : null;
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.keyFor(key));
  }

  private keyFor(key: string): string {
    return `${this.prefix}:${key}`;
  }
}

/**
 * Opens an ioredis connection for the store.
 *
 * Returns the store and a cleanup function that quits the connection.
 */
export async function connectRedisStore(
  redisUrl: string,
  log: Logger,
  prefix?: string,
): Promise<{ store: RedisKeyValueStore; close: () => Promise<void> }> {
  const redis = new Redis(redisUrl, {
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  log.info('Redis storage connected');

  return {
    store: new RedisKeyValueStore(redis, prefix),
    close: async () => {
      await redis.quit();
      log.info('Redis storage disconnected');
    },
  };
}

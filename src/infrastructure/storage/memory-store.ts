import type { KeyValueStore } from '../../application/ports.js';

/**
 * Process-local store. Values are copied in and out so callers can never
 * mutate what is stored.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Uint8Array>();

  async put(key: string, value: Uint8Array): Promise<void> {
    this.entries.set(key, new Uint8Array(value));
  }

  async get(key: string): Promise<Uint8Array | null> {
    const value = this.entries.get(key);
    return value ? new Uint8Array(value) : null;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { KeyValueStore } from '../../application/ports.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One file per key under a directory.
 *
 * Writes go to a temporary sibling first and are renamed into place, so a
 * crash mid-write leaves either the old value or the new one.
 */
export class FileKeyValueStore implements KeyValueStore {
  private ready: Promise<void> | null = null;
  private writeCounter = 0;

  constructor(private readonly directory: string) {}

  async put(key: string, value: Uint8Array): Promise<void> {
    await this.ensureDirectory();
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${++this.writeCounter}.tmp`;
    await writeFile(temp, value);
    await rename(temp, target);
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.pathFor(key)));
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  private pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.json`);
  }

  private ensureDirectory(): Promise<void> {
    this.ready ??= mkdir(this.directory, { recursive: true }).then(() => undefined);
    return this.ready;
  }
}

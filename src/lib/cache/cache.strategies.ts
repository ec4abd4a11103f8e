/**
 * Cache Strategies
 * Storage backends for fetch cache entries
 */

import * as fs from 'fs';
import * as path from 'path';
import { CacheEntry, CacheStore } from './cache.types';

const ENTRY_EXTENSION = '.json';

/**
 * One JSON file per fingerprint inside a directory.
 * Writes go to a temp file, are fsynced, then renamed over the target, so a
 * reader sees either the previous entry or the new one and never a partial file.
 */
export class FileCacheStore implements CacheStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  read(key: string): unknown {
    const filePath = this.entryPath(key);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
  }

  write(key: string, entry: CacheEntry): void {
    fs.mkdirSync(this.directory, { recursive: true });

    const filePath = this.entryPath(key);
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      const fd = fs.openSync(tempPath, 'w');
      try {
        fs.writeSync(fd, JSON.stringify(entry));
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }

  clear(): void {
    for (const file of this.listEntries()) {
      fs.rmSync(path.join(this.directory, file), { force: true });
    }
  }

  size(): number {
    return this.listEntries().length;
  }

  describe(): string {
    return this.directory;
  }

  private entryPath(key: string): string {
    return path.join(this.directory, `${key}${ENTRY_EXTENSION}`);
  }

  private listEntries(): string[] {
    if (!fs.existsSync(this.directory)) {
      return [];
    }
    return fs.readdirSync(this.directory).filter((file) => file.endsWith(ENTRY_EXTENSION));
  }
}

/**
 * Process-local store, used when no directory should be touched
 */
export class MemoryCacheStore implements CacheStore {
  private entries: Map<string, CacheEntry> = new Map();

  read(key: string): unknown {
    return this.entries.get(key) ?? null;
  }

  write(key: string, entry: CacheEntry): void {
    this.entries.set(key, entry);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  describe(): string {
    return 'memory';
  }
}

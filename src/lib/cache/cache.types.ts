/**
 * Cache Types
 * Type definitions for the persistent fetch cache
 */

import { z } from 'zod';

/**
 * Cache mode enumeration
 */
export enum CacheMode {
  DISABLED = 'disabled',      // No caching
  ENABLED = 'enabled',        // Read before fetch, write after
  BYPASS = 'bypass',          // Skip reads, still write (forces refresh)
  READ_ONLY = 'read_only',    // Only read from cache
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  mode: CacheMode;
  directory: string;          // Used by the file store
}

/**
 * What the crawler hands over after a successful fetch
 */
export interface CacheablePage {
  finalUrl: string;
  html: string;
  statusCode: number;
  contentType: string;
}

/**
 * One persisted record per fetched URL, overwritten wholesale on re-fetch
 */
export const cacheEntrySchema = z.object({
  urlHash: z.string().length(64),
  url: z.string(),
  finalUrl: z.string(),
  html: z.string(),
  statusCode: z.number().int(),
  contentType: z.string(),
  fetchedAt: z.string(),
});

export type CacheEntry = Readonly<z.infer<typeof cacheEntrySchema>>;

export interface CacheStats {
  mode: CacheMode;
  location: string;
  size: number;
}

/**
 * Backing storage for cache entries, addressed by fingerprint
 */
export interface CacheStore {
  read(key: string): unknown;
  write(key: string, entry: CacheEntry): void;
  clear(): void;
  size(): number;
  describe(): string;
}

export function isCacheMode(value: string): value is CacheMode {
  return Object.values(CacheMode).some((mode) => mode === value);
}

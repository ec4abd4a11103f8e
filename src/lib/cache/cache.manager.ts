/**
 * Fetch Cache
 * Content-addressed persistent store of fetched pages, keyed by URL fingerprint
 */

import * as crypto from 'crypto';
import { env } from '../../config/env';
import { normalizeUrl } from '../crawling/url-normalizer';
import { FileCacheStore } from './cache.strategies';
import {
  CacheablePage,
  CacheConfig,
  CacheEntry,
  CacheMode,
  CacheStats,
  CacheStore,
  cacheEntrySchema,
  isCacheMode,
} from './cache.types';

/**
 * SHA-256 hex digest of the normalized URL
 */
export function fingerprint(url: string): string {
  const key = normalizeUrl(url) ?? url.trim();
  return crypto.createHash('sha256').update(key).digest('hex');
}

export class FetchCache {
  private config: CacheConfig;
  private store: CacheStore;

  constructor(config?: Partial<CacheConfig>, store?: CacheStore) {
    this.config = {
      mode: isCacheMode(env.CACHE_MODE) ? env.CACHE_MODE : CacheMode.ENABLED,
      directory: env.CACHE_DIR,
      ...config,
    };
    this.store = store ?? new FileCacheStore(this.config.directory);
  }

  /**
   * Look up a URL. Unreadable or malformed entries count as a miss.
   */
  get(url: string): CacheEntry | null {
    if (this.config.mode === CacheMode.DISABLED || this.config.mode === CacheMode.BYPASS) {
      return null;
    }

    const key = fingerprint(url);
    let raw: unknown;
    try {
      raw = this.store.read(key);
    } catch (error) {
      console.warn(`Cache: Failed to load entry for ${url}:`, error instanceof Error ? error.message : error);
      return null;
    }

    if (raw === null) {
      return null;
    }

    const parsed = cacheEntrySchema.safeParse(raw);
    if (!parsed.success || parsed.data.urlHash !== key) {
      console.warn(`Cache: Ignoring malformed entry for ${url}`);
      return null;
    }

    return parsed.data;
  }

  /**
   * Persist a page under the URL it was requested with. Returns the stored
   * entry, or null when the mode forbids writes or the write failed.
   */
  set(url: string, page: CacheablePage): CacheEntry | null {
    if (this.config.mode === CacheMode.DISABLED || this.config.mode === CacheMode.READ_ONLY) {
      return null;
    }

    const key = fingerprint(url);
    const entry: CacheEntry = {
      urlHash: key,
      url: normalizeUrl(url) ?? url,
      finalUrl: page.finalUrl,
      html: page.html,
      statusCode: page.statusCode,
      contentType: page.contentType,
      fetchedAt: new Date().toISOString(),
    };

    try {
      this.store.write(key, entry);
      return entry;
    } catch (error) {
      console.warn(`Cache: Failed to cache ${url}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  clear(): void {
    this.store.clear();
    console.log(`Cache: Cleared ${this.store.describe()}`);
  }

  size(): number {
    return this.store.size();
  }

  getMode(): CacheMode {
    return this.config.mode;
  }

  getStats(): CacheStats {
    return {
      mode: this.config.mode,
      location: this.store.describe(),
      size: this.store.size(),
    };
  }
}

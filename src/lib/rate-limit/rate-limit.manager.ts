/**
 * Rate Limit Manager
 * In-memory sliding window limiter keyed by client
 */

import { RateLimitConfig, RateLimitResult, RateLimitStats } from './rate-limit.types';

const CLEANUP_INTERVAL_MS = 60000;

interface WindowEntry {
  timestamps: number[];
  resetTime: number;
}

export class RateLimitManager {
  private windows: Map<string, WindowEntry> = new Map();
  private stats = {
    totalRequests: 0,
    blockedRequests: 0,
  };
  private cleanupInterval?: NodeJS.Timeout;

  constructor() {
    this.cleanupInterval = setInterval(() => this.cleanupExpiredEntries(), CLEANUP_INTERVAL_MS);
    // Never keeps the process alive on its own
    this.cleanupInterval.unref();
  }

  /**
   * Count a request against key. Blocked requests are not counted.
   */
  checkLimit(key: string, config: RateLimitConfig, now: number = Date.now()): RateLimitResult {
    this.stats.totalRequests++;

    const windowStart = now - config.windowMs;
    const entry = this.windows.get(key) ?? { timestamps: [], resetTime: now };
    entry.timestamps = entry.timestamps.filter((ts) => ts > windowStart);

    const allowed = entry.timestamps.length < config.maxRequests;
    if (allowed) {
      entry.timestamps.push(now);
    } else {
      this.stats.blockedRequests++;
    }

    entry.resetTime = entry.timestamps.length > 0 ? entry.timestamps[0] + config.windowMs : now;
    this.windows.set(key, entry);

    return {
      allowed,
      remaining: Math.max(0, config.maxRequests - entry.timestamps.length),
      resetTime: entry.resetTime,
      totalRequests: entry.timestamps.length,
    };
  }

  resetLimit(key: string): void {
    this.windows.delete(key);
  }

  getStats(): RateLimitStats {
    return {
      totalRequests: this.stats.totalRequests,
      blockedRequests: this.stats.blockedRequests,
      activeKeys: this.windows.size,
    };
  }

  private cleanupExpiredEntries(now: number = Date.now()): void {
    for (const [key, entry] of this.windows.entries()) {
      if (entry.resetTime < now) {
        this.windows.delete(key);
      }
    }
  }

  clear(): void {
    this.windows.clear();
    this.stats = {
      totalRequests: 0,
      blockedRequests: 0,
    };
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
  }
}

// Export singleton instance
export const rateLimitManager = new RateLimitManager();

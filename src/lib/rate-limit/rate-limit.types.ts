/**
 * Rate Limit Types
 * Type definitions for the rate limiting system
 */

import type { Request } from 'express';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  windowMs: number;                      // Sliding window length in milliseconds
  maxRequests: number;                   // Maximum requests per window
  keyGenerator?: (req: Request) => string;
  message?: string;
  standardHeaders?: boolean;             // RateLimit-* headers
  legacyHeaders?: boolean;               // X-RateLimit-* headers
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;                     // Epoch ms when the oldest counted request leaves the window
  totalRequests: number;
}

export interface RateLimitStats {
  totalRequests: number;
  blockedRequests: number;
  activeKeys: number;
}

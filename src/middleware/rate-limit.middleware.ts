/**
 * Rate Limit Middleware
 * Express middleware for rate limiting requests
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimitManager, rateLimitManager } from '../lib/rate-limit/rate-limit.manager';
import { RateLimitConfig } from '../lib/rate-limit/rate-limit.types';

/**
 * Default key generator - uses IP address
 */
function defaultKeyGenerator(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(',')[0];
  const ip = first?.trim() || req.socket.remoteAddress || 'unknown';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware
 */
export function rateLimitMiddleware(
  config: RateLimitConfig,
  manager: RateLimitManager = rateLimitManager
): RequestHandler {
  const keyGenerator = config.keyGenerator ?? defaultKeyGenerator;
  const standardHeaders = config.standardHeaders !== false;
  const legacyHeaders = config.legacyHeaders !== false;

  return (req: Request, res: Response, next: NextFunction): void => {
    const result = manager.checkLimit(keyGenerator(req), config);
    const resetTimeSeconds = Math.ceil(result.resetTime / 1000);

    if (standardHeaders) {
      res.setHeader('RateLimit-Limit', config.maxRequests.toString());
      res.setHeader('RateLimit-Remaining', result.remaining.toString());
      res.setHeader('RateLimit-Reset', resetTimeSeconds.toString());
    }

    if (legacyHeaders) {
      res.setHeader('X-RateLimit-Limit', config.maxRequests.toString());
      res.setHeader('X-RateLimit-Remaining', result.remaining.toString());
      res.setHeader('X-RateLimit-Reset', resetTimeSeconds.toString());
    }

    if (!result.allowed) {
      const retryAfter = Math.max(0, Math.ceil((result.resetTime - Date.now()) / 1000));
      res.setHeader('Retry-After', retryAfter.toString());

      res.status(429).json({
        success: false,
        error: config.message ?? 'Too many requests, please try again later.',
        retryAfter,
        resetTime: result.resetTime,
      });
      return;
    }

    next();
  };
}

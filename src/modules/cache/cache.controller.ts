/**
 * Cache Controller
 * Inspect and clear the fetch cache
 */

import { Request, Response } from 'express';
import { FetchCache } from '../../lib/cache';
import { asyncHandler } from '../../middleware/error-handler';

export class CacheController {
  constructor(private readonly createCache: () => FetchCache = () => new FetchCache()) {}

  /**
   * GET /api/cache/stats
   */
  getStats = asyncHandler(async (req: Request, res: Response) => {
    const stats = this.createCache().getStats();
    res.json({
      success: true,
      cached_items: stats.size,
      cache_dir: stats.location,
      mode: stats.mode,
    });
  });

  /**
   * POST /api/cache/clear
   */
  clear = asyncHandler(async (req: Request, res: Response) => {
    this.createCache().clear();
    res.json({
      success: true,
      message: 'Cache cleared successfully',
    });
  });
}

export const cacheController = new CacheController();

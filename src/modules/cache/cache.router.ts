/**
 * Cache Router
 * Route definitions for cache administration
 */

import { Router } from 'express';
import { cacheController } from './cache.controller';

const router = Router();

/**
 * @route   GET /api/cache/stats
 * @desc    Number of cached pages, cache location and mode
 * @access  Public
 */
router.get('/stats', cacheController.getStats);

/**
 * @route   POST /api/cache/clear
 * @desc    Remove every cached page
 * @access  Public
 */
router.post('/clear', cacheController.clear);

export default router;

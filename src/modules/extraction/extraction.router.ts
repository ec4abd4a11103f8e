/**
 * Extraction Router
 * Route definitions for extraction endpoints
 */

import { Router } from 'express';
import { extractionController } from './extraction.controller';

const router = Router();

/**
 * @route   POST /api/extract
 * @desc    Extract modules and submodules from documentation URLs
 * @access  Public
 */
router.post('/', extractionController.extract);

export default router;

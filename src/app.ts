/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { rateLimitMiddleware } from './middleware/rate-limit.middleware';

// Import routers
import extractionRouter from './modules/extraction/extraction.router';
import cacheRouter from './modules/cache/cache.router';

export const SERVICE_NAME = 'Documentation Module Extraction API';
export const SERVICE_VERSION = '1.0.0';

export const createApp = (): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // Crawls are expensive; only the extraction route is limited
  if (env.RATE_LIMIT_ENABLED) {
    app.use('/api/extract', rateLimitMiddleware({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
      message: 'Too many extraction requests, please try again later.',
      standardHeaders: true,
      legacyHeaders: true,
    }));
  }

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/', (req: Request, res: Response) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        'POST /api/extract': 'Extract modules from documentation URLs',
        'GET /health': 'Health check',
        'GET /api/cache/stats': 'Cache statistics',
        'POST /api/cache/clear': 'Clear cache',
      },
    });
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
    });
  });

  // API Routes
  app.use('/api/extract', extractionRouter);
  app.use('/api/cache', cacheRouter);

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};

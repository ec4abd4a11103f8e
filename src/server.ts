/**
 * Server Entry Point
 * Starts the HTTP API
 */

import { createServer } from 'http';
import { createApp, SERVICE_NAME } from './app';
import { env } from './config/env';
import { rateLimitManager } from './lib/rate-limit';

const startServer = (): void => {
  const app = createApp();
  const httpServer = createServer(app);

  httpServer.on('error', (error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });

  httpServer.listen(env.PORT, () => {
    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log(`🚀 ${SERVICE_NAME} is running`);
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 Cache: ${env.CACHE_MODE} (${env.CACHE_DIR})`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`${signal} signal received: closing HTTP server`);
    rateLimitManager.destroy();
    httpServer.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Start the server
startServer();

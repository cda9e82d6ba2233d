// src/index.ts - HTTP entry point: web page plus JSON API
import { createApp } from './api/server';
import { config } from './config';
import { logger } from './utils/logger';

function startServer(): void {
  if (!config.BITQUERY_API_KEY) {
    // Checks will answer with a configuration error until the key is set
    logger.warn('BITQUERY_API_KEY is not set; /api/check requests will fail');
  }

  const app = createApp();
  const server = app.listen(config.PORT, () => {
    logger.info(`🚀 Phishy token checker listening on http://localhost:${config.PORT}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer();

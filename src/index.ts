import http from 'http';
import { createApp } from './app';
import config, { assertRequiredEnv } from './config';
import { closePool, initializeDatabase } from './config/database';
import { createAppServices } from './services/service.factory';
import { LoggingUtils } from './services/scraper/utils/LoggingUtils';
import logger from './utils/logger';

async function bootstrap() {
  LoggingUtils.configure(config.logging);
  assertRequiredEnv();

  await initializeDatabase();

  // Built once: the rate limiter's windows must be shared by every request
  const services = createAppServices(config);
  const app = createApp(services);

  const httpServer = http.createServer(app);

  httpServer.listen(config.server.port, () => {
    logger.info(`Server started in ${config.server.nodeEnv} mode on port ${config.server.port}`);
    logger.info(`Health check available at http://localhost:${config.server.port}/health`);
  });

  httpServer.on('error', (error) => {
    logger.error('HTTP server error:', error);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    httpServer.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('Error closing database pool:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Handle top-level errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (error) => {
  logger.error('Unhandled Rejection:', error);
  process.exit(1);
});

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application:', error);
  process.exit(1);
});

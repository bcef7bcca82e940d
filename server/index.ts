// Load environment variables from .env file BEFORE any other imports
import 'dotenv/config';

import express from 'express';
import { createServer } from 'http';
import { createApplication } from './bootstrap';
import { loadConfig } from './config/env';
import { logger, logError } from './lib/logger';
import { registerRoutes } from './routes';
import { initializeBatchScheduler } from './services/batchScheduler';

async function main(): Promise<void> {
  const config = loadConfig();
  const { context, database } = await createApplication(config);

  const app = express();
  app.set('trust proxy', 1);

  context.scheduler = initializeBatchScheduler(context.pipeline, {
    enabled: config.batch.enabled,
    intervalMinutes: config.batch.intervalMinutes,
  });

  registerRoutes(app, context);

  const httpServer = createServer(app);
  httpServer.listen({ port: config.port, host: '0.0.0.0' }, () => {
    logger.info({ port: config.port, env: config.env }, `Serving on port ${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    context.scheduler?.stop();
    httpServer.close(() => {
      database.pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          logError(logger, error, 'Failed to close database pool');
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logError(logger, error, 'Startup failed');
  process.exit(1);
});

/**
 * Routes Index
 *
 * Mounts the route modules, health and batch endpoints, and the shared
 * request logging and error handling middleware.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { AppContext } from '../context';
import { createLogger } from '../lib/logger';
import { asyncHandler, errorHandler, errors, notFoundHandler } from '../middleware/errorHandler';
import { requestIdMiddleware } from '../middleware/requestId';
import { sendSuccess } from '../middleware/responseHelpers';
import { runBatch } from '../services/pipelineOrchestrator';
import { createFilesRouter } from './files';
import { createMappingsRouter } from './mappings';
import { createTemplatesRouter } from './templates';

const log = createLogger({ module: 'routes' });

/**
 * Request logging middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData = {
      requestId: req.id,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration,
    };

    if (res.statusCode >= 400) {
      log.warn(logData, 'Request completed with error');
    } else if (duration > 1000) {
      log.warn(logData, 'Slow request');
    } else {
      log.debug(logData, 'Request completed');
    }
  });

  next();
}

/**
 * Register all routes with the Express app
 */
export function registerRoutes(app: Express, ctx: AppContext): void {
  app.use(requestIdMiddleware);
  app.use(requestLogger);
  app.use(express.json({ limit: '1mb' }));

  // =================================================
  // Mount Route Modules
  // =================================================

  app.use('/api/files', createFilesRouter(ctx));
  app.use('/api/templates', createTemplatesRouter(ctx));
  app.use('/api/mappings', createMappingsRouter(ctx));

  // =================================================
  // Batch Runs
  // =================================================

  app.get('/api/batch/status', (_req: Request, res: Response) => {
    sendSuccess(res, ctx.scheduler?.getStatus() ?? { enabled: false, running: false });
  });

  app.post('/api/batch/run', asyncHandler(async (_req: Request, res: Response) => {
    const result = ctx.scheduler ? await ctx.scheduler.trigger() : await runBatch(ctx.pipeline);
    if (!result) {
      throw errors.conflict('A batch run is already in progress');
    }
    sendSuccess(res, result);
  }));

  // =================================================
  // Health Check
  // =================================================

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      aiSuggestions: ctx.pipeline.suggestions.aiEnabled,
    });
  });

  // =================================================
  // Error Handling
  // =================================================

  app.use('/api/*', notFoundHandler);
  app.use(errorHandler);

  log.info('Routes registered successfully');
}

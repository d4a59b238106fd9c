/**
 * Express Application
 * Built from injected repositories so tests can run it without a database or server.
 */

import express, { Express } from 'express';
import cors from 'cors';
import { config } from './config';
import { logger } from './utils/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createApiRoutes, RouteDependencies } from './routes';

export type AppDependencies = RouteDependencies;

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(
    cors({
      origin: config.allowedOrigins.length > 0 ? config.allowedOrigins : true,
    })
  );

  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    logger.info('Request received', { method: req.method, path: req.path });
    next();
  });

  app.use(createApiRoutes(deps));

  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

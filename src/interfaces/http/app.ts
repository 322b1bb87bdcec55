/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app each call: cluster workers build their own, and
 * integration tests get a fresh one after overriding container registrations.
 *
 * Middleware order:
 *   1. requestLogger  : request id + one log line per request with duration.
 *   2. helmet()       : security headers.
 *   3. cors()         : cross-origin access.
 *   4. compression()  : gzip responses.
 *   5. express.json() : body parsing.
 *   6. databaseSession: per-request DatabaseManager, closed on response close.
 *   7. Routes.
 *   8. Unknown routes : 404.
 *   9. errorHandler   : must be last.
 *
 * Importing `@core/container` bootstraps DI before any controller resolves
 * its service.
 */
import { container } from '@core/container';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { DatabasePools } from '@infrastructure/database/connection';
import { databaseSession } from '@interfaces/http/middleware/databaseSession';
import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { userRoutes } from '@interfaces/http/routes/userRoutes';
import { NotFoundError } from '@shared/errors/AppError';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();
  const pools = container.resolve<DatabasePools>(TOKENS.DatabasePools);
  const log = container.resolve<Logger>(TOKENS.Logger);

  // Request id + logging (first, so every line carries the id)
  app.use(requestLogger);

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request-scoped database session
  app.use(databaseSession(pools, log));

  // Routes
  app.use(healthRoutes);
  app.use(userRoutes);

  app.use((req: express.Request) => {
    throw new NotFoundError('Route', `${req.method} ${req.path}`);
  });

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}

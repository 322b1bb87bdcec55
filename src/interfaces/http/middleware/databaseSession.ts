/**
 * Database Session Middleware
 * Layer: Interfaces (HTTP)
 *
 * Gives every request its own DatabaseManager in `res.locals.db` and closes it
 * when the response closes, which happens on success, on error and when the
 * client hangs up. Connections are only checked out once a handler actually
 * asks for a connector.
 */
import type { Logger } from '@core/logger';
import type { IDatabaseSession } from '@domain/interfaces/IDatabaseSession';
import type { DatabasePools } from '@infrastructure/database/connection';
import { DatabaseManager } from '@infrastructure/database/DatabaseManager';
import type { NextFunction, Request, Response } from 'express';

declare global {
  namespace Express {
    interface Locals {
      /** Request-scoped database session, set by databaseSession(). */
      db: IDatabaseSession;
    }
  }
}

export function databaseSession(pools: DatabasePools, log: Logger) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    const db = new DatabaseManager(pools, log);
    res.locals.db = db;
    res.once('close', () => {
      db.close().catch((err: unknown) => log.error({ err }, 'Failed to close database session'));
    });
    next();
  };
}

export function sessionOf(res: Response): IDatabaseSession {
  return res.locals.db;
}

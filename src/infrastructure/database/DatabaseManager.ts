/**
 * Database Manager — Per-Request Connector Facade
 * Layer: Infrastructure
 * Pattern: implements IDatabaseSession
 *
 * Created by the databaseSession middleware for every request and passed
 * down explicitly; nothing about it is global. The first call for a target
 * builds a PostgresConnector (wrapped with call logging) and checks out a
 * connection; later calls, including concurrent ones, get the same
 * connector. `close()` runs when the response closes, whatever happened.
 * That includes a client hanging up while the handler is still running, so
 * once closed the session hands out nothing more.
 */
import type { Logger } from '@core/logger';
import { withCallLogging } from '@core/withCallLogging';
import type { IDatabaseConnector } from '@domain/interfaces/IDatabaseConnector';
import type { IDatabaseSession } from '@domain/interfaces/IDatabaseSession';
import type { DatabaseTarget } from '@shared/constants';
import { ConnectionError } from '@shared/errors/AppError';

import type { DatabasePools } from './connection';
import { PostgresConnector } from './PostgresConnector';

export class DatabaseManager implements IDatabaseSession {
  private readonly connectors = new Map<DatabaseTarget, Promise<IDatabaseConnector | null>>();
  private closed = false;

  constructor(
    private readonly pools: DatabasePools,
    private readonly log: Logger,
  ) {}

  async primary(): Promise<IDatabaseConnector> {
    const connector = await this.connector('primary');
    if (!connector) throw new ConnectionError('Primary database is not configured');
    return connector;
  }

  secondary(): Promise<IDatabaseConnector | null> {
    return this.connector('secondary');
  }

  connector(target: DatabaseTarget): Promise<IDatabaseConnector | null> {
    if (this.closed) {
      return Promise.reject(new ConnectionError('Database session is closed'));
    }
    let pending = this.connectors.get(target);
    if (!pending) {
      pending = this.open(target);
      this.connectors.set(target, pending);
    }
    return pending;
  }

  async close(): Promise<void> {
    this.closed = true;
    const pending = [...this.connectors.entries()];
    this.connectors.clear();

    for (const [target, opening] of pending) {
      try {
        const connector = await opening;
        await connector?.close();
      } catch (err) {
        this.log.error({ err, target }, 'Failed to close database connector');
      }
    }
  }

  private async open(target: DatabaseTarget): Promise<IDatabaseConnector | null> {
    const pool = this.pools.get(target);
    if (!pool) return null;

    try {
      this.log.debug({ target }, 'Lazy initializing PostgresConnector');
      const log = this.log.child({ target });
      const connector = withCallLogging<IDatabaseConnector>(
        new PostgresConnector(pool, log),
        log,
        'PostgresConnector',
      );
      await connector.connect();
      return connector;
    } catch (err) {
      this.connectors.delete(target);
      throw err;
    }
  }
}

/**
 * Database Pools — One Pool per Target, One Set per Process
 * Layer: Infrastructure
 * Pattern: Registry + Singleton
 *
 * `DatabasePools` owns a ConnectionPool for each configured target (primary,
 * and secondary when it has credentials), created on first use. Cluster
 * workers each build their own set: sockets cannot be shared across
 * processes.
 *
 * `getDatabasePools()` returns the process-wide registry built from config.
 * The server warms it up before listening and calls `destroyDatabasePools()`
 * on SIGTERM. Tests construct their own `DatabasePools` with a fake client
 * factory instead.
 */
import { config, type PoolSettings } from '@core/config';
import { logger, type Logger } from '@core/logger';
import type { ClientFactory } from '@domain/interfaces/IDbClient';
import { DATABASE_TARGETS, type DatabaseTarget } from '@shared/constants';
import type { DatabaseCredentials } from '@shared/types';

import { ConnectionPool } from './ConnectionPool';
import { createPgClientFactory } from './pgClient';

export interface DatabasePoolsSettings {
  targets: Record<DatabaseTarget, DatabaseCredentials | null>;
  pool: PoolSettings;
}

export class DatabasePools {
  private readonly pools = new Map<DatabaseTarget, ConnectionPool>();

  constructor(
    private readonly settings: DatabasePoolsSettings,
    private readonly createClient: ClientFactory,
    private readonly log: Logger,
  ) {}

  get(target: DatabaseTarget): ConnectionPool | null {
    const existing = this.pools.get(target);
    if (existing) return existing;

    const credentials = this.settings.targets[target];
    if (!credentials) return null;

    const pool = new ConnectionPool(
      { ...this.settings.pool, name: target, credentials, createClient: this.createClient },
      this.log,
    );
    this.pools.set(target, pool);
    return pool;
  }

  /** Opens the minimum connections of every configured target. */
  async warmUp(): Promise<void> {
    for (const target of DATABASE_TARGETS) {
      await this.get(target)?.warmUp();
    }
  }

  async destroy(): Promise<void> {
    const pools = [...this.pools.values()];
    this.pools.clear();
    await Promise.all(pools.map((pool) => pool.close()));
  }
}

let instance: DatabasePools | null = null;

export function getDatabasePools(): DatabasePools {
  if (!instance) {
    instance = new DatabasePools(
      {
        targets: {
          primary: config.database.primary,
          secondary: config.database.secondary,
        },
        pool: config.database.pool,
      },
      createPgClientFactory(logger, {
        connectionTimeoutMillis: config.database.pool.acquireTimeoutMillis,
        applicationName: 'paged-users-api',
      }),
      logger,
    );
  }
  return instance;
}

/** Gracefully tears down every pool (SIGTERM / test cleanup). */
export async function destroyDatabasePools(): Promise<void> {
  if (instance) {
    const pools = instance;
    instance = null;
    await pools.destroy();
  }
}

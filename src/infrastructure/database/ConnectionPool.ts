/**
 * Connection Pool — Bounded, Shared, Self-Healing
 * Layer: Infrastructure
 *
 * Every request borrows a connection from here and gives it back when the
 * response is done. The pool keeps `min` connections warm, grows lazily up to
 * `max`, and past that makes callers wait at most `acquireTimeoutMillis`
 * before failing with ConnectionError.
 *
 * Built on tarn, the pool that sits underneath knex, and used the way knex
 * uses it: a broken connection is flagged and released like any other, so it
 * sits in the free set until the `validate` hook rejects it on the next
 * acquire. Only then is it destroyed and a new one opened.
 *
 * `release()` never throws; a client whose health check itself throws is
 * treated as broken. Releasing a connection that is not checked out (a double
 * release) is ignored, so the free set cannot grow past `max`.
 */
import type { PoolSettings } from '@core/config';
import type { Logger } from '@core/logger';
import type { ClientFactory, DbClient } from '@domain/interfaces/IDbClient';
import { ConnectionError } from '@shared/errors/AppError';
import type { DatabaseCredentials } from '@shared/types';
import { Pool, TimeoutError } from 'tarn';

export interface ConnectionPoolOptions extends PoolSettings {
  /** Label used in logs and error messages, e.g. "primary". */
  name: string;
  credentials: DatabaseCredentials;
  createClient: ClientFactory;
  /** Handshake timeout; defaults to acquireTimeoutMillis. */
  createTimeoutMillis?: number;
}

export interface PoolStats {
  used: number;
  free: number;
  pendingAcquires: number;
  pendingCreates: number;
}

export class ConnectionPool {
  private readonly pool: Pool<DbClient>;

  constructor(
    private readonly options: ConnectionPoolOptions,
    private readonly log: Logger,
  ) {
    this.pool = new Pool<DbClient>({
      create: () => options.createClient(options.credentials),
      destroy: (client) => this.dispose(client),
      validate: (client) => this.isReusable(client),
      min: options.min,
      max: options.max,
      acquireTimeoutMillis: options.acquireTimeoutMillis,
      createTimeoutMillis: options.createTimeoutMillis ?? options.acquireTimeoutMillis,
      idleTimeoutMillis: options.idleTimeoutMillis,
      propagateCreateError: true,
    });

    this.log.info(
      {
        pool: options.name,
        host: options.credentials.host,
        database: options.credentials.database,
        min: options.min,
        max: options.max,
      },
      'Database connection pool initialized',
    );
  }

  get name(): string {
    return this.options.name;
  }

  /** Opens `min` connections up front and parks them in the free set. */
  async warmUp(): Promise<void> {
    const attempts = await Promise.allSettled(
      Array.from({ length: this.options.min }, () => this.acquire()),
    );

    for (const attempt of attempts) {
      if (attempt.status === 'fulfilled') this.release(attempt.value);
    }

    const failure = attempts.find(
      (attempt): attempt is PromiseRejectedResult => attempt.status === 'rejected',
    );
    if (failure) throw failure.reason;

    this.log.info({ pool: this.options.name, connections: this.options.min }, 'Connection pool warmed up');
  }

  async acquire(): Promise<DbClient> {
    try {
      return await this.pool.acquire().promise;
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.log.warn({ pool: this.options.name, ...this.stats() }, 'Timed out acquiring a connection');
        throw new ConnectionError(
          `Timed out after ${this.options.acquireTimeoutMillis}ms waiting for a ${this.options.name} database connection`,
          err,
        );
      }
      this.log.error({ err, pool: this.options.name }, 'Database connection error');
      throw new ConnectionError(`Could not connect to the ${this.options.name} database`, err);
    }
  }

  release(client: DbClient): void {
    if (!this.isReusable(client)) {
      this.log.warn(
        { pool: this.options.name },
        'Returning broken connection; it will be destroyed on the next acquire',
      );
    }
    if (!this.pool.release(client)) {
      this.log.debug({ pool: this.options.name }, 'Ignored release of a connection that is not checked out');
    }
  }

  /** Flags the connection as unusable and hands it back; the next acquire replaces it. */
  discard(client: DbClient): void {
    client.markBroken();
    this.release(client);
  }

  stats(): PoolStats {
    return {
      used: this.pool.numUsed(),
      free: this.pool.numFree(),
      pendingAcquires: this.pool.numPendingAcquires(),
      pendingCreates: this.pool.numPendingCreates(),
    };
  }

  /** Waits for borrowed connections to come back, then closes everything. */
  async close(): Promise<void> {
    await this.pool.destroy();
    this.log.info({ pool: this.options.name }, 'Database connection pool destroyed');
  }

  private isReusable(client: DbClient): boolean {
    try {
      return client.isHealthy();
    } catch (err) {
      this.log.error({ err, pool: this.options.name }, 'Connection health check failed');
      return false;
    }
  }

  private async dispose(client: DbClient): Promise<void> {
    try {
      await client.end();
    } catch (err) {
      this.log.warn({ err, pool: this.options.name }, 'Error closing connection');
    }
  }
}

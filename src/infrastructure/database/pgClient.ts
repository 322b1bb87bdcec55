/**
 * pg-backed DbClient
 * Layer: Infrastructure
 *
 * Wraps one `pg.Client` in the DbClient contract. Queries run with
 * `rowMode: 'array'` so the row factory sees values in column order. A
 * client that emits `error` or `end` is marked unhealthy; the pool's
 * validate hook then throws it away instead of lending it out again.
 */
import type { Logger } from '@core/logger';
import type { ClientFactory, DbClient } from '@domain/interfaces/IDbClient';
import type { DatabaseCredentials } from '@shared/types';
import { Client } from 'pg';

export interface PgClientOptions {
  /** Handshake timeout for a new connection. */
  connectionTimeoutMillis: number;
  applicationName?: string;
}

export function createPgClientFactory(log: Logger, options: PgClientOptions): ClientFactory {
  return async (credentials: DatabaseCredentials): Promise<DbClient> => {
    const client = new Client({
      user: credentials.user,
      password: credentials.password,
      host: credentials.host,
      port: credentials.port,
      database: credentials.database,
      connectionTimeoutMillis: options.connectionTimeoutMillis,
      application_name: options.applicationName,
    });

    let healthy = true;
    client.on('error', (err) => {
      healthy = false;
      log.error({ err, host: credentials.host, database: credentials.database }, 'PostgreSQL client error');
    });
    client.on('end', () => {
      healthy = false;
    });

    await client.connect();
    log.debug({ host: credentials.host, database: credentials.database }, 'New database connection established');

    return {
      async query(text, values) {
        const result = await client.query({
          text,
          values: values ? [...values] : undefined,
          rowMode: 'array',
        });
        return {
          columns: result.fields.map((field) => field.name),
          rows: result.rows,
          rowCount: result.rowCount,
        };
      },
      end: () => client.end(),
      isHealthy: () => healthy,
      markBroken: () => {
        healthy = false;
      },
    };
  };
}

/**
 * PostgreSQL Connector — Query Execution
 * Layer: Infrastructure
 * Pattern: implements IDatabaseConnector
 *
 * A connector borrows one connection from its ConnectionPool on first use and
 * keeps it until `close()`. `execute()` and `fetchAll()` each run in their own
 * BEGIN/COMMIT; any failure rolls back before the error leaves the method.
 *
 * Failures are logged once here, with the statement actually sent and its
 * parameters, and rethrown as QueryExecutionError (the driver error stays on
 * `cause`). Nothing is retried. When the failure looks like a dead socket
 * rather than a bad statement, the connection is handed back as broken and
 * the next call checks out a fresh one.
 *
 * `close()` is final: the connector belongs to one request, and a call made
 * after the request ended rejects with ConnectionError instead of borrowing
 * a connection nobody would return.
 */
import type { Logger } from '@core/logger';
import type { IDatabaseConnector } from '@domain/interfaces/IDatabaseConnector';
import type { DbClient, QueryOutcome } from '@domain/interfaces/IDbClient';
import { ConnectionError, QueryExecutionError, ValidationError } from '@shared/errors/AppError';
import { computeMeta } from '@shared/pagination';
import type {
  DbRecord,
  FetchAllOptions,
  FetchAllResult,
  QueryParams,
  RecordSet,
} from '@shared/types';

import type { ConnectionPool } from './ConnectionPool';
import { createRowFactory, splitTotalCount } from './rowFactory';
import { type BoundQuery, buildLimitedQuery, buildWindowCountQuery, type Paging } from './sql';

const SQLSTATE = /^[0-9A-Z]{5}$/;

/** Node socket errors; EPIPE would otherwise pass for a SQLSTATE. */
const SOCKET_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'ENOTCONN',
  'EHOSTUNREACH',
]);

/** SQLSTATEs after which the session cannot be trusted: class 08 and server shutdowns. */
const TRANSPORT_STATES = new Set(['57P01', '57P02', '57P03']);

/** pg reports a dropped socket mid-query without any code. */
const CONNECTION_LOST = /connection terminated|terminated unexpectedly|connection closed|connection.*reset/i;

function errorCodeOf(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function sqlStateOf(err: unknown): string | undefined {
  const code = errorCodeOf(err);
  return code !== undefined && SQLSTATE.test(code) && !SOCKET_ERROR_CODES.has(code) ? code : undefined;
}

function isTransportError(err: unknown): boolean {
  const code = errorCodeOf(err);
  if (code !== undefined && SOCKET_ERROR_CODES.has(code)) return true;

  const state = sqlStateOf(err);
  if (state !== undefined) return state.startsWith('08') || TRANSPORT_STATES.has(state);

  return err instanceof Error && CONNECTION_LOST.test(err.message);
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
}

/** Paging applies only when both values are given; each must be a positive integer. */
function resolvePaging(page?: number, pageSize?: number): Paging | undefined {
  if (page !== undefined) assertPositiveInteger('page', page);
  if (pageSize !== undefined) assertPositiveInteger('page_size', pageSize);
  return page !== undefined && pageSize !== undefined ? { page, pageSize } : undefined;
}

export class PostgresConnector implements IDatabaseConnector {
  private client: DbClient | null = null;
  private closed = false;

  constructor(
    private readonly pool: ConnectionPool,
    private readonly log: Logger,
  ) {}

  async connect(): Promise<void> {
    await this.checkout();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.releaseClient();
  }

  async reconnect(): Promise<void> {
    this.releaseClient();
    await this.checkout();
  }

  async execute(query: string, params: QueryParams = []): Promise<void> {
    this.log.info({ query, params }, 'Executing non-query');
    const outcome = await this.inTransaction({ text: query, values: [...params] });
    this.log.debug({ rowCount: outcome.rowCount }, 'Non-query executed successfully');
  }

  async fetchOne(query: string, params: QueryParams = []): Promise<DbRecord | null> {
    const outcome = await this.run({ text: query, values: [...params] });
    const [row] = outcome.rows;
    return row ? createRowFactory(outcome.columns)(row) : null;
  }

  async fetchMany(query: string, size: number, params: QueryParams = []): Promise<RecordSet> {
    assertPositiveInteger('size', size);
    const outcome = await this.run(buildLimitedQuery(query, params, size));
    return outcome.rows.map(createRowFactory(outcome.columns));
  }

  async fetchAll(query: string, options: FetchAllOptions = {}): Promise<FetchAllResult> {
    const { params = [] } = options;
    const paging = resolvePaging(options.page, options.pageSize);

    const outcome = await this.inTransaction(buildWindowCountQuery(query, params, paging));
    const { records, totalRecords } = splitTotalCount(outcome);

    this.log.debug({ rows: records.length, totalRecords }, 'Query executed successfully');

    if (records.length === 0) return { data: [], totalRecords };
    if (!paging) return { data: records, totalRecords };

    return {
      data: records,
      totalRecords,
      metadata: { pagination: computeMeta(paging.page, paging.pageSize, totalRecords) },
    };
  }

  private async checkout(): Promise<DbClient> {
    this.assertOpen();
    if (!this.client) {
      const client = await this.pool.acquire();
      // close() may have run while we waited for the pool
      if (this.closed) this.pool.release(client);
      this.assertOpen();
      this.client = client;
      this.log.debug({ pool: this.pool.name }, 'Connected to PostgreSQL database');
    }
    return this.client;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConnectionError(`Connector for the ${this.pool.name} database is closed`);
    }
  }

  private releaseClient(): void {
    const client = this.client;
    if (!client) return;
    this.client = null;
    this.pool.release(client);
    this.log.debug({ pool: this.pool.name }, 'Connection released to pool');
  }

  private async run(statement: BoundQuery): Promise<QueryOutcome> {
    const client = await this.checkout();
    try {
      return await client.query(statement.text, statement.values);
    } catch (err) {
      throw this.fail(err, statement, client);
    }
  }

  private async inTransaction(statement: BoundQuery): Promise<QueryOutcome> {
    const client = await this.checkout();
    try {
      await client.query('BEGIN');
      const outcome = await client.query(statement.text, statement.values);
      await client.query('COMMIT');
      return outcome;
    } catch (err) {
      await this.rollback(client);
      throw this.fail(err, statement, client);
    }
  }

  private async rollback(client: DbClient): Promise<void> {
    if (!client.isHealthy()) return;
    try {
      await client.query('ROLLBACK');
    } catch (err) {
      client.markBroken();
      this.log.warn({ err }, 'Rollback failed; discarding connection');
    }
  }

  private fail(err: unknown, { text: query, values: params }: BoundQuery, client: DbClient): QueryExecutionError {
    const code = sqlStateOf(err);
    this.log.error({ err, query, params, code }, 'Query execution error');

    if (isTransportError(err) || !client.isHealthy()) {
      if (this.client === client) this.client = null;
      this.pool.discard(client);
    }

    const reason = err instanceof Error ? err.message : String(err);
    return new QueryExecutionError(`Query failed: ${reason}`, { query, params, code, cause: err });
  }
}

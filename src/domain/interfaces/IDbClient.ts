/**
 * Database Client Contract
 * Layer: Domain
 *
 * The smallest surface the pool and connectors need from a driver
 * connection. Rows come back positionally (`rows[i][j]` belongs to
 * `columns[j]`) so two result columns with the same name stay distinct until
 * the row factory decides what to do with them.
 *
 * The pg-backed implementation lives in infrastructure/database/pgClient.ts;
 * tests hand the pool scripted fakes that satisfy the same interface.
 */
import type { DatabaseCredentials, QueryParams } from '@shared/types';

export interface QueryOutcome {
  columns: string[];
  rows: unknown[][];
  /** Rows affected or returned, as reported by the server. */
  rowCount: number | null;
}

export interface DbClient {
  query(text: string, values?: QueryParams): Promise<QueryOutcome>;
  end(): Promise<void>;
  /** False once the transport failed; the pool discards unhealthy clients. */
  isHealthy(): boolean;
  markBroken(): void;
}

export type ClientFactory = (credentials: DatabaseCredentials) => Promise<DbClient>;

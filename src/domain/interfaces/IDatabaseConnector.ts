/**
 * Database Connector Interface — One Backend, One Contract
 * Layer: Domain
 *
 * Everything above the infrastructure layer talks to a database through this
 * interface. A connector holds at most one pooled connection at a time:
 * `connect()` checks one out, `close()` gives it back. Query methods connect
 * on demand, so callers rarely call `connect()` themselves.
 *
 * Statements use PostgreSQL positional placeholders ($1, $2, ...).
 */
import type {
  DbRecord,
  FetchAllOptions,
  FetchAllResult,
  QueryParams,
  RecordSet,
} from '@shared/types';

export interface IDatabaseConnector {
  /** Check out a connection from the pool. No-op when one is already held. */
  connect(): Promise<void>;

  /**
   * Return the held connection to the pool. Never rejects. The connector is
   * done afterwards: later calls reject with ConnectionError.
   */
  close(): Promise<void>;

  /** Drop the held connection, whatever its state, and check out a fresh one. */
  reconnect(): Promise<void>;

  /** Run a statement that returns no rows, committed on success and rolled back on failure. */
  execute(query: string, params?: QueryParams): Promise<void>;

  /** First row of the result, or null when nothing matched. */
  fetchOne(query: string, params?: QueryParams): Promise<DbRecord | null>;

  /** At most `size` rows of the result. */
  fetchMany(query: string, size: number, params?: QueryParams): Promise<RecordSet>;

  /**
   * Every row (or one page of rows when both `page` and `pageSize` are given),
   * together with the size of the whole result set.
   */
  fetchAll(query: string, options?: FetchAllOptions): Promise<FetchAllResult>;
}

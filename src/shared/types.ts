/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Row and result shapes that travel from the connector up to the HTTP layer.
 * The wire names inside PaginationMeta (total_records, total_pages) are part
 * of the public response contract, so they stay snake_case.
 */

/** Positional values bound to $1, $2, ... in a parameterized statement. */
export type QueryParams = readonly unknown[];

/** One decoded row: column name → value, keys in result-column order. */
export type DbRecord = Readonly<Record<string, unknown>>;

export type RecordSet = DbRecord[];

export interface PaginationMeta {
  page: number;
  size: number;
  total_records: number;
  total_pages: number;
}

export interface LinksMeta {
  self: string;
  next?: string;
  prev?: string;
}

export interface PageMetadata {
  pagination?: PaginationMeta;
  links?: LinksMeta;
}

/**
 * A page of entities plus how it sits in the full result.
 * `metadata` is absent when the query matched nothing.
 */
export interface PagedResult<T> {
  data: T[];
  metadata?: PageMetadata;
}

/** What a connector's fetchAll hands back before links are known. */
export interface FetchAllResult extends PagedResult<DbRecord> {
  /** Size of the full, unpaginated result set (0 when no row came back). */
  totalRecords: number;
}

export interface FetchAllOptions {
  params?: QueryParams;
  page?: number;
  pageSize?: number;
}

/** Builds an absolute URL for a route with the given query parameters. */
export type UrlBuilder = (endpoint: string, query: Record<string, string | number>) => string;

/** Connection credentials for one database target. */
export interface DatabaseCredentials {
  user: string;
  password: string;
  host: string;
  port: number;
  database: string;
}

/**
 * Pagination Rewrite
 * Layer: Infrastructure
 *
 * The caller's SELECT is wrapped as a subquery and every row gains a
 * `total_count` column computed by `COUNT(*) OVER ()`. Window functions are
 * evaluated before LIMIT/OFFSET, so the count always covers the whole result
 * set and one round trip returns both the page and the total:
 *
 *   WITH paginated AS (
 *     SELECT *, COUNT(*) OVER () AS total_count
 *     FROM (<query>) AS subquery
 *     LIMIT $n+1 OFFSET $n+2
 *   )
 *   SELECT * FROM paginated
 *
 * `pageSize` and the offset are appended after the caller's own parameters.
 */
import { TOTAL_COUNT_COLUMN } from '@shared/constants';
import type { QueryParams } from '@shared/types';

export interface BoundQuery {
  text: string;
  values: unknown[];
}

export interface Paging {
  page: number;
  pageSize: number;
}

/** A trailing semicolon would end the statement inside the subquery. */
function asSubquery(query: string): string {
  return query.trim().replace(/;+\s*$/, '');
}

export function pageOffset({ page, pageSize }: Paging): number {
  return (page - 1) * pageSize;
}

export function buildWindowCountQuery(
  query: string,
  params: QueryParams = [],
  paging?: Paging,
): BoundQuery {
  const inner = `SELECT *, COUNT(*) OVER () AS ${TOTAL_COUNT_COLUMN} FROM (${asSubquery(query)}) AS subquery`;

  if (!paging) {
    return {
      text: `WITH paginated AS (${inner}) SELECT * FROM paginated`,
      values: [...params],
    };
  }

  const limitAt = params.length + 1;
  return {
    text: `WITH paginated AS (${inner} LIMIT $${limitAt} OFFSET $${limitAt + 1}) SELECT * FROM paginated`,
    values: [...params, paging.pageSize, pageOffset(paging)],
  };
}

/** Caps a query at `size` rows. */
export function buildLimitedQuery(query: string, params: QueryParams, size: number): BoundQuery {
  return {
    text: `SELECT * FROM (${asSubquery(query)}) AS subquery LIMIT $${params.length + 1}`,
    values: [...params, size],
  };
}

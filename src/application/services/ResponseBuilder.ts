/**
 * Response Builder — Paginated Envelopes
 * Layer: Application
 *
 * Runs a SELECT through a connector's fetchAll, turns each record into an
 * entity with the caller's decoder, and attaches pagination metadata plus
 * self/next/prev links. An empty result comes back as `{ data: [] }` with no
 * metadata at all. Database and decode errors propagate untouched.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IDatabaseConnector } from '@domain/interfaces/IDatabaseConnector';
import { computeMeta, generateLinks } from '@shared/pagination';
import type { DbRecord, PagedResult, QueryParams, UrlBuilder } from '@shared/types';
import { inject, injectable } from 'tsyringe';

export interface PaginateRequest<T> {
  connector: IDatabaseConnector;
  query: string;
  params?: QueryParams;
  /** Record → entity; expected to throw ValidationError on a bad record. */
  decode: (record: DbRecord) => T;
  /** Route the links point at, e.g. "/user". */
  endpoint: string;
  urlFor: UrlBuilder;
  page: number;
  pageSize: number;
}

@injectable()
export class ResponseBuilder {
  constructor(@inject(TOKENS.Logger) private log: Logger) {}

  async paginate<T>(request: PaginateRequest<T>): Promise<PagedResult<T>> {
    const { connector, query, params, decode, endpoint, urlFor, page, pageSize } = request;

    const result = await connector.fetchAll(query, { params, page, pageSize });
    if (result.data.length === 0) {
      this.log.warn({ query, page, pageSize }, 'No data found for the query');
      return { data: [] };
    }

    const pagination =
      result.metadata?.pagination ?? computeMeta(page, pageSize, result.totalRecords);

    return {
      data: result.data.map(decode),
      metadata: {
        pagination,
        links: generateLinks(urlFor, endpoint, page, pageSize, pagination.total_pages),
      },
    };
  }
}

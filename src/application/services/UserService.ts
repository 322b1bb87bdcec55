/**
 * User Service
 * Layer: Application
 *
 * Lists users a page at a time from the primary database. The SQL is a plain
 * SELECT; paging and the total count are added by the connector.
 */
import { TOKENS } from '@core/types';
import { decodeUser, type User } from '@domain/entities/User';
import type { IDatabaseSession } from '@domain/interfaces/IDatabaseSession';
import type { PagedResult, UrlBuilder } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { ResponseBuilder } from './ResponseBuilder';

export const USERS_ENDPOINT = '/user';

const LIST_USERS_SQL = 'SELECT id, username, email, created_at FROM users ORDER BY id';

export interface ListUsersQuery {
  page: number;
  size: number;
}

@injectable()
export class UserService {
  constructor(@inject(TOKENS.ResponseBuilder) private responses: ResponseBuilder) {}

  async list(
    db: IDatabaseSession,
    { page, size }: ListUsersQuery,
    urlFor: UrlBuilder,
  ): Promise<PagedResult<User>> {
    const connector = await db.primary();
    return this.responses.paginate({
      connector,
      query: LIST_USERS_SQL,
      decode: decodeUser,
      endpoint: USERS_ENDPOINT,
      urlFor,
      page,
      pageSize: size,
    });
  }
}

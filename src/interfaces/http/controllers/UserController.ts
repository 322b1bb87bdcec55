/**
 * User Controller — HTTP Boundary for the User Listing
 * Layer: Interfaces (HTTP)
 *
 * Validates `page`/`size`, asks UserService for the page, and serializes it
 * as `{ data, _metadata }`. No SQL and no pagination maths here. Arrow
 * functions keep `this` bound when Express calls them.
 */
import type { UserService } from '@application/services/UserService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { toUserResource } from '@domain/entities/User';
import { sessionOf } from '@interfaces/http/middleware/databaseSession';
import { validate } from '@interfaces/http/middleware/validation';
import { toPagedResponse } from '@interfaces/http/serializers';
import { urlBuilderFor } from '@interfaces/http/urlBuilder';
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '@shared/constants';
import type { Request, Response } from 'express';
import { z } from 'zod';

export const listUsersQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(DEFAULT_PAGE),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export class UserController {
  private service: UserService;

  constructor() {
    this.service = container.resolve<UserService>(TOKENS.UserService);
  }

  list = async (req: Request, res: Response): Promise<void> => {
    const query = validate(listUsersQuerySchema, req.query);
    const page = await this.service.list(sessionOf(res), query, urlBuilderFor(req));

    res.status(200).json(toPagedResponse(page, toUserResource));
  };
}

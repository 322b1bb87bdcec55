/**
 * User Entity
 * Layer: Domain
 *
 * `User` is the camelCase shape the application works with; `UserResource`
 * is what goes over the wire (`created_at`, ISO-8601). Rows arrive as
 * untyped records, so `decodeUser()` is the one place that checks a record
 * really is a user before anything downstream trusts it.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { DbRecord } from '@shared/types';
import { z } from 'zod';

export interface User {
  id: number;
  username: string;
  email: string;
  createdAt: Date;
}

export interface UserResource {
  id: number;
  username: string;
  email: string;
  created_at: string;
}

const userRecordSchema = z.object({
  // bigint/serial ids may come back from pg as strings
  id: z.coerce.number().int().positive(),
  username: z.string().min(1),
  email: z.string().min(1),
  created_at: z.coerce.date(),
});

/** Throws ValidationError naming the first field that does not fit. */
export function decodeUser(record: DbRecord): User {
  const result = userRecordSchema.safeParse(record);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue ? issue.path.join('.') : 'record';
    throw new ValidationError(
      `Invalid user record: field "${field}" ${issue ? issue.message : 'is malformed'}`,
    );
  }

  const { id, username, email, created_at } = result.data;
  return { id, username, email, createdAt: created_at };
}

export function toUserResource(user: User): UserResource {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    created_at: user.createdAt.toISOString(),
  };
}

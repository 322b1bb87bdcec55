/**
 * Wire format for paginated responses: entities under `data`, page metadata
 * under `_metadata`, which is left out entirely for an empty result.
 */
import type { PagedResult, PageMetadata } from '@shared/types';

export interface PagedResponse<R> {
  data: R[];
  _metadata?: PageMetadata;
}

export function toPagedResponse<T, R>(page: PagedResult<T>, toResource: (entity: T) => R): PagedResponse<R> {
  return {
    data: page.data.map(toResource),
    ...(page.metadata && { _metadata: page.metadata }),
  };
}

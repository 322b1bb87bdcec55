/**
 * Pagination Arithmetic & Navigation Links
 * Layer: Shared
 *
 * `computeMeta` turns a total row count into page metadata;
 * `generateLinks` turns that metadata into self/next/prev URLs. URL building
 * itself belongs to the HTTP layer, which passes in a UrlBuilder: this module
 * only decides which page/size pairs to link to.
 */
import type { LinksMeta, PaginationMeta, UrlBuilder } from '@shared/types';

export function totalPages(totalRecords: number, size: number): number {
  if (size > 0) return Math.ceil(totalRecords / size);
  return totalRecords > 0 ? 1 : 0;
}

export function computeMeta(page: number, size: number, totalRecords: number): PaginationMeta {
  return {
    page,
    size,
    total_records: totalRecords,
    total_pages: totalPages(totalRecords, size),
  };
}

/** `next` only while there is a later page, `prev` only after the first. */
export function generateLinks(
  urlFor: UrlBuilder,
  endpoint: string,
  page: number,
  size: number,
  pageCount: number,
): LinksMeta {
  const links: LinksMeta = { self: urlFor(endpoint, { page, size }) };
  if (page < pageCount) links.next = urlFor(endpoint, { page: page + 1, size });
  if (page > 1) links.prev = urlFor(endpoint, { page: page - 1, size });
  return links;
}

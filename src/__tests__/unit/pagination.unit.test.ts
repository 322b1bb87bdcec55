/**
 * Unit Tests — Pagination Arithmetic & Links
 */
import { computeMeta, generateLinks, totalPages } from '@shared/pagination';
import type { UrlBuilder } from '@shared/types';

const urlFor: UrlBuilder = (endpoint, query) =>
  `http://api.test${endpoint}?page=${query.page}&size=${query.size}`;

describe('totalPages()', () => {
  it('should round up partial pages', () => {
    expect(totalPages(12, 5)).toBe(3);
    expect(totalPages(10, 5)).toBe(2);
  });

  it('should be 0 when there are no records', () => {
    expect(totalPages(0, 5)).toBe(0);
  });

  it('should fall back to a single page when size is 0', () => {
    expect(totalPages(7, 0)).toBe(1);
    expect(totalPages(0, 0)).toBe(0);
  });
});

describe('computeMeta()', () => {
  it('should build the wire-format pagination block', () => {
    expect(computeMeta(2, 5, 12)).toEqual({
      page: 2,
      size: 5,
      total_records: 12,
      total_pages: 3,
    });
  });
});

describe('generateLinks()', () => {
  it('should link both ways from a middle page', () => {
    expect(generateLinks(urlFor, '/user', 2, 5, 3)).toEqual({
      self: 'http://api.test/user?page=2&size=5',
      next: 'http://api.test/user?page=3&size=5',
      prev: 'http://api.test/user?page=1&size=5',
    });
  });

  it('should omit prev on the first page', () => {
    expect(generateLinks(urlFor, '/user', 1, 5, 3)).toEqual({
      self: 'http://api.test/user?page=1&size=5',
      next: 'http://api.test/user?page=2&size=5',
    });
  });

  it('should omit next on the last page', () => {
    expect(generateLinks(urlFor, '/user', 3, 5, 3)).toEqual({
      self: 'http://api.test/user?page=3&size=5',
      prev: 'http://api.test/user?page=2&size=5',
    });
  });

  it('should keep prev but drop next beyond the last page', () => {
    const links = generateLinks(urlFor, '/user', 5, 5, 3);

    expect(links.next).toBeUndefined();
    expect(links.prev).toBe('http://api.test/user?page=4&size=5');
  });
});

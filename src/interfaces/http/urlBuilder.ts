/**
 * Absolute URLs for pagination links, built from the host the client used.
 */
import type { UrlBuilder } from '@shared/types';
import type { Request } from 'express';

export function urlBuilderFor(req: Request): UrlBuilder {
  const origin = `${req.protocol}://${req.get('host') ?? 'localhost'}`;

  return (endpoint, query) => {
    const url = new URL(endpoint, origin);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  };
}

import { IpApiClientOptions } from '../interfaces/ip-api-client-options.interface';
import { IpApiQuery } from '../interfaces/ip-api-query.interface';

export type IpApiResource = 'json' | 'batch';

/**
 * Build the request URL for a lookup.
 *
 * @param target - Appended as a path segment when given. An empty string
 *   yields `/json/`, which makes the API resolve the caller's own IP.
 */
export function buildRequestUrl(
  options: IpApiClientOptions,
  resource: IpApiResource,
  target: string | undefined,
  query: IpApiQuery,
): string {
  const base = options.baseUrl.replace(/\/+$/, '');
  const path =
    target === undefined
      ? `${base}/${resource}`
      : `${base}/${resource}/${encodeTarget(target)}`;

  const params = new URLSearchParams({ fields: String(query.fields) });
  if (query.lang) {
    params.set('lang', query.lang);
  }
  if (options.apiKey) {
    params.set('key', options.apiKey);
  }

  return `${path}?${params.toString()}`;
}

// IPv6 literals keep their colons, which are legal in a path segment
function encodeTarget(target: string): string {
  return encodeURIComponent(target).replace(/%3A/gi, ':');
}

import * as url from 'url';
import { Request } from 'express';

/**
 * Returns the protocol (http or https) depending on whether using localhost or not
 *
 * @param req - The incoming request whose URL should be gleaned
 * @returns The protocol (http or https) to use for public URLs
 */
function _getProtocol(req: Request): string {
  const forwarded = req.get('x-forwarded-proto');
  if (forwarded) return forwarded.split(',')[0].trim();
  const host = req.get('host') || '';
  return (host.startsWith('localhost')
    || host.startsWith('127.0.0.1')) ? 'http' : req.protocol;
}

/**
 * Returns the full string URL being accessed by a http.IncomingMessage, "req" object
 *
 * @param req - The incoming request whose URL should be gleaned
 * @param includeQuery - Include the query string in the returned URL (default: true)
 * @param queryOverrides - Key/value pairs to set / override in the query
 * @returns The URL the incoming request is requesting
 */
export function getRequestUrl(
  req: Request,
  includeQuery = true,
  queryOverrides: Record<string, string | number> = {},
): string {
  const result = new URL(req.originalUrl.split('?')[0], getRequestRoot(req));
  if (includeQuery) {
    const query: Record<string, unknown> = { ...req.query, ...queryOverrides };
    for (const [key, value] of Object.entries(query)) {
      for (const item of Array.isArray(value) ? value : [value]) {
        if (typeof item === 'string' || typeof item === 'number') {
          result.searchParams.append(key, String(item));
        }
      }
    }
  }
  return result.toString();
}

/**
 * Returns the root of the request (protocol, host, port, with path = "/")
 *
 * @param req - The incoming request whose URL should be gleaned
 * @returns The URL the incoming request is requesting
 */
export function getRequestRoot(req: Request): string {
  return url.format({
    protocol: _getProtocol(req),
    host: req.get('host'),
  });
}

/**
 * Resolves a target URL relative to a base URL, as a browser resolves a link
 * @param from - the base URL (may itself be relative)
 * @param to - the URL to resolve
 * @returns the resolved URL
 */
export function resolve(from: string, to: string): string {
  const resolvedUrl = new URL(to, new URL(from, 'resolve://'));
  if (resolvedUrl.protocol === 'resolve:') {
    // `from` is a relative URL.
    const { pathname, search, hash } = resolvedUrl;
    return pathname + search + hash;
  }
  return resolvedUrl.toString();
}

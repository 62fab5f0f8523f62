/**
 * URL helpers for resource collections and elements.
 *
 * Collection and element URLs are relative so they resolve against the API
 * base URL, which therefore must end in a slash.
 */

import type { QueryParams, ResourceDefinition } from './types.js';

/**
 * Adds (`add = true`) or removes a single trailing slash. Idempotent.
 */
export function trailingSlash(value: string, add = true): string {
  if (value.endsWith('/')) {
    return add ? value : value.slice(0, -1);
  }
  return add ? `${value}/` : value;
}

/**
 * API root with exactly one trailing slash.
 */
export function apiBaseUrl(resource: Pick<ResourceDefinition, 'apiUrl'>): string {
  return trailingSlash(resource.apiUrl);
}

/**
 * Collection path, e.g. `users`.
 */
export function collectionUrl(resource: Pick<ResourceDefinition, 'resourceName'>): string {
  return trailingSlash(resource.resourceName, false);
}

/**
 * Element path, e.g. `users/42`, with the id encoded as one path segment.
 * Without an id this is the collection path.
 */
export function elementUrl(
  resource: Pick<ResourceDefinition, 'resourceName'>,
  id?: unknown
): string {
  if (id === undefined || id === null) {
    return collectionUrl(resource);
  }
  return trailingSlash(resource.resourceName) + encodeURIComponent(trailingSlash(String(id), false));
}

/**
 * Formats a query value for the query string. Booleans go out as 1/0.
 */
function formatParam(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  return String(value);
}

/**
 * Resolves `path` against `baseUrl` and appends `query`.
 */
export function resolveUrl(baseUrl: string, path: string, query?: QueryParams): URL {
  const url = new URL(path, baseUrl);

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.append(key, formatParam(value));
    }
  }

  return url;
}

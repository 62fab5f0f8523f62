/**
 * REST resource module.
 *
 * Usage:
 *   import { defineModelResource, createQuery } from './services/resource/index.js';
 *   const users = defineModelResource({ apiUrl: 'https://api.example.test/v1', resourceName: 'users' });
 *   const active = await createQuery(users).where({ status: 'active' }).limit(20).all();
 */

import { getEnv } from '../../lib/env.js';
import { FetchHttpClient } from './http-client.js';
import { Query, type QueryOptions } from './query.js';
import { apiBaseUrl } from './urls.js';
import type { ResourceDefinition, ResourceModel } from './types.js';

// Re-export all types
export * from './types.js';

export { Query, DEFAULT_RESPONSE_HEADERS } from './query.js';
export type { QueryOptions, ResolvedQueryOptions, SubQuerySeed } from './query.js';
export { FetchHttpClient } from './http-client.js';
export type { FetchHttpClientConfig } from './http-client.js';
export { JsonUnserializer, JSON_TYPE, defaultUnserializers, unserializeBody } from './unserializer.js';
export {
  Model,
  defineResource,
  defineModelResource,
  DEFAULT_PAGINATION_ENVELOPE_KEYS,
} from './model.js';
export type { ResourceConfig } from './model.js';
export { trailingSlash, apiBaseUrl, collectionUrl, elementUrl, resolveUrl } from './urls.js';
export { buildQueryParams, isNumeric, toInteger } from './params.js';
export { interpretResponse, createModels, remapPagination } from './populate.js';
export type { Interpretation } from './populate.js';

/**
 * Memoized transports, one per API root.
 * Queries created through createQuery() share them.
 */
const clients = new Map<string, FetchHttpClient>();

/**
 * Returns the shared fetch client for `baseUrl`, creating it on first use.
 * It accepts RESOURCE_DATA_TYPE.
 */
export function getHttpClient(baseUrl: string): FetchHttpClient {
  let client = clients.get(baseUrl);
  if (!client) {
    client = new FetchHttpClient({ baseUrl, headers: { Accept: getEnv().RESOURCE_DATA_TYPE } });
    clients.set(baseUrl, client);
  }
  return client;
}

/**
 * Creates a new Query for `resource`.
 *
 * Without an explicit transport (or custom headers/fetch), the query uses the
 * shared client for the resource's API root.
 */
export function createQuery<M extends ResourceModel>(
  resource: ResourceDefinition<M>,
  options: QueryOptions = {}
): Query<M> {
  const usesDefaultTransport =
    options.httpClient === undefined &&
    options.fetch === undefined &&
    options.requestHeaders === undefined &&
    options.dataType === undefined;

  if (usesDefaultTransport) {
    return new Query(resource, { ...options, httpClient: getHttpClient(apiBaseUrl(resource)) });
  }
  return new Query(resource, options);
}

/**
 * Drops memoized transports.
 * Primarily used for testing purposes.
 */
export function resetHttpClients(): void {
  clients.clear();
}

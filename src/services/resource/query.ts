/**
 * Query builder and CRUD surface over a REST resource.
 *
 * A Query is bound to one resource definition and one HTTP client. Builder
 * methods mutate and return the same instance; terminal methods run one
 * request (two for the count fallback). A Query is not meant to be reused as a
 * cache: pagination data is kept only to answer `count()` after `all()`.
 */

import { createLogger } from '../../lib/logger.js';
import { getEnv } from '../../lib/env.js';
import {
  InvalidCallError,
  InvalidConfigError,
  ResourceHttpError,
  ServerUnreachableError,
} from '../../lib/errors.js';
import { FetchHttpClient } from './http-client.js';
import { interpretResponse, type Interpretation } from './populate.js';
import { assertScalarConditions, buildQueryParams, toInteger } from './params.js';
import { defaultUnserializers } from './unserializer.js';
import { apiBaseUrl, collectionUrl, elementUrl } from './urls.js';
import type {
  Conditions,
  HttpClient,
  HttpResponse,
  HttpVerb,
  HttpRequestOptions,
  Pagination,
  PaginationKeyMap,
  QueryParams,
  ResourceDefinition,
  ResourceModel,
  UnserializerRegistry,
  WriteOutcome,
} from './types.js';

const logger = createLogger('query');

export const DEFAULT_RESPONSE_HEADERS: Readonly<Required<PaginationKeyMap>> = {
  totalCount: 'X-Pagination-Total-Count',
  pageCount: 'X-Pagination-Page-Count',
  currPage: 'X-Pagination-Current-Page',
  perPageCount: 'X-Pagination-Per-Page',
  links: 'Link',
};

/**
 * Query configuration. Everything is optional.
 */
export interface QueryOptions {
  /** Data type requested and decoded (defaults to RESOURCE_DATA_TYPE) */
  dataType?: string;
  /** Headers for every request; defaults to `Accept: <dataType>` when empty */
  requestHeaders?: Record<string, string>;
  /** Canonical pagination field to response header name */
  responseHeaders?: PaginationKeyMap;
  /** Unserializers by data type */
  unserializers?: UnserializerRegistry;
  /** Query parameter name for selected fields */
  selectFieldsKey?: string;
  /** Transport; defaults to a FetchHttpClient on the resource's API root */
  httpClient?: HttpClient;
  /** Fetch implementation for the default transport */
  fetch?: typeof fetch;
}

export interface ResolvedQueryOptions {
  dataType: string;
  requestHeaders: Record<string, string>;
  responseHeaders: PaginationKeyMap;
  unserializers: UnserializerRegistry;
  selectFieldsKey: string;
  httpClient: HttpClient;
}

/**
 * @internal State handed from a query to its count subquery.
 */
export interface SubQuerySeed {
  options: ResolvedQueryOptions;
  where: Conditions;
  select: readonly string[];
}

function resolveOptions(resource: ResourceDefinition, options: QueryOptions): ResolvedQueryOptions {
  const dataType = options.dataType ?? getEnv().RESOURCE_DATA_TYPE;
  const selectFieldsKey = options.selectFieldsKey ?? 'fields';

  if (dataType.trim() === '' || selectFieldsKey.trim() === '') {
    throw new InvalidConfigError('dataType and selectFieldsKey cannot be empty');
  }

  const requestHeaders =
    options.requestHeaders && Object.keys(options.requestHeaders).length > 0
      ? { ...options.requestHeaders }
      : { Accept: dataType };

  return {
    dataType,
    requestHeaders,
    responseHeaders: { ...DEFAULT_RESPONSE_HEADERS, ...options.responseHeaders },
    unserializers: options.unserializers ?? defaultUnserializers(),
    selectFieldsKey,
    httpClient:
      options.httpClient ??
      new FetchHttpClient({
        baseUrl: apiBaseUrl(resource),
        headers: requestHeaders,
        fetch: options.fetch,
      }),
  };
}

export class Query<M extends ResourceModel> {
  private readonly options: ResolvedQueryOptions;
  private readonly subQuery: boolean;

  private _select: string[] = [];
  private _where: Conditions = {};
  private _limit: number | null = null;
  private _offset: number | null = null;
  private _pagination: Pagination | null = null;

  /**
   * @param resource - Resource the query targets
   * @param options - Transport and decoding configuration
   * @param seed - Internal: state of the parent query when spawning a count subquery
   */
  constructor(
    public readonly resource: ResourceDefinition<M>,
    options: QueryOptions = {},
    seed?: SubQuerySeed
  ) {
    this.options = seed?.options ?? resolveOptions(resource, options);
    this.subQuery = seed !== undefined;
    if (seed) {
      this._where = { ...seed.where };
      this._select = [...seed.select];
    }
  }

  // ===========================================================================
  // Builder
  // ===========================================================================

  /** Fields to request; empty means all. */
  select(fields: readonly string[]): this {
    this._select = [...fields];
    return this;
  }

  /**
   * Replaces the filter conditions.
   *
   * @throws InvalidCallError for array or object values
   */
  where(conditions: Conditions): this {
    assertScalarConditions(conditions);
    this._where = { ...conditions };
    return this;
  }

  limit(limit: number | string): this {
    this._limit = toInteger(limit);
    return this;
  }

  offset(offset: number | string): this {
    this._offset = toInteger(offset);
    return this;
  }

  /** True for the internal query spawned by `count()`. */
  get isSubQuery(): boolean {
    return this.subQuery;
  }

  /** Pagination data from the last enveloped `all()` response, if any. */
  get pagination(): Pagination | null {
    return this._pagination ? { ...this._pagination } : null;
  }

  get httpClient(): HttpClient {
    return this.options.httpClient;
  }

  /** Request query mapping for the current builder state. */
  buildQueryParams(): QueryParams {
    return buildQueryParams(
      { where: this._where, select: this._select, limit: this._limit, offset: this._offset },
      {
        selectFieldsKey: this.options.selectFieldsKey,
        limitKey: this.resource.limitKey,
        offsetKey: this.resource.offsetKey,
      }
    );
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * GET the collection.
   *
   * @throws ResourceHttpError on error statuses
   * @throws ServerUnreachableError on transport failure
   */
  async all(): Promise<M[]> {
    const response = await this.request('get', collectionUrl(this.resource), {
      query: this.buildQueryParams(),
    });
    const result = this.interpret(response, true);

    if (result.kind !== 'collection') {
      throw this.toHttpError(result);
    }
    // An empty key map yields no pagination; count() then asks the server
    if (result.pagination && Object.keys(result.pagination).length > 0) {
      this._pagination = result.pagination;
    }
    return result.models;
  }

  /**
   * GET one element by id. Cannot be combined with `where()`.
   *
   * @throws InvalidCallError if conditions are set
   */
  async one(id: string | number): Promise<M | null> {
    if (Object.keys(this._where).length > 0) {
      throw new InvalidCallError('one() can not be called with "where" clause');
    }

    const response = await this.request('get', elementUrl(this.resource, id), {
      query: this.buildQueryParams(),
    });
    const result = this.interpret(response, false);

    if (result.kind !== 'element') {
      throw this.toHttpError(result);
    }
    return result.model;
  }

  /**
   * Number of elements matching the current conditions.
   *
   * Uses, in order: pagination cached by a previous `all()`, the total-count
   * header of a HEAD request, and finally a one-element `all()` on a subquery
   * when the resource declares a pagination envelope.
   */
  async count(): Promise<number> {
    if (this._pagination) {
      return toInteger(this._pagination.totalCount);
    }

    if (this.subQuery) {
      return 0;
    }

    const totalCountHeader = this.options.responseHeaders.totalCount ?? DEFAULT_RESPONSE_HEADERS.totalCount;
    const response = await this.request('head', collectionUrl(this.resource), {
      query: this.buildQueryParams(),
    });
    const count = response.header(totalCountHeader);

    if (count === '' && this.resource.paginationEnvelope !== undefined) {
      logger.debug('Total count header missing, falling back to enveloped collection', {
        resource: this.resource.resourceName,
        header: totalCountHeader,
      });
      const query = this.spawnSubQuery();
      await query.offset(0).limit(1).all();
      return query.count();
    }

    return toInteger(count);
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * POST the model's attributes. A single-field 422 response is recorded on
   * `model`, which is then returned.
   */
  async create(model: M): Promise<M> {
    return this.unwrapWrite(await this.tryCreate(model));
  }

  /**
   * PUT the model's attributes to its element URL. Validation handling as for
   * `create()`.
   */
  async update(model: M): Promise<M> {
    return this.unwrapWrite(await this.tryUpdate(model));
  }

  /**
   * DELETE the model's element URL.
   *
   * @returns true only for a 204 response
   */
  async delete(model: M): Promise<boolean> {
    const response = await this.request('delete', elementUrl(this.resource, model.getPrimaryKey()), {
      json: model.getAttributes(),
    });
    return response.status === 204;
  }

  /** `create()` reporting every outcome as a value. */
  async tryCreate(model: M): Promise<WriteOutcome<M>> {
    return this.write('post', elementUrl(this.resource), model);
  }

  /** `update()` reporting every outcome as a value. */
  async tryUpdate(model: M): Promise<WriteOutcome<M>> {
    return this.write('put', elementUrl(this.resource, model.getPrimaryKey()), model);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async write(verb: 'post' | 'put', url: string, model: M): Promise<WriteOutcome<M>> {
    let response: HttpResponse;
    try {
      response = await this.request(verb, url, { json: model.getAttributes() });
    } catch (error) {
      if (error instanceof ServerUnreachableError) {
        return { ok: false, kind: 'transport', cause: error };
      }
      throw error;
    }

    const result = this.interpret(response, false);
    switch (result.kind) {
      case 'validation':
        model.addError(result.field, result.message);
        return { ok: false, kind: 'validation', field: result.field, message: result.message, model };
      case 'http-error':
        return { ok: false, kind: 'http', status: result.status, message: result.message };
      case 'element':
        if (result.model === null) {
          return { ok: true, model };
        }
        return { ok: true, model: result.model };
      case 'collection':
        return { ok: true, model: result.models[0] ?? model };
    }
  }

  private unwrapWrite(outcome: WriteOutcome<M>): M {
    if (outcome.ok || outcome.kind === 'validation') {
      return outcome.model;
    }
    if (outcome.kind === 'http') {
      throw new ResourceHttpError(outcome.status, outcome.message);
    }
    throw outcome.cause;
  }

  private async request(verb: HttpVerb, url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    try {
      return await this.options.httpClient.request(verb, url, options);
    } catch (error) {
      if (error instanceof ServerUnreachableError) {
        throw error;
      }
      throw new ServerUnreachableError(this.options.httpClient.baseUrl, error);
    }
  }

  private interpret(response: HttpResponse, asCollection: boolean): Interpretation<M> {
    return interpretResponse(response, {
      resource: this.resource,
      dataType: this.options.dataType,
      unserializers: this.options.unserializers,
      asCollection,
    });
  }

  private toHttpError(result: Interpretation<M>): ResourceHttpError {
    if (result.kind === 'http-error') {
      return new ResourceHttpError(result.status, result.message);
    }
    // Field errors outside create/update have no model to attach to
    if (result.kind === 'validation') {
      return new ResourceHttpError(422, `${result.field}: ${result.message}`);
    }
    return new ResourceHttpError(500, `Unexpected ${result.kind} response`);
  }

  /**
   * Fresh query over the same resource and transport, with copies of the
   * current conditions and field selection, flagged as a subquery.
   */
  private spawnSubQuery(): Query<M> {
    return new Query(this.resource, {}, {
      options: this.options,
      where: this._where,
      select: this._select,
    });
  }
}

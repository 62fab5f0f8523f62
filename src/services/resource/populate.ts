/**
 * Response interpretation.
 *
 * Turns a raw HTTP response into a tagged result: models, a single-field
 * validation failure, or an HTTP error. The Query decides which of these are
 * thrown.
 */

import { unserializeBody } from './unserializer.js';
import { PAGINATION_FIELDS } from './types.js';
import type {
  Attributes,
  DecodedValue,
  HttpResponse,
  Pagination,
  ResourceDefinition,
  ResourceModel,
  UnserializerRegistry,
} from './types.js';

export type Interpretation<M extends ResourceModel> =
  | { kind: 'collection'; models: M[]; pagination: Pagination | null }
  | { kind: 'element'; model: M | null }
  | { kind: 'validation'; field: string; message: string }
  | { kind: 'http-error'; status: number; message: string };

export interface InterpretOptions<M extends ResourceModel> {
  resource: ResourceDefinition<M>;
  dataType: string;
  unserializers: UnserializerRegistry;
  /** Collection semantics (`all`) versus single element (`one`, writes) */
  asCollection: boolean;
}

type DecodedObject = { [key: string]: DecodedValue };

function isObject(value: DecodedValue | undefined): value is DecodedObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Matches `[{ "field": "...", "message": "..." }]`.
 */
function singleFieldError(data: DecodedValue): { field: string; message: string } | null {
  if (!Array.isArray(data) || data.length !== 1) {
    return null;
  }
  const [entry] = data;
  if (isObject(entry) && typeof entry.field === 'string' && typeof entry.message === 'string') {
    return { field: entry.field, message: entry.message };
  }
  return null;
}

function errorMessage(status: number, data: DecodedValue): string {
  if (typeof data === 'string' && data !== '') {
    return data;
  }
  if (isObject(data) && typeof data.message === 'string') {
    return data.message;
  }
  return `HTTP ${status}`;
}

/**
 * Builds one model per object element and copies its primary key into the
 * model's identity. Non-object elements are skipped.
 */
export function createModels<M extends ResourceModel>(
  resource: ResourceDefinition<M>,
  elements: readonly DecodedValue[]
): M[] {
  const models: M[] = [];

  for (const element of elements) {
    if (!isObject(element)) {
      continue;
    }
    const attributes: Attributes = { ...element };
    const model = resource.instantiate().setAttributes(attributes);
    models.push(model.setId(model.getAttribute(resource.primaryKey)));
  }

  return models;
}

/**
 * Remaps pagination data from wire keys to canonical names. Every configured
 * canonical field is present; missing wire keys give null.
 */
export function remapPagination(
  keys: ResourceDefinition['paginationEnvelopeKeys'],
  data: DecodedObject
): Pagination {
  const pagination: Pagination = {};

  for (const field of PAGINATION_FIELDS) {
    const wireName = keys[field];
    if (wireName === undefined) {
      continue;
    }
    pagination[field] = data[wireName] ?? null;
  }

  return pagination;
}

function unwrapCollection<M extends ResourceModel>(
  resource: ResourceDefinition<M>,
  data: DecodedObject
): Interpretation<M> {
  let elements: DecodedValue[] = [];
  if (resource.collectionEnvelope !== undefined) {
    const enveloped = data[resource.collectionEnvelope];
    elements = Array.isArray(enveloped) ? enveloped : [];
  }

  let pagination: Pagination | null = null;
  if (resource.paginationEnvelope !== undefined) {
    const meta = data[resource.paginationEnvelope];
    if (isObject(meta)) {
      pagination = remapPagination(resource.paginationEnvelopeKeys, meta);
    }
  }

  return { kind: 'collection', models: createModels(resource, elements), pagination };
}

/**
 * Decodes and interprets a response.
 */
export function interpretResponse<M extends ResourceModel>(
  response: HttpResponse,
  options: InterpretOptions<M>
): Interpretation<M> {
  const { resource, asCollection } = options;
  const data = unserializeBody(response, options.dataType, options.unserializers);

  if (response.status >= 400) {
    const fieldError = response.status === 422 ? singleFieldError(data) : null;
    if (fieldError) {
      return { kind: 'validation', ...fieldError };
    }
    return { kind: 'http-error', status: response.status, message: errorMessage(response.status, data) };
  }

  // Bare list: a collection without envelope
  if (Array.isArray(data)) {
    const models = createModels(resource, data);
    return asCollection
      ? { kind: 'collection', models, pagination: null }
      : { kind: 'element', model: models[0] ?? null };
  }

  if (isObject(data)) {
    if (asCollection) {
      return unwrapCollection(resource, data);
    }
    const [model] = createModels(resource, [data]);
    return { kind: 'element', model: model ?? null };
  }

  return asCollection
    ? { kind: 'collection', models: [], pagination: null }
    : { kind: 'element', model: null };
}

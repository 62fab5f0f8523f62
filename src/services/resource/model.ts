/**
 * Base model and resource definitions.
 *
 * A resource definition is plain validated metadata plus a factory; the Query
 * reads declared keys only and never inspects model classes.
 */

import { z } from 'zod';
import { getEnv } from '../../lib/env.js';
import { InvalidConfigError } from '../../lib/errors.js';
import type {
  Attributes,
  PaginationKeyMap,
  ResourceDefinition,
  ResourceModel,
} from './types.js';

// ============================================================================
// Model
// ============================================================================

/**
 * Attribute bag with identity and field-level errors.
 */
export class Model implements ResourceModel {
  private attributes: Attributes = {};
  private errors = new Map<string, string[]>();
  private id: unknown = undefined;

  constructor(
    private readonly primaryKey = 'id',
    attributes: Attributes = {}
  ) {
    this.setAttributes(attributes);
  }

  getAttributes(): Attributes {
    return { ...this.attributes };
  }

  /** Merges `attributes` into the current ones. */
  setAttributes(attributes: Attributes): this {
    this.attributes = { ...this.attributes, ...attributes };
    return this;
  }

  getAttribute(name: string): unknown {
    return this.attributes[name];
  }

  setAttribute(name: string, value: unknown): this {
    this.attributes[name] = value;
    return this;
  }

  getPrimaryKey(): unknown {
    return this.attributes[this.primaryKey];
  }

  getId(): unknown {
    return this.id;
  }

  setId(id: unknown): this {
    this.id = id;
    return this;
  }

  addError(field: string, message: string): void {
    const messages = this.errors.get(field) ?? [];
    messages.push(message);
    this.errors.set(field, messages);
  }

  /**
   * Messages for one field, or every field's messages keyed by field.
   */
  getErrors(): Record<string, string[]>;
  getErrors(field: string): string[];
  getErrors(field?: string): Record<string, string[]> | string[] {
    if (field !== undefined) {
      return [...(this.errors.get(field) ?? [])];
    }
    return Object.fromEntries([...this.errors].map(([key, messages]) => [key, [...messages]]));
  }

  hasErrors(field?: string): boolean {
    if (field !== undefined) {
      return (this.errors.get(field)?.length ?? 0) > 0;
    }
    return this.errors.size > 0;
  }

  clearErrors(): void {
    this.errors.clear();
  }
}

// ============================================================================
// Resource definitions
// ============================================================================

export const DEFAULT_PAGINATION_ENVELOPE_KEYS: Readonly<Required<PaginationKeyMap>> = {
  totalCount: 'totalCount',
  pageCount: 'pageCount',
  currPage: 'currentPage',
  perPageCount: 'perPage',
  links: 'links',
};

const paginationKeysSchema = z
  .object({
    totalCount: z.string().min(1),
    pageCount: z.string().min(1),
    currPage: z.string().min(1),
    perPageCount: z.string().min(1),
    links: z.string().min(1),
  })
  .partial()
  .strict();

const resourceConfigSchema = z.object({
  apiUrl: z.string().url('apiUrl must be an absolute URL').optional(),
  resourceName: z.string().min(1, 'resourceName cannot be empty'),
  primaryKey: z.string().min(1).default('id'),
  collectionEnvelope: z.string().min(1).optional(),
  paginationEnvelope: z.string().min(1).optional(),
  paginationEnvelopeKeys: paginationKeysSchema.default(DEFAULT_PAGINATION_ENVELOPE_KEYS),
  limitKey: z.string().min(1).default('per-page'),
  offsetKey: z.string().min(1).default('page'),
});

/**
 * Resource metadata as written by the caller; omitted fields take defaults.
 */
export type ResourceConfig = z.input<typeof resourceConfigSchema>;

/**
 * Validates resource metadata and binds it to a model factory.
 *
 * `apiUrl` falls back to RESOURCE_API_URL.
 *
 * @throws InvalidConfigError if the metadata is invalid or no API URL is known
 */
export function defineResource<M extends ResourceModel>(
  config: ResourceConfig,
  instantiate: (primaryKey: string) => M
): ResourceDefinition<M> {
  const result = resourceConfigSchema.safeParse(config);

  if (!result.success) {
    throw new InvalidConfigError(
      'Invalid resource definition',
      result.error.errors.map((err) => `${err.path.join('.') || 'config'}: ${err.message}`)
    );
  }

  const { apiUrl = getEnv().RESOURCE_API_URL, primaryKey, ...rest } = result.data;
  if (!apiUrl) {
    throw new InvalidConfigError(
      `Resource "${rest.resourceName}" has no apiUrl and RESOURCE_API_URL is not set`
    );
  }

  return Object.freeze({
    ...rest,
    apiUrl,
    primaryKey,
    paginationEnvelopeKeys: Object.freeze({ ...rest.paginationEnvelopeKeys }),
    instantiate: () => instantiate(primaryKey),
  });
}

/**
 * Shorthand for resources backed by the base Model class.
 */
export function defineModelResource(config: ResourceConfig): ResourceDefinition<Model> {
  return defineResource(config, (primaryKey) => new Model(primaryKey));
}

/**
 * Types for the REST resource layer.
 *
 * The Query consumes three capabilities (HTTP client, unserializer, model) and
 * these types are the seams between them.
 */

// ============================================================================
// Values
// ============================================================================

/**
 * Value produced by an unserializer. JSON decodes into this shape; the raw body
 * string is returned when decoding is not possible.
 */
export type DecodedValue =
  | string
  | number
  | boolean
  | null
  | DecodedValue[]
  | { [key: string]: DecodedValue };

/**
 * Attribute bag held by a model instance.
 */
export type Attributes = Record<string, unknown>;

/**
 * Scalar accepted as a `where` condition.
 */
export type ConditionValue = string | number | boolean;

/**
 * Field name to condition mapping passed to `Query.where()`.
 */
export type Conditions = Record<string, ConditionValue>;

/**
 * Flat request query mapping sent with GET and HEAD requests.
 */
export type QueryParams = Record<string, string | number | boolean>;

// ============================================================================
// Pagination
// ============================================================================

/**
 * Canonical pagination field names.
 */
export type PaginationField = 'totalCount' | 'pageCount' | 'currPage' | 'perPageCount' | 'links';

export const PAGINATION_FIELDS: readonly PaginationField[] = [
  'totalCount',
  'pageCount',
  'currPage',
  'perPageCount',
  'links',
];

/**
 * Canonical pagination field to server-side name (a JSON key inside the
 * pagination envelope, or a response header name).
 */
export type PaginationKeyMap = Partial<Record<PaginationField, string>>;

/**
 * Pagination data remapped to canonical names. Values are kept as the server
 * sent them; `null` when the configured wire key was missing. `Query.count()`
 * gives the integer view of `totalCount`.
 */
export type Pagination = Partial<Record<PaginationField, DecodedValue>>;

// ============================================================================
// Model capability
// ============================================================================

/**
 * Instance-side contract the Query relies on.
 */
export interface ResourceModel {
  getAttributes(): Attributes;
  setAttributes(attributes: Attributes): this;
  getAttribute(name: string): unknown;
  getPrimaryKey(): unknown;
  setId(id: unknown): this;
  addError(field: string, message: string): void;
}

/**
 * Resource metadata plus a factory for model instances.
 */
export interface ResourceDefinition<M extends ResourceModel = ResourceModel> {
  /** API root, e.g. https://api.example.test/v1 */
  readonly apiUrl: string;
  /** Path segment of the collection, e.g. users */
  readonly resourceName: string;
  /** Attribute holding the identifier */
  readonly primaryKey: string;
  /** Body key wrapping the element list in collection responses */
  readonly collectionEnvelope?: string;
  /** Body key wrapping pagination data in collection responses */
  readonly paginationEnvelope?: string;
  /** Canonical pagination field to key inside the pagination envelope */
  readonly paginationEnvelopeKeys: PaginationKeyMap;
  /** Query parameter name for the limit */
  readonly limitKey: string;
  /** Query parameter name for the offset */
  readonly offsetKey: string;
  /** Creates an empty model instance */
  instantiate(): M;
}

// ============================================================================
// HTTP client capability
// ============================================================================

export type HttpVerb = 'get' | 'head' | 'post' | 'put' | 'delete';

export interface HttpRequestOptions {
  /** Query string parameters */
  query?: QueryParams;
  /** Value sent as a JSON body */
  json?: unknown;
}

export interface HttpResponse {
  readonly status: number;
  /** Case-insensitive header lookup; empty string when absent */
  header(name: string): string;
  /** Raw body text */
  readonly body: string;
}

export interface HttpClient {
  /** Base URL relative request paths resolve against */
  readonly baseUrl: string;
  /**
   * Performs one request. Error statuses resolve normally; only transport
   * failures reject (with ServerUnreachableError).
   */
  request(verb: HttpVerb, url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

// ============================================================================
// Unserializer capability
// ============================================================================

export interface Unserializer {
  /**
   * Decodes a body. Throws when the body is not valid for this format; the
   * caller falls back to the raw string.
   */
  unserialize(body: string): DecodedValue;
}

/**
 * Data type (e.g. application/json) to unserializer.
 */
export type UnserializerRegistry = Record<string, Unserializer>;

// ============================================================================
// Outcomes
// ============================================================================

/**
 * Result of a create or update, without relying on exceptions.
 */
export type WriteOutcome<M extends ResourceModel> =
  | { ok: true; model: M }
  | { ok: false; kind: 'validation'; field: string; message: string; model: M }
  | { ok: false; kind: 'http'; status: number; message: string }
  | { ok: false; kind: 'transport'; cause: unknown };

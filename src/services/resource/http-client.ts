/**
 * Fetch-based HTTP client.
 *
 * Uses native fetch (Node 18+). Error statuses are handed back as ordinary
 * responses; the Query decides what they mean. Only failures that never reach
 * HTTP (refused connection, DNS, aborted request) are raised, wrapped in
 * ServerUnreachableError. Nothing is retried.
 */

import { createLogger } from '../../lib/logger.js';
import { ServerUnreachableError } from '../../lib/errors.js';
import { resolveUrl } from './urls.js';
import type { HttpClient, HttpRequestOptions, HttpResponse, HttpVerb } from './types.js';

const logger = createLogger('http');

/**
 * Fetch client configuration.
 */
export interface FetchHttpClientConfig {
  /** Base URL relative paths resolve against; should end in a slash */
  baseUrl: string;
  /** Headers sent with every request */
  headers?: Record<string, string>;
  /** Fetch implementation (optional, defaults to the global fetch) */
  fetch?: typeof fetch;
}

/**
 * Response captured from fetch with the body already read.
 */
class FetchResponse implements HttpResponse {
  constructor(
    public readonly status: number,
    private readonly headers: Headers,
    public readonly body: string
  ) {}

  header(name: string): string {
    return this.headers.get(name) ?? '';
  }
}

export class FetchHttpClient implements HttpClient {
  public readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(config: FetchHttpClientConfig) {
    this.baseUrl = config.baseUrl;
    this.headers = config.headers ?? {};
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Sends one request.
   *
   * @param verb - HTTP verb
   * @param url - Path relative to the base URL (or absolute)
   * @param options - Query parameters and/or JSON body
   * @throws ServerUnreachableError when no HTTP response was received
   */
  async request(verb: HttpVerb, url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const target = resolveUrl(this.baseUrl, url, options.query);
    const method = verb.toUpperCase();
    const headers: Record<string, string> = { ...this.headers };

    const init: RequestInit = { method, headers };
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.json);
    }

    logger.debug('Request sent', { method, url: target.toString() });

    const startTime = Date.now();

    try {
      const response = await this.fetchImpl(target.toString(), init);
      const body = method === 'HEAD' ? '' : await response.text();

      logger.debug('Response received', {
        method,
        url: target.toString(),
        status: response.status,
        duration: Date.now() - startTime,
      });

      return new FetchResponse(response.status, response.headers, body);
    } catch (error) {
      logger.error('Request failed before a response was received', {
        method,
        url: target.toString(),
        baseUrl: this.baseUrl,
        error: error instanceof Error ? error.message : String(error),
      });

      throw new ServerUnreachableError(this.baseUrl, error);
    }
  }
}

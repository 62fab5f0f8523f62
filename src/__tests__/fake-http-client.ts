/**
 * In-process HTTP client for Query tests.
 *
 * Responses are queued up front and handed out in order; every request is
 * recorded so tests can assert verb, URL, query and body.
 */

import type { HttpClient, HttpRequestOptions, HttpResponse, HttpVerb } from '../services/resource/types.js';

export interface RecordedRequest {
  verb: HttpVerb;
  url: string;
  options: HttpRequestOptions;
}

export function fakeResponse(
  status: number,
  body = '',
  headers: Record<string, string> = {}
): HttpResponse {
  const lowered = new Map(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]));
  return {
    status,
    body,
    header: (name) => lowered.get(name.toLowerCase()) ?? '',
  };
}

/**
 * JSON response with a matching Content-Type.
 */
export function jsonResponse(
  data: unknown,
  status = 200,
  headers: Record<string, string> = {}
): HttpResponse {
  return fakeResponse(status, JSON.stringify(data), {
    'Content-Type': 'application/json; charset=UTF-8',
    ...headers,
  });
}

export class FakeHttpClient implements HttpClient {
  public readonly calls: RecordedRequest[] = [];
  private readonly queue: (HttpResponse | Error)[] = [];

  constructor(public readonly baseUrl = 'https://api.example.test/v1/') {}

  enqueue(...responses: (HttpResponse | Error)[]): this {
    this.queue.push(...responses);
    return this;
  }

  async request(verb: HttpVerb, url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    this.calls.push({ verb, url, options });
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error(`No fake response queued for ${verb.toUpperCase()} ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

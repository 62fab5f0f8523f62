import { createLogger } from '../../lib/logger.js';
import type { DecodedValue, HttpResponse, Unserializer, UnserializerRegistry } from './types.js';

const logger = createLogger('unserializer');

export const JSON_TYPE = 'application/json';

/**
 * Decodes JSON bodies.
 */
export class JsonUnserializer implements Unserializer {
  unserialize(body: string): DecodedValue {
    const value: DecodedValue = JSON.parse(body);
    return value;
  }
}

/**
 * Registry used when a Query is built without its own.
 */
export function defaultUnserializers(): UnserializerRegistry {
  return { [JSON_TYPE]: new JsonUnserializer() };
}

/**
 * Decodes a response body with the unserializer registered for `dataType`,
 * provided the response declares that type in its Content-Type header.
 *
 * Falls back to the raw body when the type does not match, no unserializer is
 * registered, or decoding fails. Never throws.
 */
export function unserializeBody(
  response: HttpResponse,
  dataType: string,
  unserializers: UnserializerRegistry
): DecodedValue {
  const contentType = response.header('Content-Type').toLowerCase();
  const unserializer = unserializers[dataType];

  if (!unserializer || !contentType.includes(dataType.toLowerCase())) {
    return response.body;
  }

  try {
    return unserializer.unserialize(response.body);
  } catch (error) {
    logger.warn('Response body could not be decoded, returning raw text', {
      dataType,
      status: response.status,
      error: error instanceof Error ? error.message : String(error),
      rawBody: response.body.slice(0, 500),
    });
    return response.body;
  }
}

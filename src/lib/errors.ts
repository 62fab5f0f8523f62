/**
 * Error types raised by the resource layer.
 *
 * Application HTTP errors, transport failures and invalid usage are kept apart
 * so callers can branch on `instanceof` (or on `code`) without parsing messages.
 */

/**
 * Base class for every error thrown by this package.
 */
export class ResourceError extends Error {
  /** Machine-readable error code */
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceError';
    this.code = code;
  }
}

/**
 * The server answered with an error status (anything >= 400 that is not a
 * single-field validation failure).
 */
export class ResourceHttpError extends ResourceError {
  public readonly status: number;
  public readonly isRetryable: boolean;

  constructor(status: number, message: string) {
    super(message, 'HTTP_ERROR');
    this.name = 'ResourceHttpError';
    this.status = status;
    this.isRetryable = isRetryableHttpStatus(status);
  }
}

/**
 * The request never produced an HTTP response (connection refused, DNS
 * failure, aborted or timed-out fetch).
 */
export class ServerUnreachableError extends ResourceError {
  public readonly status = 500;
  public readonly baseUrl: string;

  constructor(baseUrl: string, cause: unknown) {
    const name = cause instanceof Error ? cause.name : 'Error';
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${name}: url=${baseUrl} ${reason}`, 'SERVER_UNREACHABLE', { cause });
    this.name = 'ServerUnreachableError';
    this.baseUrl = baseUrl;
  }
}

/**
 * A query method was called in a state that makes it meaningless, e.g. `one()`
 * after `where()`.
 */
export class InvalidCallError extends ResourceError {
  constructor(message: string) {
    super(message, 'INVALID_CALL');
    this.name = 'InvalidCallError';
  }
}

/**
 * A resource definition or query option failed validation.
 */
export class InvalidConfigError extends ResourceError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

/**
 * Checks if an HTTP status code indicates a transient server condition.
 *
 * @param status - HTTP status code
 * @returns true if a caller may reasonably retry
 */
export function isRetryableHttpStatus(status: number): boolean {
  return [429, 503, 408, 502, 504].includes(status);
}

/**
 * Error classes for the Jama MCP server.
 *
 * All errors extend {@link JamaMcpError} which provides:
 * - A machine-readable `code` callers branch on instead of matching messages
 * - An HTTP-compatible `statusCode`
 *
 * Startup errors (credentials, configuration) abort the process. Errors raised
 * while a tool runs are turned into an `isError` tool result by the dispatcher.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { isCredentialsError } from './errors.js';
 *
 * try {
 *   await acquireJamaClient(process.env, { log });
 * } catch (err) {
 *   if (isCredentialsError(err) && err.code === 'MISSING_CREDENTIALS') {
 *     console.error('Set JAMA_CLIENT_ID/JAMA_CLIENT_SECRET or JAMA_AWS_SECRET_PATH');
 *   }
 *   throw err;
 * }
 * ```
 */

export type JamaErrorCode =
  | 'MISSING_CREDENTIALS'
  | 'SECRETS_BACKEND_UNAVAILABLE'
  | 'SECRETS_BACKEND_ACCESS'
  | 'INVALID_SECRET_FORMAT'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'JAMA_API_ERROR';

/**
 * Base error class for all Jama MCP errors.
 *
 * @example
 * ```typescript
 * try {
 *   throw new JamaMcpError('Something went wrong', 'JAMA_API_ERROR', 502);
 * } catch (err) {
 *   if (err instanceof JamaMcpError) {
 *     console.log(err.code);       // 'JAMA_API_ERROR'
 *     console.log(err.statusCode); // 502
 *   }
 * }
 * ```
 */
export class JamaMcpError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code
   * @param statusCode - HTTP status code (default: 500)
   */
  constructor(
    message: string,
    public readonly code: JamaErrorCode,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'JamaMcpError';
  }
}

/**
 * Base class for failures while resolving OAuth client credentials.
 */
export class CredentialsError extends JamaMcpError {
  constructor(message: string, code: CredentialsErrorCode) {
    super(message, code, 500);
    this.name = 'CredentialsError';
  }
}

export type CredentialsErrorCode = Extract<
  JamaErrorCode,
  'MISSING_CREDENTIALS' | 'SECRETS_BACKEND_UNAVAILABLE' | 'SECRETS_BACKEND_ACCESS' | 'INVALID_SECRET_FORMAT'
>;

/**
 * Neither the direct client id/secret pair nor a Parameter Store path is configured.
 */
export class MissingCredentialsError extends CredentialsError {
  constructor() {
    super(
      'Missing Jama OAuth credentials. Set JAMA_CLIENT_ID and JAMA_CLIENT_SECRET, ' +
        'or configure the AWS Parameter Store fallback with JAMA_AWS_SECRET_PATH.',
      'MISSING_CREDENTIALS'
    );
    this.name = 'MissingCredentialsError';
  }
}

/**
 * The fallback path was taken but the AWS SDK client for SSM cannot be loaded.
 */
export class SecretsBackendUnavailableError extends CredentialsError {
  constructor(packageName: string, options?: { cause?: unknown }) {
    super(
      `${packageName} is required to read credentials from AWS Parameter Store but is not installed.`,
      'SECRETS_BACKEND_UNAVAILABLE'
    );
    this.name = 'SecretsBackendUnavailableError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * Fetching the parameter failed. The message names the path, never the value.
 */
export class SecretsBackendAccessError extends CredentialsError {
  constructor(
    public readonly secretPath: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to retrieve secret from AWS Parameter Store path '${secretPath}'`, 'SECRETS_BACKEND_ACCESS');
    this.name = 'SecretsBackendAccessError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * The parameter value is not JSON, or lacks a non-empty `client_id`/`client_secret`.
 */
export class InvalidSecretFormatError extends CredentialsError {
  constructor(message: string) {
    super(message, 'INVALID_SECRET_FORMAT');
    this.name = 'InvalidSecretFormatError';
  }
}

/**
 * Required server configuration is missing or malformed.
 *
 * @example
 * ```typescript
 * if (!env.JAMA_URL) {
 *   throw new ConfigurationError('JAMA_URL environment variable is required.');
 * }
 * ```
 */
export class ConfigurationError extends JamaMcpError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

/**
 * A single-record lookup returned nothing.
 *
 * @example
 * ```typescript
 * const item = await client.getItem(itemId);
 * if (!item) {
 *   throw new NotFoundError('Item', itemId);
 *   // message: "Item not found: 999"
 * }
 * ```
 */
export class NotFoundError extends JamaMcpError {
  /**
   * @param resource - The type of resource (e.g., 'Item', 'Test cycle')
   * @param id - The identifier that was not found
   */
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Tool arguments failed validation.
 */
export class ValidationError extends JamaMcpError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

/**
 * The Jama REST API answered with a non-2xx status.
 */
export class JamaApiError extends JamaMcpError {
  constructor(
    public readonly status: number,
    public readonly method: string,
    public readonly resource: string,
    detail?: string
  ) {
    super(
      `Jama API ${method} ${resource} failed with HTTP ${status}${detail ? `: ${detail}` : ''}`,
      'JAMA_API_ERROR',
      status
    );
    this.name = 'JamaApiError';
  }
}

export function isCredentialsError(err: unknown): err is CredentialsError {
  return err instanceof CredentialsError;
}

/**
 * Defines custom error types for the DocShelf application.
 */

/**
 * Base class for all DocShelf specific errors.
 * Carries a stable errorCode and optional structured details.
 */
export class DocShelfError extends Error {
  public errorCode: string; // Mutable so subclasses can refine it
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Resource Related Errors ---

export class ResourceNotFoundError extends DocShelfError {
  constructor(resourceUri: string, details?: Record<string, unknown>) {
    super(`Resource not found: ${resourceUri}`, 'RESOURCE_NOT_FOUND', { resourceUri, ...details });
  }
}

// --- Fetch Errors ---

export class FetchError extends DocShelfError {
  constructor(message: string, errorCode: string = 'FETCH_ERROR', details?: Record<string, unknown>) {
    super(`Failed to fetch: ${message}`, errorCode, details);
  }
}

export class FetchTimeoutError extends FetchError {
  constructor(url: string, timeoutMs: number, details?: Record<string, unknown>) {
    super(`Timeout (${timeoutMs}ms) occurred while fetching URL: ${url}`, 'FETCH_TIMEOUT', { url, timeoutMs, ...details });
  }
}

export class FetchNetworkError extends FetchError {
  constructor(url: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Network error occurred while fetching URL: ${url}. ${originalError?.message || ''}`.trim(), 'FETCH_NETWORK_ERROR', { url, originalError, ...details });
  }
}

export class FetchHttpError extends FetchError {
  public readonly statusCode: number;

  constructor(url: string, statusCode: number, statusText?: string, details?: Record<string, unknown>) {
    super(`HTTP error ${statusCode} (${statusText || 'Unknown Status'}) occurred while fetching URL: ${url}`, 'FETCH_HTTP_ERROR', { url, statusCode, statusText, ...details });
    this.statusCode = statusCode;
  }
}

// --- Filesystem Errors ---

export class FileSystemError extends DocShelfError {
  constructor(message: string, path?: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Filesystem error: ${message}${path ? ` (Path: ${path})` : ''}. ${originalError?.message || ''}`.trim(), 'FILESYSTEM_ERROR', { path, originalError, ...details });
  }
}

// --- Serialization Errors ---

export class SerializationError extends DocShelfError {
  constructor(message: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Serialization error: ${message}. ${originalError?.message || ''}`.trim(), 'SERIALIZATION_ERROR', { originalError, ...details });
  }
}

// --- Configuration Errors ---

export class ConfigurationError extends DocShelfError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

// --- MCP Handler Errors ---

export class McpHandlerError extends DocShelfError {
  constructor(message: string, toolName?: string, details?: Record<string, unknown>) {
    super(`MCP Handler error${toolName ? ` in tool ${toolName}` : ''}: ${message}`, 'MCP_HANDLER_ERROR', { toolName, ...details });
  }
}

export function isDocShelfError(error: unknown): error is DocShelfError {
  return error instanceof DocShelfError;
}

/**
 * Normalize an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

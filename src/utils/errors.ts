/**
 * Error Response Utilities
 *
 * Standardized error responses for the JSON API and health endpoint.
 * Every error body has the shape `{ error: string, details?: unknown }`.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: string;
  details?: unknown;
}

/**
 * Validation error detail format
 */
export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * Error types with their HTTP status codes
 */
export const ErrorType = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type ErrorType = (typeof ErrorType)[keyof typeof ErrorType];

/**
 * Create a standardized error response
 *
 * @example
 * ```ts
 * return errorResponse(c, 'Resource not found', 404, 'Market ID 12 does not exist');
 * ```
 */
export function errorResponse(
  c: Context,
  message: string,
  statusCode: ContentfulStatusCode,
  details?: unknown
): Response {
  const response: ErrorResponse = { error: message };

  if (details !== undefined) {
    response.details = details;
  }

  return c.json<ErrorResponse>(response, statusCode);
}

/**
 * Create a 400 Bad Request error response
 */
export function badRequestError(
  c: Context,
  message: string = 'Bad request',
  details?: unknown
): Response {
  return errorResponse(c, message, ErrorType.BAD_REQUEST, details);
}

/**
 * Create a 404 Not Found error response
 *
 * @param resource - Resource description (e.g., 'Market', 'Customer')
 * @param identifier - Optional identifier (e.g., 'ID 4')
 *
 * @example
 * ```ts
 * return notFoundError(c, 'Market', `ID ${id}`);
 * return notFoundError(c, 'Route');
 * ```
 */
export function notFoundError(
  c: Context,
  resource: string,
  identifier?: string
): Response {
  const message = identifier
    ? `${resource} with ${identifier} not found`
    : `${resource} not found`;

  return errorResponse(c, message, ErrorType.NOT_FOUND, identifier);
}

/**
 * Create a 503 Service Unavailable error response
 */
export function serviceUnavailableError(
  c: Context,
  message: string = 'Service unavailable'
): Response {
  return errorResponse(c, message, ErrorType.SERVICE_UNAVAILABLE);
}

/**
 * Create a 500 Internal Server Error response
 *
 * @param logDetails - Details to log (not included in response)
 */
export function internalServerError(
  c: Context,
  message: string = 'Internal server error',
  logDetails?: unknown
): Response {
  if (logDetails !== undefined) {
    console.error(`${message}:`, logDetails);
  }

  return errorResponse(
    c,
    message,
    ErrorType.INTERNAL_SERVER_ERROR,
    'An unexpected error occurred. Please try again later.'
  );
}

/**
 * Create a validation error response with field-level details
 *
 * @example
 * ```ts
 * return validationError(c, [
 *   { field: 'q', message: 'Please enter a product name to search.' },
 * ]);
 * ```
 */
export function validationError(
  c: Context,
  details: ValidationErrorDetail[]
): Response {
  return badRequestError(c, 'Validation failed', details);
}

/**
 * Custom API error class with type and details
 */
export class ApiError extends Error {
  constructor(
    public type: ErrorType,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * The database could not be reached (refused, bad credentials, unknown
 * database, dropped connection)
 */
export class DatabaseUnavailableError extends ApiError {
  constructor(cause: string) {
    super(ErrorType.SERVICE_UNAVAILABLE, `Error connecting to database: ${cause}`);
    this.name = 'DatabaseUnavailableError';
  }
}

/**
 * Handle and format errors from error objects
 *
 * Known `ApiError` types keep their status; anything else becomes a 500
 * with `contextMessage`.
 *
 * @example
 * ```ts
 * try {
 *   // ... operation that might throw
 * } catch (error) {
 *   return handleApiError(c, error, 'Failed to list markets');
 * }
 * ```
 */
export function handleApiError(
  c: Context,
  error: unknown,
  contextMessage?: string
): Response {
  if (error instanceof ApiError) {
    switch (error.type) {
      case ErrorType.BAD_REQUEST:
        return badRequestError(c, error.message, error.details);
      case ErrorType.NOT_FOUND:
        // errorResponse directly, the message already says "not found"
        return errorResponse(c, error.message, ErrorType.NOT_FOUND, error.details);
      case ErrorType.SERVICE_UNAVAILABLE:
        return serviceUnavailableError(c, error.message);
      default:
        break;
    }
  }

  if (error instanceof Error) {
    return internalServerError(c, contextMessage, error.message);
  }

  return internalServerError(c, contextMessage, error);
}

/**
 * Create a bad request API error
 */
export function createBadRequestError(message: string, details?: unknown): ApiError {
  return new ApiError(ErrorType.BAD_REQUEST, message, details);
}

/**
 * Create a not found API error
 */
export function createNotFoundError(resource: string, identifier?: string): ApiError {
  const message = identifier
    ? `${resource} with ${identifier} not found`
    : `${resource} not found`;
  return new ApiError(ErrorType.NOT_FOUND, message, identifier);
}

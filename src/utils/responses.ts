/**
 * API response formatters for consistent JSON response structure.
 *
 * Error responses include `success: false`, an error object with a code and
 * a client-safe message, and a request correlation ID for debugging.
 * Internal error details and ciphertext are never placed in a response.
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import type { ErrorResponse } from '../types/index.js';

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const API_ERROR_CODES = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[keyof typeof API_ERROR_CODES];

const ERROR_STATUS_MAP: Record<ApiErrorCode, number> = {
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  SERVICE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

const ERROR_MESSAGES: Record<ApiErrorCode, string> = {
  INVALID_REQUEST: 'The request could not be processed.',
  NOT_FOUND: 'The requested resource was not found.',
  SERVICE_UNAVAILABLE: 'A required service is temporarily unavailable. Please try again later.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please try again later.',
};

// ─── Correlation ID ──────────────────────────────────────────────────────────

/**
 * Generate a unique request correlation ID (UUID v4).
 * Used to trace requests across logs and error responses.
 */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Error Formatters ────────────────────────────────────────────────────────

/**
 * Format an error response with error code, message, optional field errors,
 * and a correlation ID for debugging.
 *
 * @param requestId - Correlation ID; auto-generated if not provided
 */
export function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
  fields?: Record<string, string[]>,
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    requestId: requestId ?? generateRequestId(),
  };

  if (fields && Object.keys(fields).length > 0) {
    response.error.fields = fields;
  }

  return response;
}

/** Format an error response using the standard client-safe message for `code`. */
export function formatApiError(code: ApiErrorCode, requestId?: string): ErrorResponse {
  return formatErrorResponse(code, ERROR_MESSAGES[code], requestId);
}

export function getHttpStatusForError(code: ApiErrorCode): number {
  return ERROR_STATUS_MAP[code];
}

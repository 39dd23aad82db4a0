/**
 * Express error handler for the field encryption layer.
 *
 * Translates errors into generic responses:
 * - retryable key service failures → 503 SERVICE_UNAVAILABLE
 * - every other field encryption error → 500 INTERNAL_ERROR
 * - client errors carrying a 4xx `status` (e.g. malformed JSON) → 400
 * - anything else → 500 INTERNAL_ERROR
 *
 * The original error is logged with its code; the response carries only a
 * client-safe message and the request id.
 *
 * @module middleware/cryptoErrorHandler
 */

import type { ErrorRequestHandler, Request } from 'express';
import {
  IntegrityViolationError,
  RemoteServiceError,
  isFieldCryptoError,
} from '../encryption/errors.js';
import type { Logger } from '../logging/logger.js';
import {
  API_ERROR_CODES,
  formatApiError,
  generateRequestId,
  getHttpStatusForError,
  type ApiErrorCode,
} from '../utils/responses.js';

export const REQUEST_ID_HEADER = 'x-request-id';

function getRequestId(req: Request): string {
  const existing = req.headers[REQUEST_ID_HEADER];
  if (typeof existing === 'string' && existing.length > 0) return existing;
  return generateRequestId();
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function classifyError(err: unknown): ApiErrorCode {
  if (err instanceof RemoteServiceError && err.retryable) {
    return API_ERROR_CODES.SERVICE_UNAVAILABLE;
  }
  if (isFieldCryptoError(err)) return API_ERROR_CODES.INTERNAL_ERROR;
  if (clientErrorStatus(err) !== undefined) return API_ERROR_CODES.INVALID_REQUEST;
  return API_ERROR_CODES.INTERNAL_ERROR;
}

export function cryptoErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const requestId = getRequestId(req);
    const code = classifyError(err);
    const metadata = {
      requestId,
      method: req.method,
      path: req.path,
      errorCode: isFieldCryptoError(err) ? err.code : undefined,
    };

    if (err instanceof IntegrityViolationError) {
      logger.error('Integrity violation while serving request', err, metadata);
    } else if (code === API_ERROR_CODES.INVALID_REQUEST) {
      logger.warn('Rejected malformed request', metadata);
    } else {
      logger.error('Request failed', toError(err), metadata);
    }

    res.setHeader('X-Request-Id', requestId);
    res.status(getHttpStatusForError(code)).json(formatApiError(code, requestId));
  };
}

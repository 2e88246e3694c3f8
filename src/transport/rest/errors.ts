import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { logger } from '../../config/logger.js';
import { getErrorMessage, isSessionRuntimeError, type SessionErrorCode } from '../../core/errors.js';

export interface ErrorResponseBody {
  error: string;
  code?: string;
  [key: string]: unknown;
}

/**
 * Error response helper
 */
export function errorResponse(
  message: string,
  code?: string,
  details?: Record<string, unknown>
): ErrorResponseBody {
  return {
    ...details,
    error: message,
    ...(code ? { code } : {}),
  };
}

/**
 * Shape of the JSON carried in an HTTPException message
 */
export const errorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string().optional(),
  })
  .passthrough();

const STATUS_BY_CODE = {
  SESSION_NOT_FOUND: 404,
  INVALID_SESSION_STATE: 409,
  CAPACITY_EXCEEDED: 429,
  REGISTRY_SHUTTING_DOWN: 503,
} as const satisfies Record<SessionErrorCode, number>;

/**
 * Map a registry command error onto an HTTPException (404/409/429/503).
 * Anything else becomes a logged 500.
 */
export function toHttpException(error: unknown, fallbackMessage = 'Internal server error'): HTTPException {
  if (error instanceof HTTPException) {
    return error;
  }

  if (isSessionRuntimeError(error)) {
    return new HTTPException(STATUS_BY_CODE[error.code], {
      message: JSON.stringify(errorResponse(error.message, error.code, error.details())),
    });
  }

  logger.error({ error: getErrorMessage(error) }, fallbackMessage);
  return new HTTPException(500, {
    message: JSON.stringify(errorResponse(fallbackMessage, 'INTERNAL_ERROR', { detail: getErrorMessage(error) })),
  });
}

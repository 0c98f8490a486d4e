/**
 * Error Handler Middleware
 *
 * Global error handler for Fastify with proper error formatting
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { RecoveryError, RecoveryErrorCode } from '../../types.js';
import type { ErrorResponse } from '../types.js';

/**
 * Custom API error with status code
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * HTTP status for each vault error code
 */
const RECOVERY_STATUS: Record<RecoveryErrorCode, number> = {
  [RecoveryErrorCode.INVALID_GUARDIAN_SET]: 400,
  [RecoveryErrorCode.TOO_MANY_GUARDIANS]: 400,
  [RecoveryErrorCode.INVALID_THRESHOLD]: 400,
  [RecoveryErrorCode.NOT_A_GUARDIAN]: 403,
  [RecoveryErrorCode.NOT_OWNER]: 403,
  [RecoveryErrorCode.ZERO_IDENTITY]: 400,
  [RecoveryErrorCode.INVALID_PROOF_COUNT]: 400,
  [RecoveryErrorCode.INVALID_CERTIFIED_INPUT]: 400,
  [RecoveryErrorCode.DUPLICATE_PROPOSAL]: 409,
  [RecoveryErrorCode.NO_ACTIVE_REQUEST]: 409,
  [RecoveryErrorCode.STALE_OR_UNKNOWN_REQUEST]: 409,
  [RecoveryErrorCode.ALREADY_EXECUTED]: 409,
  [RecoveryErrorCode.ALREADY_APPROVED]: 409,
  [RecoveryErrorCode.NO_SECRET_STORED]: 409,
};

export function statusForRecoveryError(code: RecoveryErrorCode): number {
  return RECOVERY_STATUS[code];
}

function isFastifyError(error: Error): error is FastifyError {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * Error handler function for Fastify
 */
export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const response: ErrorResponse = {
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        statusCode: 400,
      },
    };

    reply.status(400).send({
      ...response,
      validationErrors: error.errors,
    });
    return;
  }

  // Handle vault errors
  if (error instanceof RecoveryError) {
    const statusCode = statusForRecoveryError(error.code);
    const response: ErrorResponse = {
      error: {
        message: error.message,
        code: error.code,
        statusCode,
      },
    };

    request.log.info({ code: error.code }, 'vault operation rejected');
    reply.status(statusCode).send(response);
    return;
  }

  // Handle custom API errors
  if (error instanceof ApiError) {
    const response: ErrorResponse = {
      error: {
        message: error.message,
        ...(error.code && { code: error.code }),
        statusCode: error.statusCode,
      },
    };

    reply.status(error.statusCode).send(response);
    return;
  }

  // Handle Fastify errors
  if (isFastifyError(error)) {
    const statusCode = error.statusCode ?? 500;
    const response: ErrorResponse = {
      error: {
        message: error.message,
        code: error.code,
        statusCode,
      },
    };

    reply.status(statusCode).send(response);
    return;
  }

  // Handle generic errors
  request.log.error(error);
  const response: ErrorResponse = {
    error: {
      message: error.message || 'Internal server error',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    },
  };

  reply.status(500).send(response);
}

/**
 * Helper to create bad request error
 */
export function badRequest(message: string): ApiError {
  return new ApiError(400, message, 'BAD_REQUEST');
}

/**
 * Helper to create unauthorized error
 */
export function unauthorized(message = 'Unauthorized'): ApiError {
  return new ApiError(401, message, 'UNAUTHORIZED');
}

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../../../application/errors.js';
import { logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

// body-parser marks malformed JSON with a 4xx status and `expose: true`
function isClientBodyError(err: Error): err is Error & { status: number } {
  return (
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'expose' in err &&
    err.expose === true
  );
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof AppError) {
    if (err.retryable) {
      res.setHeader('Retry-After', '1');
    }
    const response: ErrorResponse = {
      code: err.code,
      message: err.message,
    };
    res.status(err.status).json(response);
    return;
  }

  if (isClientBodyError(err)) {
    const response: ErrorResponse = {
      code: 'BAD_REQUEST',
      message: err.message,
    };
    res.status(err.status).json(response);
    return;
  }

  logger.error({ err }, 'Unhandled error');

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}

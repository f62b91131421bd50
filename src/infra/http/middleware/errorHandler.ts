import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { ConflictError, InvalidEmailTokenError } from '../../../application/errors.js';
import { AuthError } from '../../../domain/auth/errors.js';
import type { Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
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

    // Every authentication failure -> 401, distinguished only by code
    if (err instanceof AuthError) {
      const response: ErrorResponse = {
        code: err.code,
        message: err.message,
      };
      res.status(401).set('WWW-Authenticate', 'Bearer').json(response);
      return;
    }

    if (err instanceof InvalidEmailTokenError) {
      const response: ErrorResponse = {
        code: 'INVALID_EMAIL_TOKEN',
        message: err.message,
      };
      res.status(422).json(response);
      return;
    }

    if (err instanceof ConflictError) {
      const response: ErrorResponse = {
        code: 'CONFLICT',
        message: err.message,
      };
      res.status(409).json(response);
      return;
    }

    // Body parser failures carry their own 4xx status
    if (hasClientStatus(err)) {
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
  };
}

function hasClientStatus(err: Error): err is Error & { status: number } {
  return 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

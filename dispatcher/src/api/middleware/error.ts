import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '@gantry/shared';
import {
  GantryError,
  InvalidJobError,
  InvalidObservationError,
  InvalidRunnerKeyError,
  NotFoundError,
  UnknownRunnerError,
} from '../../errors.js';
import { formatIssues } from '../../parser/index.js';

const logger = createLogger('api');

/**
 * Error response structure
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  stack?: string;
}

/**
 * Custom API error class
 */
export class APIError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'APIError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface Classified {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
}

function classify(err: unknown): Classified {
  if (err instanceof APIError) {
    return { statusCode: err.statusCode, error: err.name, message: err.message, details: err.details };
  }
  if (err instanceof ZodError) {
    return { statusCode: 400, error: 'ValidationError', message: 'Invalid request body', details: formatIssues(err) };
  }
  if (err instanceof NotFoundError) {
    return { statusCode: 404, error: err.name, message: err.message };
  }
  if (err instanceof UnknownRunnerError) {
    return { statusCode: 422, error: err.name, message: err.message };
  }
  if (err instanceof InvalidJobError) {
    return {
      statusCode: 400,
      error: err.name,
      message: err.message,
      details: err.issues.length > 0 ? err.issues : undefined,
    };
  }
  if (err instanceof InvalidObservationError || err instanceof InvalidRunnerKeyError) {
    return { statusCode: 400, error: err.name, message: err.message };
  }
  // body-parser failures carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return { statusCode: err.status, error: 'BadRequest', message: err.message };
  }
  if (err instanceof GantryError) {
    return { statusCode: 500, error: err.name, message: err.message };
  }
  if (err instanceof Error) {
    return { statusCode: 500, error: err.name || 'InternalServerError', message: err.message || 'An unexpected error occurred' };
  }
  return { statusCode: 500, error: 'InternalServerError', message: String(err) };
}

/**
 * Error handling middleware
 *
 * Converts thrown errors to JSON responses. Misuse errors from the core
 * become 4xx responses; anything else is a 500.
 */
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const classified = classify(err);

  if (classified.statusCode >= 500) {
    logger.error('API Error:', err);
  } else {
    logger.debug(`API ${classified.statusCode}: ${classified.message}`);
  }

  const errorResponse: ErrorResponse = {
    error: classified.error,
    message: classified.message,
  };

  if (classified.details !== undefined) {
    errorResponse.details = classified.details;
  }

  // Include stack trace in development
  if (process.env.NODE_ENV === 'development' && err instanceof Error && err.stack) {
    errorResponse.stack = err.stack;
  }

  res.status(classified.statusCode).json(errorResponse);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'NotFound',
    message: `Route ${req.method} ${req.path} not found`,
  });
}

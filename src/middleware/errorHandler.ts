/**
 * Express error handling middleware
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type {
  ArchiveFailure,
  ArchiveFailureReason,
} from '../services/archive/results.js';
import logger from '../utils/logger.js';
import { getRequestId } from './requestLogger.js';

/**
 * Standard error response format
 */
interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  timestamp: string;
}

/**
 * Custom error class for API errors
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public error: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const FAILURE_RESPONSES: Record<
  ArchiveFailureReason,
  { statusCode: number; error: string }
> = {
  'invalid-request': { statusCode: 400, error: 'Bad Request' },
  'not-found': { statusCode: 404, error: 'Not Found' },
  upstream: { statusCode: 502, error: 'Bad Gateway' },
};

/**
 * Turn a failed archive service result into the matching API error
 */
export function toApiError(failure: ArchiveFailure): ApiError {
  const { statusCode, error } = FAILURE_RESPONSES[failure.reason];
  return new ApiError(statusCode, error, failure.message, failure.details);
}

/**
 * Format Zod validation errors into a more readable structure
 */
function formatZodError(error: ZodError) {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

  return {
    error: 'Validation Error',
    message: 'Invalid request data',
    details: { issues },
  };
}

/**
 * Express error handling middleware
 * Handles different error types and returns consistent error responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error('Request error', {
    error: err.message,
    name: err.name,
    stack: err.stack,
    requestId: getRequestId(req),
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  });

  const timestamp = new Date().toISOString();
  const isDevelopment = process.env.NODE_ENV === 'development';

  if (err instanceof ZodError) {
    res.status(400).json({ ...formatZodError(err), timestamp });
    return;
  }

  if (err instanceof ApiError) {
    const response: ErrorResponse = {
      error: err.error,
      message: err.message,
      timestamp,
    };
    // Client errors carry actionable details; server errors only in development
    if (err.details !== undefined && (err.statusCode < 500 || isDevelopment)) {
      response.details = err.details;
    }
    res.status(err.statusCode).json(response);
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      error: 'Bad Request',
      message: 'Malformed JSON body',
      timestamp,
    });
    return;
  }

  const response: ErrorResponse = {
    error: 'Internal Server Error',
    message: isDevelopment
      ? err.message
      : 'An error occurred. Please try again.',
    timestamp,
  };

  if (isDevelopment && err.stack) {
    response.details = { stack: err.stack };
  }

  res.status(500).json(response);
}

/**
 * Async error wrapper for route handlers
 * Catches async errors and passes them to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

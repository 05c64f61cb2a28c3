/**
 * Request validation middleware
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ApiError } from './errorHandler.js';

interface ValidationConfig {
  body?: z.ZodTypeAny;
  params?: z.ZodTypeAny;
}

/**
 * Parse a value or throw a 400 ApiError listing each failing field
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ApiError(
      400,
      'ValidationError',
      'Validation failed',
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function validateRequest(config: ValidationConfig) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (config.body) {
        req.body = parseOrThrow(config.body, req.body);
      }
      if (config.params) {
        req.params = parseOrThrow(config.params, req.params);
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}

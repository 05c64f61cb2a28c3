import { Request, Response, NextFunction } from 'express';
import { config } from '../config/env.js';

/**
 * Error response interface for authentication failures
 */
export interface AuthErrorResponse {
  error: string;
  message: string;
  timestamp: string;
}

function reject(res: Response, message: string): void {
  const body: AuthErrorResponse = {
    error: 'Unauthorized',
    message,
    timestamp: new Date().toISOString(),
  };
  res.status(401).json(body);
}

/**
 * Authentication middleware that validates API key from X-API-KEY header
 */
export function validateApiKey(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const apiKey = req.headers['x-api-key'];

  // Header may arrive repeated
  const providedKey = Array.isArray(apiKey) ? apiKey[0] : apiKey;

  if (!providedKey) {
    reject(res, 'X-API-KEY header is required');
    return;
  }

  if (providedKey !== config.ADMIN_API_KEY) {
    reject(res, 'Invalid API key');
    return;
  }

  next();
}

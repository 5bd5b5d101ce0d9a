/**
 * Controller Utilities
 */

import type { Request } from 'express';
import { AppError } from '../errors';

/**
 * Parse and validate a required string path parameter.
 * Returns the trimmed string or throws AppError.badRequest.
 */
export function requireStringParam(req: Request, paramName: string): string {
  const value: unknown = req.params[paramName];
  if (typeof value !== 'string' || !value.trim()) {
    throw AppError.badRequest(`${paramName} is required`);
  }
  return value.trim();
}

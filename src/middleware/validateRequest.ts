/**
 * Request Validation Middleware
 *
 * Validates `req.body` and/or `req.params` against Zod schemas and answers
 * with a structured 400 on failure.
 *
 * @example
 * router.post('/reports', validateBody(submitReportBody), asyncHandler(reportController.submitReport));
 * router.post('/tools/:name', validateParams(toolNameParams), asyncHandler(toolController.invokeTool));
 */

import type { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodError } from 'zod';

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Format Zod issues into a flat, human-readable array.
 */
export function formatZodErrors(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * On success the parsed data replaces `req.body`, so defaults and
 * coercions reach the handler.
 */
export function validateBody<T>(schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: formatZodErrors(result.error),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validates path parameters. Parsed values are merged back into
 * `req.params`.
 */
export function validateParams<T extends Record<string, string>>(schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      res.status(400).json({
        error: 'Invalid path parameters',
        code: 'VALIDATION_ERROR',
        details: formatZodErrors(result.error),
      });
      return;
    }
    Object.assign(req.params, result.data);
    next();
  };
}

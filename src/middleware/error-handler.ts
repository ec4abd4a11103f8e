/**
 * Error Handler
 * API error type, async route wrapper and the terminal Express error middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { env } from '../config/env';
import { PreconditionError } from '../lib/scraping/errors';

export class ApiError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Forward rejections of an async handler to next()
 */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

/**
 * Errors raised by express.json() and other http-errors producers carry a
 * client status and a machine-readable type
 */
function isClientHttpError(err: unknown): err is Error & { status: number; type?: unknown } {
  if (!(err instanceof Error) || !('status' in err)) {
    return false;
  }
  return typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

// Express recognises error middleware by its four parameters
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      success: false,
      error: err.message,
      ...(err.details !== undefined && { details: err.details }),
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: 'Validation failed',
      details: formatIssues(err),
    });
    return;
  }

  if (err instanceof PreconditionError) {
    res.status(400).json({ success: false, error: err.message });
    return;
  }

  if (isClientHttpError(err)) {
    console.warn(`Error: ${req.method} ${req.path} rejected with ${err.status}: ${err.message}`);
    res.status(err.status).json({
      success: false,
      error: err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message,
    });
    return;
  }

  console.error(`Error: ${req.method} ${req.path} failed:`, err);
  res.status(500).json({
    success: false,
    error: env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message,
  });
}

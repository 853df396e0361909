/**
 * Async Handler Utility
 * Wraps async route handlers to automatically catch and forward errors
 * to Express error handling middleware, and maps errors to JSON responses.
 */

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { AnonymizerError } from '../errors.js';

/**
 * Wraps an async route handler to catch promise rejections
 * and forward them to Express error middleware.
 *
 * Usage:
 * ```typescript
 * router.post('/analyze', asyncHandler(async (req, res) => {
 *   const outcome = await engine.analyze(parseAnalyzeRequest(req.body, limits));
 *   res.json(outcome);
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/** Error shape set by express.json() (body-parser) */
interface BodyParserError extends Error {
  type: string;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof err.type === 'string';
}

export interface ErrorHandlerOptions {
  /** Error messages and stacks are hidden when this is "production" */
  nodeEnv: string;
}

/**
 * Global error handler middleware for Express
 * Should be added at the end of middleware chain
 *
 * - AnonymizerError subclasses → their own status, code and details
 * - Malformed JSON body → 400, oversized body → 413
 * - Anything else → 500 (message hidden in production)
 *
 * Usage:
 * ```typescript
 * app.use(createGlobalErrorHandler({ nodeEnv: config.nodeEnv }));
 * ```
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions): ErrorRequestHandler {
  // Don't leak stack traces in production
  const isDev = options.nodeEnv !== 'production';

  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    respondWithError(err, req, res, isDev);
  };
}

function respondWithError(err: Error, req: Request, res: Response, isDev: boolean): void {
  const timestamp = new Date().toISOString();

  if (err instanceof AnonymizerError) {
    console.warn('[Global Error Handler]', {
      code: err.code,
      message: err.message,
      path: req.path,
      method: req.method
    });

    const record = err.toRecord();
    res.status(err.status).json({
      success: false,
      error: record.message,
      error_code: record.code,
      ...(record.details && { details: record.details }),
      timestamp
    });
    return;
  }

  if (isBodyParserError(err) && err.type === 'entity.parse.failed') {
    res.status(400).json({ success: false, error: 'Invalid JSON body', error_code: 'VALIDATION', timestamp });
    return;
  }

  if (isBodyParserError(err) && err.type === 'entity.too.large') {
    res.status(413).json({ success: false, error: 'Request body too large', error_code: 'VALIDATION', timestamp });
    return;
  }

  console.error('[Global Error Handler]', {
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
    timestamp
  });

  res.status(500).json({
    success: false,
    error: 'Internal server error',
    error_code: 'INTERNAL',
    message: isDev ? err.message : 'An unexpected error occurred',
    ...(isDev && { stack: err.stack }),
    timestamp
  });
}

/** Fallback for unmatched routes */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: 'Endpoint not found',
    path: req.path,
    timestamp: new Date().toISOString()
  });
}

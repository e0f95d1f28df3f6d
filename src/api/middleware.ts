/**
 * API Middleware: body validation and error handling.
 */

import { NextFunction, Request, Response } from 'express';
import { StrataError, TypedError, apiError, createTypedError, validationError } from '../domain/errors';
import { isRecord } from '../dsl/validator';
import { logger } from '../logger';

/** Reject requests whose JSON body is not an object with the required fields. */
export function requireBodyFields(...fields: string[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json(apiError(validationError('Request body must be a JSON object')));
      return;
    }
    const missing = fields.filter((field) => body[field] === undefined);
    if (missing.length > 0) {
      res.status(400).json(
        apiError(validationError(`Missing required field(s): ${missing.join(', ')}`, { missing })),
      );
      return;
    }
    next();
  };
}

/** A field of the JSON body, or undefined. */
export function bodyField(req: Request, field: string): unknown {
  const body: unknown = req.body;
  return isRecord(body) ? body[field] : undefined;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof StrataError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // Body parser failures carry an HTTP status of their own.
  if (isRecord(err) && err.type === 'entity.parse.failed') {
    res.status(400).json(apiError(validationError('Request body is not valid JSON')));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 422;
  if (error.code.startsWith('GRAPH.')) return 422;
  if (error.code.startsWith('SNAPSHOT.')) return 422;
  if (error.code === 'STEP.CONFLICT') return 409;
  return 500;
}

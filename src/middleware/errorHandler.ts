import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { ReplayError } from '../parsers/errors';

/**
 * Error carrying the HTTP status and a stable code for the client
 */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR') {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export const httpErrors = {
  badRequest: (message: string) => new HttpError(message, 400, 'BAD_REQUEST'),
  notFound: (message: string = 'Not found') => new HttpError(message, 404, 'NOT_FOUND'),
};

/**
 * Map anything thrown by a route onto an HttpError
 */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) {
    return err;
  }
  if (err instanceof ZodError) {
    const detail = err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return new HttpError(`Invalid replay options: ${detail}`, 400, 'INVALID_OPTIONS');
  }
  if (err instanceof multer.MulterError) {
    return new HttpError(err.message, 400, err.code);
  }
  if (err instanceof ReplayError) {
    switch (err.code) {
      case 'NO_HEADER':
        return new HttpError(err.message, 422, err.code);
      case 'OPEN_FAILED':
        return new HttpError(err.message, 400, err.code);
      default:
        return new HttpError(err.message, 500, err.code);
    }
  }
  return new HttpError(err instanceof Error ? err.message : 'Internal server error');
}

/**
 * Final express error middleware
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const httpError = toHttpError(err);
  if (httpError.statusCode >= 500) {
    console.error(`[HTTP] ${req.method} ${req.url} failed:`, err);
  } else {
    console.warn(`[HTTP] ${req.method} ${req.url} rejected: ${httpError.message}`);
  }
  res.status(httpError.statusCode).json({ error: httpError.message, code: httpError.code });
}

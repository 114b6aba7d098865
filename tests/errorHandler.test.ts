import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { HttpError, httpErrors, toHttpError } from '../src/middleware/errorHandler';
import { ReplayClosedError, ReplayHeaderError, ReplayOpenError } from '../src/parsers/errors';

describe('toHttpError', () => {
  it('should pass HttpErrors through', () => {
    const err = httpErrors.notFound('Job not found or expired');

    expect(toHttpError(err)).toBe(err);
    expect(err).toMatchObject({ statusCode: 404, code: 'NOT_FOUND' });
  });

  it('should map validation failures to 400', () => {
    const result = z.object({ maxCycles: z.number() }).safeParse({ maxCycles: 'x' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const httpError = toHttpError(result.error);

    expect(httpError.statusCode).toBe(400);
    expect(httpError.code).toBe('INVALID_OPTIONS');
    expect(httpError.message).toBe('Invalid replay options: maxCycles: Expected number, received string');
  });

  it('should map replay errors by code', () => {
    expect(toHttpError(new ReplayHeaderError('/tmp/a.csv'))).toMatchObject({
      statusCode: 422,
      code: 'NO_HEADER',
      message: 'CSV file is empty or has no header line: /tmp/a.csv',
    });
    expect(toHttpError(new ReplayOpenError('/tmp/b.csv', new Error('ENOENT')))).toMatchObject({
      statusCode: 400,
      code: 'OPEN_FAILED',
      message: 'Failed to open CSV file: /tmp/b.csv: ENOENT',
    });
    expect(toHttpError(new ReplayClosedError('/tmp/c.csv')).statusCode).toBe(500);
  });

  it('should treat anything else as an internal error', () => {
    const httpError = toHttpError(new Error('boom'));

    expect(httpError).toBeInstanceOf(HttpError);
    expect(httpError).toMatchObject({ statusCode: 500, code: 'INTERNAL_ERROR', message: 'boom' });
    expect(toHttpError('nope').message).toBe('Internal server error');
  });
});

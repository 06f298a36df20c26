import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { AppError, ErrorCode, formatErrorResponse, fromZodError } from '../errors.js';
import { withDeadline } from '../deadline.js';

describe('AppError', () => {
  it('maps codes to HTTP status', () => {
    expect(AppError.notFound().statusCode).toBe(404);
    expect(AppError.validationError('bad').statusCode).toBe(400);
    expect(AppError.upstreamFailure().statusCode).toBe(502);
    expect(AppError.partialFailure('1 of 2 step(s) failed').statusCode).toBe(207);
    expect(AppError.configuration('missing').statusCode).toBe(500);
  });

  it('serializes to an error record', () => {
    expect(AppError.notFound('Customer 3 not found', { customer_id: 3 }).toInfo('get_customer')).toEqual({
      code: ErrorCode.NOT_FOUND,
      message: 'Customer 3 not found',
      source: 'get_customer',
      details: { customer_id: 3 },
    });
  });

  it('formats zod failures for HTTP responses', () => {
    const parsed = z.object({ limit: z.number() }).safeParse({ limit: 'ten' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const response = formatErrorResponse(fromZodError(parsed.error).toInfo(), false);
    expect(response).toEqual({ error: 'validation_error', message: 'Validation failed', statusCode: 400 });
  });
});

describe('withDeadline', () => {
  it('returns the result when it arrives in time', async () => {
    await expect(withDeadline(Promise.resolve(42), 50, 'fast')).resolves.toBe(42);
  });

  it('rejects with an upstream failure on timeout', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withDeadline(never, 10, 'slow call')).rejects.toMatchObject({
      code: ErrorCode.UPSTREAM_FAILURE,
      message: 'slow call timed out after 10ms',
    });
  });
});

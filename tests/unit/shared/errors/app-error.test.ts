import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { AppError } from '@/shared/errors/app-error.js';

describe('AppError', () => {
  it('passes existing application errors through fromUnknown', () => {
    const original = AppError.parse('pgn.parse-failed', 'bad movetext');
    expect(AppError.fromUnknown(original)).toBe(original);
  });

  it('wraps foreign errors as unexpected errors and keeps the cause', () => {
    const cause = new TypeError('boom');
    const wrapped = AppError.fromUnknown(cause, 'custom.code');

    expect(wrapped).toBeInstanceOf(AppError);
    expect(wrapped.kind).toBe('UnexpectedError');
    expect(wrapped.code).toBe('custom.code');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
  });

  it('replaces non-error values with a generic message', () => {
    expect(AppError.fromUnknown('nope').message).toBe('Unknown error');
  });

  it('lists zod issues in validation messages', () => {
    const result = z.object({ size: z.number().positive() }).safeParse({ size: 0 });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    const error = AppError.validation('test.invalid', { issues: result.error.issues });
    expect(error.kind).toBe('InvalidArgument');
    expect(error.message).toBe('Validation failed: size: Number must be greater than 0');
    expect(error.exposeMessage).toBe(true);
  });

  it('serialises code, message and metadata', () => {
    const error = AppError.io('io.read-failed', 'missing', undefined, { path: '/tmp/x' });
    expect(error.name).toBe('AppError');
    expect(error.toJSON()).toEqual({
      name: 'AppError',
      code: 'io.read-failed',
      message: 'missing',
      metadata: { path: '/tmp/x' },
    });
  });
});

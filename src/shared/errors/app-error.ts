import type { ZodIssue } from 'zod';

import { BaseError } from './base.error.js';

export type AppErrorKind =
  | 'IOError'
  | 'ParseError'
  | 'InvalidArgument'
  | 'RenderError'
  | 'UnexpectedError';

interface AppErrorOptions {
  readonly kind: AppErrorKind;
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends BaseError {
  public readonly kind: AppErrorKind;

  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
    this.kind = options.kind;
  }

  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ kind: 'UnexpectedError', code, message: cause.message, cause });
  }

  public static fromError(error: Error, code = 'UNEXPECTED_ERROR'): AppError {
    return new AppError({ kind: 'UnexpectedError', code, message: error.message, cause: error });
  }

  public static validation(code: string, metadata: { issues: ZodIssue[] }): AppError {
    const details = metadata.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');

    return new AppError({
      kind: 'InvalidArgument',
      code,
      message: details ? `Validation failed: ${details}` : 'Validation failed for the provided payload.',
      metadata,
      exposeMessage: true,
    });
  }

  public static invalidArgument(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({ kind: 'InvalidArgument', code, message, metadata, exposeMessage: true });
  }

  public static io(code: string, message: string, cause?: unknown, metadata?: Record<string, unknown>): AppError {
    return new AppError({ kind: 'IOError', code, message, cause, metadata, exposeMessage: true });
  }

  public static parse(code: string, message: string, cause?: unknown): AppError {
    return new AppError({ kind: 'ParseError', code, message, cause, exposeMessage: true });
  }

  public static render(code: string, message: string, cause?: unknown, metadata?: Record<string, unknown>): AppError {
    return new AppError({ kind: 'RenderError', code, message, cause, metadata });
  }
}

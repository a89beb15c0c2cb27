// src/utils/errors.ts
// ═══════════════════════════════════════════════════════════════════════════
// Error types shared by the conversion core, the HTTP layer and the CLI
// ═══════════════════════════════════════════════════════════════════════════

import type { Logger } from 'pino';

type ErrorLogger = Pick<Logger, 'warn' | 'error'>;

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.statusCode = options.statusCode || 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Caller input that could not be parsed (HTTP body, CLI text)
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      isOperational: true,
      context,
    });
  }
}

/**
 * Bean amount that is zero, negative or not a whole number
 */
export class InvalidAmountError extends AppError {
  constructor(beans: number) {
    super(`Invalid bean amount: ${beans}. Must be a positive integer`, {
      code: 'INVALID_AMOUNT',
      statusCode: 422,
      isOperational: true,
      context: { beans },
    });
  }
}

/**
 * No tier covers the amount. Only reachable with a table that has a gap.
 */
export class NoTierMatchError extends AppError {
  constructor(beans: number) {
    super(`No conversion tier covers ${beans} beans`, {
      code: 'NO_TIER_MATCH',
      statusCode: 500,
      isOperational: false,
      context: { beans },
    });
  }
}

export type ConversionError = InvalidAmountError | NoTierMatchError;

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      isOperational: error.isOperational,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: getErrorMessage(error),
    rawError: error,
  };
}

/**
 * Logs an error with appropriate level based on type
 */
export function logError(
  logger: ErrorLogger,
  event: string,
  error: unknown,
  context?: Record<string, unknown>,
): void {
  const errorObj = toErrorObject(error);

  if (error instanceof AppError && error.isOperational) {
    logger.warn({ event, ...errorObj, ...context }, event);
  } else {
    logger.error({ event, ...errorObj, ...context }, event);
  }
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E = AppError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failure result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

import { describe, expect, it, vi } from 'vitest';
import {
  AppError,
  InvalidAmountError,
  NoTierMatchError,
  ValidationError,
  err,
  getErrorMessage,
  logError,
  ok,
  toErrorObject,
} from '../../utils/errors.js';

describe('Error classes', () => {
  it('AppError has internal defaults', () => {
    const error = new AppError('Test error');

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(true);
    expect(error.name).toBe('AppError');
  });

  it('AppError preserves its cause', () => {
    const cause = new Error('Original error');
    expect(new AppError('Wrapped error', { cause }).cause).toBe(cause);
  });

  it('ValidationError is a 400', () => {
    const error = new ValidationError('Bad input', { input: 'x' });

    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.statusCode).toBe(400);
    expect(error.context).toEqual({ input: 'x' });
  });

  it('InvalidAmountError is an operational 422 carrying the amount', () => {
    const error = new InvalidAmountError(-5);

    expect(error).toBeInstanceOf(AppError);
    expect(error.message).toBe('Invalid bean amount: -5. Must be a positive integer');
    expect(error.code).toBe('INVALID_AMOUNT');
    expect(error.statusCode).toBe(422);
    expect(error.isOperational).toBe(true);
    expect(error.context).toEqual({ beans: -5 });
  });

  it('NoTierMatchError is not operational', () => {
    const error = new NoTierMatchError(7);

    expect(error.code).toBe('NO_TIER_MATCH');
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('reads Error, string and message-bearing objects', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage({ message: 42 })).toBe('42');
    expect(getErrorMessage(null)).toBe('Unknown error occurred');
  });
});

describe('toErrorObject', () => {
  it('includes AppError fields', () => {
    const obj = toErrorObject(new InvalidAmountError(0));

    expect(obj).toMatchObject({
      name: 'InvalidAmountError',
      code: 'INVALID_AMOUNT',
      statusCode: 422,
      isOperational: true,
      context: { beans: 0 },
    });
  });

  it('wraps non-errors', () => {
    expect(toErrorObject('oops')).toEqual({ message: 'oops', rawError: 'oops' });
  });
});

describe('logError', () => {
  it('logs operational errors at warn', () => {
    const logger = { warn: vi.fn(), error: vi.fn() };
    logError(logger, 'convert_failed', new InvalidAmountError(0), { route: '/api/convert' });

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.warn.mock.calls[0][0]).toMatchObject({
      event: 'convert_failed',
      code: 'INVALID_AMOUNT',
      route: '/api/convert',
    });
  });

  it('logs everything else at error', () => {
    const logger = { warn: vi.fn(), error: vi.fn() };
    logError(logger, 'request_failed', new NoTierMatchError(7));
    logError(logger, 'request_failed', new Error('boom'));

    expect(logger.error).toHaveBeenCalledTimes(2);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe('Result helpers', () => {
  it('builds success and failure values', () => {
    expect(ok(3)).toEqual({ success: true, data: 3 });
    const error = new ValidationError('nope');
    expect(err(error)).toEqual({ success: false, error });
  });
});

import { z } from 'zod';
import { ValidationError, err, ok } from '../utils/errors.js';
import type { Result } from '../utils/errors.js';

const beansText = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'Please enter a valid number!')
  .transform(Number)
  .pipe(z.number().int().positive('Please enter a positive number of beans!').safe());

/**
 * Parse a typed bean amount. Only optional sign and decimal digits are
 * accepted, so "1e3", "0x10" and "12.5" are rejected.
 */
export function parseBeans(text: string): Result<number, ValidationError> {
  const parsed = beansText.safeParse(text);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'Please enter a valid number!';
    return err(new ValidationError(message, { input: text }));
  }
  return ok(parsed.data);
}

import { ParseError } from '../client/errors.js';

/**
 * Unwrap the result of a strict parser
 *
 * @throws ParseError naming the field when the parser returned null
 */
export function requireField<T>(field: string, value: T | null): T {
  if (value === null) {
    throw new ParseError(field);
  }
  return value;
}

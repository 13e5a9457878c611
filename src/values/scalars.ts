/**
 * Strict parsers for the string-typed scalars in API records
 *
 * Every parser returns null instead of guessing: `Number('')` is 0 and
 * `parseInt('12abc')` is 12, neither of which is acceptable here.
 */

const UNSIGNED_INTEGER = /^\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Unsigned decimal integer text, e.g. a unix timestamp */
export function parseInteger(text: string): number | null {
  if (!UNSIGNED_INTEGER.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

/** Decimal number text such as a latitude ('-12.5', '3', '1.2e-3') */
export function parseDecimal(text: string): number | null {
  if (!DECIMAL.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

// Optional sign, digits with optional fraction (or a bare fraction), optional exponent.
// No surrounding whitespace: " 5" and "5 " stay strings.
const DECIMAL_NUMBER = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;

export function isNumeric(raw: string): boolean {
  return DECIMAL_NUMBER.test(raw);
}

/**
 * Type a raw field: a number iff the whole string is a decimal literal,
 * otherwise the string itself (the empty string included)
 */
export function parseScalar(raw: string): string | number {
  return isNumeric(raw) ? Number(raw) : raw;
}

import { describe, it, expect } from 'vitest';
import { isNumeric, parseScalar } from '../src/parsers/scalar';

describe('scalar', () => {
  it('should convert decimal numbers', () => {
    expect(parseScalar('2.5')).toBe(2.5);
    expect(parseScalar('-0.8')).toBe(-0.8);
    expect(parseScalar('101')).toBe(101);
  });

  it('should accept signs, bare fractions and exponents', () => {
    expect(parseScalar('+3')).toBe(3);
    expect(parseScalar('.5')).toBe(0.5);
    expect(parseScalar('5.')).toBe(5);
    expect(parseScalar('1e3')).toBe(1000);
    expect(parseScalar('-2.5E-1')).toBe(-0.25);
  });

  it('should keep text as strings', () => {
    expect(parseScalar('John Doe')).toBe('John Doe');
  });

  it('should never treat the empty string as a number', () => {
    expect(isNumeric('')).toBe(false);
    expect(parseScalar('')).toBe('');
  });

  it('should not strip whitespace', () => {
    expect(parseScalar(' 5')).toBe(' 5');
    expect(parseScalar('5 ')).toBe('5 ');
  });

  it('should reject partial and non-decimal numbers', () => {
    for (const raw of ['12abc', '1,000', '1e', '-', '.', '0x1A', 'NaN', 'Infinity']) {
      expect(isNumeric(raw)).toBe(false);
    }
  });
});

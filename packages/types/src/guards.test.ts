import { describe, it, expect } from 'vitest';
import {
  isNonEmptyString,
  isInteger,
  isFiniteNumber,
  isPlainObject,
  isStringArray,
  isOneOf,
  parseIntStrict,
  parseNumberStrict,
} from './guards';

describe('type guards', () => {
  it('isNonEmptyString rejects blanks and non-strings', () => {
    expect(isNonEmptyString('A')).toBe(true);
    expect(isNonEmptyString('  ')).toBe(false);
    expect(isNonEmptyString(7)).toBe(false);
  });

  it('isInteger rejects fractions, NaN and strings', () => {
    expect(isInteger(7)).toBe(true);
    expect(isInteger(7.5)).toBe(false);
    expect(isInteger(Number.NaN)).toBe(false);
    expect(isInteger('7')).toBe(false);
  });

  it('isFiniteNumber rejects Infinity', () => {
    expect(isFiniteNumber(0.9)).toBe(true);
    expect(isFiniteNumber(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('isPlainObject rejects arrays and null', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });

  it('isStringArray checks every element', () => {
    expect(isStringArray(['A', 'B'])).toBe(true);
    expect(isStringArray([])).toBe(true);
    expect(isStringArray(['A', 1])).toBe(false);
  });

  it('isOneOf narrows to the literal options', () => {
    const attacks = ['equivocation', 'withhold-qc'] as const;
    expect(isOneOf('withhold-qc', attacks)).toBe(true);
    expect(isOneOf('drop', attacks)).toBe(false);
    expect(isOneOf(1, attacks)).toBe(false);
  });
});

describe('parseIntStrict', () => {
  it('parses whole integers', () => {
    expect(parseIntStrict('7')).toBe(7);
    expect(parseIntStrict(' -2 ')).toBe(-2);
  });

  it('rejects trailing garbage and fractions', () => {
    expect(parseIntStrict('7x')).toBeUndefined();
    expect(parseIntStrict('7.5')).toBeUndefined();
    expect(parseIntStrict('')).toBeUndefined();
  });
});

describe('parseNumberStrict', () => {
  it('parses decimals', () => {
    expect(parseNumberStrict('0.9')).toBe(0.9);
    expect(parseNumberStrict('.5')).toBe(0.5);
    expect(parseNumberStrict('2')).toBe(2);
  });

  it('rejects non-numeric text', () => {
    expect(parseNumberStrict('fast')).toBeUndefined();
    expect(parseNumberStrict('1e3')).toBeUndefined();
  });
});

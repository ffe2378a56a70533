import { describe, it, expect } from 'vitest';
import { parseBoolean, parseNonNegativeInt, parseNonNegativeNumber } from './config';

describe('config parsers', () => {
  it('parses booleans and falls back on unknown words', () => {
    expect(parseBoolean('yes', false)).toBe(true);
    expect(parseBoolean(' OFF ', true)).toBe(false);
    expect(parseBoolean('misschien', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });

  it('accepts only non-negative integers for counters', () => {
    expect(parseNonNegativeInt('7', 1)).toBe(7);
    expect(parseNonNegativeInt('0', 1)).toBe(0);
    expect(parseNonNegativeInt('-3', 5)).toBe(5);
    expect(parseNonNegativeInt('2.5', 1)).toBe(1);
    expect(parseNonNegativeInt('', 4)).toBe(4);
  });

  it('accepts fractional delays', () => {
    expect(parseNonNegativeNumber('0.5', 1)).toBe(0.5);
    expect(parseNonNegativeNumber('abc', 1)).toBe(1);
  });
});

import { describe, expect, it } from 'vitest';
import { codePointsOf, textToString } from '../src/code-point.js';
import { formatFloat, formatInteger } from '../src/format.js';

describe('formatFloat', () => {
  it('always keeps a decimal point', () => {
    expect(formatFloat(3)).toBe('3.0');
    expect(formatFloat(10.7823)).toBe('10.7823');
    expect(formatFloat(-0.25)).toBe('-0.25');
  });

  it('keeps the sign of negative zero', () => {
    expect(formatFloat(-0)).toBe('-0.0');
  });

  it('expands exponent notation', () => {
    expect(formatFloat(1e21)).toBe('1000000000000000000000.0');
    expect(formatFloat(1.25e22)).toBe('12500000000000000000000.0');
    expect(formatFloat(1e-7)).toBe('0.0000001');
    expect(formatFloat(-1.5e-7)).toBe('-0.00000015');
  });

  it('names non-finite values', () => {
    expect(formatFloat(Number.NaN)).toBe('NaN');
    expect(formatFloat(Number.POSITIVE_INFINITY)).toBe('Infinity');
    expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe('-Infinity');
  });
});

describe('formatInteger', () => {
  it('renders plain decimal', () => {
    expect(formatInteger(-2147483648)).toBe('-2147483648');
  });
});

describe('code points', () => {
  it('split astral characters into one scalar each', () => {
    expect(codePointsOf('a😀')).toEqual([0x61, 0x1f600]);
    expect(textToString([0x61, 0x1f600])).toBe('a😀');
  });
});

import { describe, it, expect } from 'vitest';
import { calculate, formatNumber, parseExpression } from '../calculator.js';
import { ValidationError } from '../../errors.js';

describe('calculate', () => {
  it('evaluates basic arithmetic', () => {
    expect(calculate('2+2')).toEqual({ expression: '2+2', result: 4 });
    expect(calculate('(1 + 2) * 3').result).toBe(9);
    expect(calculate('10 - 4 - 3').result).toBe(3);
    expect(calculate('12 / 4 / 3').result).toBe(1);
  });

  it('drops "=" and surrounding spaces', () => {
    expect(calculate(' 6 * 7 = ')).toEqual({ expression: '6 * 7', result: 42 });
  });

  it('supports exponent and floor division', () => {
    expect(calculate('2 ** 3 ** 2').result).toBe(512);
    expect(calculate('7 // 2').result).toBe(3);
    expect(calculate('-7 // 2').result).toBe(-4);
    expect(calculate('-2 ** 2').result).toBe(-4);
  });

  it('handles decimals', () => {
    expect(calculate('2.5 * 4').result).toBe(10);
    expect(calculate('.5 + .25').result).toBe(0.75);
  });

  it('rejects characters outside the allowlist', () => {
    expect(() => calculate('import os')).toThrowError(ValidationError);
    expect(() => calculate('2 ^ 3')).toThrowError(/Invalid characters/);
  });

  it('rejects division by zero', () => {
    expect(() => calculate('10 / 0')).toThrowError('Division by zero');
    expect(() => calculate('1 // (2 - 2)')).toThrowError('Division by zero');
  });

  it('rejects malformed expressions', () => {
    expect(() => calculate('')).toThrowError('Empty expression');
    expect(() => calculate('1 +')).toThrowError('Expression ended unexpectedly');
    expect(() => calculate('(1 + 2')).toThrowError(/Missing closing parenthesis/);
    expect(() => calculate('1.2.3')).toThrowError(/Malformed number/);
    expect(() => calculate('2 3')).toThrowError('Unexpected token at 2');
  });

  it('rejects results that are not finite', () => {
    expect(() => calculate('10 ** 400')).toThrowError(/not a finite number/);
  });
});

describe('parseExpression', () => {
  it('gives multiplication precedence over addition', () => {
    expect(parseExpression('1 + 2 * 3')).toEqual({
      type: 'binary',
      operator: '+',
      left: { type: 'number', value: 1 },
      right: {
        type: 'binary',
        operator: '*',
        left: { type: 'number', value: 2 },
        right: { type: 'number', value: 3 },
      },
    });
  });
});

describe('formatNumber', () => {
  it('hides floating point noise', () => {
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(4)).toBe('4');
    expect(formatNumber(2.5)).toBe('2.5');
  });
});

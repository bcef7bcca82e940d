/**
 * Value Normalizer Tests
 *
 * Run with: npx vitest run server/services/__tests__/valueNormalizer.test.ts
 *
 * These tests verify:
 * 1. Date parsing across the accepted formats, including two-digit years
 * 2. Decimal parsing: symbols, grouping, decimal commas, negatives
 * 3. Currency code resolution from codes, names and symbols
 * 4. Empty and unreadable values are reported, never thrown
 * 5. Exact decimal comparison beyond floating point precision
 */

import { describe, it, expect } from 'vitest';
import {
  compareExactDecimals,
  normalizeCurrency,
  normalizeDate,
  normalizeDecimal,
  normalizeString,
  normalizeValue,
  parseExactDecimal,
  type ExactDecimal,
} from '../valueNormalizer';

describe('normalizeDate', () => {
  it.each([
    ['2024-01-15', '2024-01-15'],
    ['2024-01-15T10:30:00', '2024-01-15'],
    ['15/01/2024', '2024-01-15'],
    ['12/31/2024', '2024-12-31'],
    ['01-15-2024', '2024-01-15'],
    ['15.01.2024', '2024-01-15'],
    ['20240115', '2024-01-15'],
    ['5 March 2024', '2024-03-05'],
    ['March 5, 2024', '2024-03-05'],
    ['15/01/24', '2024-01-15'],
  ])('normalizes %s to %s', (raw, expected) => {
    expect(normalizeDate(raw)).toEqual({ kind: 'ok', value: expected });
  });

  it('reads ambiguous slash dates day-first', () => {
    expect(normalizeDate('01/02/2024')).toEqual({ kind: 'ok', value: '2024-02-01' });
  });

  it('rejects dates that do not exist', () => {
    expect(normalizeDate('2024-02-30')).toEqual({ kind: 'invalid', message: "Unrecognized date '2024-02-30'" });
  });

  it('rejects free text', () => {
    expect(normalizeDate(' soon ')).toEqual({ kind: 'invalid', message: "Unrecognized date 'soon'" });
  });

  it('treats blank cells as empty', () => {
    expect(normalizeDate('   ')).toEqual({ kind: 'empty' });
  });
});

describe('normalizeDecimal', () => {
  it.each([
    ['1234.56', '1234.56'],
    ['$1,234.56', '1234.56'],
    ['(1,234.50)', '-1234.50'],
    ['EUR 1.234,56', '1234.56'],
    ['12,5', '12.5'],
    ['1,234', '1234'],
    ['1.234.567', '1234567'],
    ['R 1 500,00', '1500.00'],
    ['US$ 10', '10'],
    ['10 R', '10'],
    ['100-', '-100'],
    ['-0', '0'],
    ['.5', '0.5'],
    ['007', '7'],
  ])('normalizes %s to %s', (raw, expected) => {
    expect(normalizeDecimal(raw)).toEqual({ kind: 'ok', value: expected });
  });

  it('keeps trailing zeros so amounts stay exact', () => {
    expect(normalizeDecimal('10.10')).toEqual({ kind: 'ok', value: '10.10' });
  });

  it('rejects text that is not an amount', () => {
    expect(normalizeDecimal('abc')).toEqual({ kind: 'invalid', message: "Unrecognized amount 'abc'" });
    expect(normalizeDecimal('GBP')).toEqual({ kind: 'invalid', message: "Unrecognized amount 'GBP'" });
  });

  it('treats blank cells as empty', () => {
    expect(normalizeDecimal('')).toEqual({ kind: 'empty' });
  });
});

describe('normalizeCurrency', () => {
  it.each([
    ['usd', 'USD'],
    ['£', 'GBP'],
    ['us$', 'USD'],
    ['Pound  Sterling', 'GBP'],
    ['euro', 'EUR'],
    ['KSh', 'KES'],
  ])('resolves %s to %s', (raw, expected) => {
    expect(normalizeCurrency(raw)).toEqual({ kind: 'ok', value: expected });
  });

  it('rejects unknown codes', () => {
    expect(normalizeCurrency('XYZ')).toEqual({ kind: 'invalid', message: "Unrecognized currency 'XYZ'" });
  });
});

describe('normalizeValue', () => {
  it('trims strings and preserves case', () => {
    expect(normalizeString('  Acme Ltd ')).toEqual({ kind: 'ok', value: 'Acme Ltd' });
  });

  it('dispatches on the field type', () => {
    expect(normalizeValue('date', '15/01/2024')).toEqual({ kind: 'ok', value: '2024-01-15' });
    expect(normalizeValue('decimal', '1,000')).toEqual({ kind: 'ok', value: '1000' });
    expect(normalizeValue('currency', 'gbp')).toEqual({ kind: 'ok', value: 'GBP' });
    expect(normalizeValue('string', '')).toEqual({ kind: 'empty' });
  });
});

describe('parseExactDecimal', () => {
  it.each([
    ['-1234.50', { negative: true, integer: '1234', fraction: '5' }],
    ['007.100', { negative: false, integer: '7', fraction: '1' }],
    ['.5', { negative: false, integer: '', fraction: '5' }],
    ['-0.00', { negative: false, integer: '', fraction: '' }],
    ['5e-7', { negative: false, integer: '', fraction: '0000005' }],
    ['1e+21', { negative: false, integer: '1000000000000000000000', fraction: '' }],
  ])('splits %s', (text, expected) => {
    expect(parseExactDecimal(text)).toEqual(expected);
  });

  it.each(['', '.', 'abc', '1.2.3', '1,000'])('rejects %j', (text) => {
    expect(parseExactDecimal(text)).toBeNull();
  });
});

describe('compareExactDecimals', () => {
  function decimal(text: string): ExactDecimal {
    const parsed = parseExactDecimal(text);
    if (!parsed) throw new Error(`test value ${text} is not a decimal`);
    return parsed;
  }

  it.each([
    ['100.00000000000000001', '100', 1],
    ['99.99999999999999999', '100', -1],
    ['100.000', '100', 0],
    ['-2', '-10', 1],
    ['-10', '-2', -1],
    ['0.1', '0.09', 1],
    ['-0', '0', 0],
    ['-0.0000000000000000001', '0', -1],
    ['1e+21', '999999999999999999999', 1],
  ])('compares %s with %s', (left, right, expected) => {
    expect(compareExactDecimals(decimal(left), decimal(right))).toBe(expected);
  });
});

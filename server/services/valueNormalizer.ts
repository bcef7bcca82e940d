/**
 * Value Normalizer
 *
 * Converts raw cell text into the canonical representation for a field type.
 * Never throws: an empty cell is "empty", anything else either normalizes or
 * comes back "invalid" with a message that becomes a conversion note.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { format, isValid, parse } from 'date-fns';
import { z } from 'zod';
import type { CanonicalValueType } from '../../shared/canonicalSchema';

export type NormalizedValue =
  | { kind: 'empty' }
  | { kind: 'ok'; value: string }
  | { kind: 'invalid'; message: string };

// ============================================
// DATES
// ============================================

/**
 * Tried in order; the first format that consumes the whole value and
 * yields a real calendar date wins. Day-first before month-first for
 * slash dates.
 */
export const DATE_FORMATS = [
  'yyyy-MM-dd',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy-MM-dd HH:mm:ss',
  'dd/MM/yyyy',
  'MM/dd/yyyy',
  'MM-dd-yyyy',
  'dd-MM-yyyy',
  'yyyy/MM/dd',
  'dd.MM.yyyy',
  'yyyy.MM.dd',
  'd MMMM yyyy',
  'd MMM yyyy',
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'yyyyMMdd',
  'dd/MM/yy',
  'MM/dd/yy',
] as const;

const MIN_YEAR = 1900;
const MAX_YEAR = 2200;

// Only used to resolve two-digit years (yy): 00-49 → 20xx, 50-99 → 19xx.
const REFERENCE_DATE = new Date(2000, 0, 1);

export function normalizeDate(raw: string): NormalizedValue {
  const text = raw.trim();
  if (!text) return { kind: 'empty' };

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (!isValid(parsed)) continue;

    const year = parsed.getFullYear();
    if (year < MIN_YEAR || year > MAX_YEAR) continue;

    return { kind: 'ok', value: format(parsed, 'yyyy-MM-dd') };
  }

  return { kind: 'invalid', message: `Unrecognized date '${text}'` };
}

// ============================================
// CURRENCY CODES
// ============================================

const currencyAliasesSchema = z.record(z.string().regex(/^[A-Z]{3}$/), z.array(z.string().min(1)));

const aliasFile = fileURLToPath(new URL('../data/currencyAliases.json', import.meta.url));
const currencyAliases = currencyAliasesSchema.parse(JSON.parse(readFileSync(aliasFile, 'utf-8')));

export const SUPPORTED_CURRENCIES: readonly string[] = Object.keys(currencyAliases);

const CURRENCY_BY_ALIAS = new Map<string, string>();
for (const [code, aliases] of Object.entries(currencyAliases)) {
  CURRENCY_BY_ALIAS.set(code, code);
  for (const alias of aliases) {
    CURRENCY_BY_ALIAS.set(alias.toUpperCase(), code);
  }
}

// Letter-only markers that may prefix or suffix an amount: "USD 10", "US$10", "10 R".
const AMOUNT_CURRENCY_MARKERS = new Set<string>();
for (const key of CURRENCY_BY_ALIAS.keys()) {
  const letters = key.replace(/[\p{Sc}.]/gu, '');
  if (/^[A-Z]{1,4}$/.test(letters)) AMOUNT_CURRENCY_MARKERS.add(letters);
}

export function normalizeCurrency(raw: string): NormalizedValue {
  const text = raw.trim();
  if (!text) return { kind: 'empty' };

  const key = text.toUpperCase().replace(/\s+/g, ' ');
  const code = CURRENCY_BY_ALIAS.get(key) ?? CURRENCY_BY_ALIAS.get(key.replace(/\.$/, ''));
  if (code) return { kind: 'ok', value: code };

  return { kind: 'invalid', message: `Unrecognized currency '${text}'` };
}

// ============================================
// DECIMALS
// ============================================

function stripCurrencyMarkers(text: string): string {
  let out = text.replace(/\p{Sc}/gu, ' ').trim();

  const leading = /^([A-Za-z]{1,4})\.?(?=[\s\d(.,+-]|$)/.exec(out);
  if (leading && AMOUNT_CURRENCY_MARKERS.has(leading[1].toUpperCase())) {
    out = out.slice(leading[0].length).trim();
  }

  const trailing = /(?<=[\s\d).])([A-Za-z]{1,4})$/.exec(out);
  if (trailing && AMOUNT_CURRENCY_MARKERS.has(trailing[1].toUpperCase())) {
    out = out.slice(0, out.length - trailing[0].length).trim();
  }

  return out;
}

/**
 * Decides which of "," and "." is the decimal separator and drops the other.
 * - both present: the one that appears last is the decimal separator
 * - a single "," followed by one or two digits is a decimal comma ("12,5")
 * - otherwise "," groups thousands; more than one "." groups thousands
 */
function resolveSeparators(text: string): string {
  const lastComma = text.lastIndexOf(',');
  const lastDot = text.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    return lastComma > lastDot
      ? text.replace(/\./g, '').replace(',', '.')
      : text.replace(/,/g, '');
  }

  if (lastComma >= 0) {
    const commaCount = text.split(',').length - 1;
    const decimals = text.length - lastComma - 1;
    if (commaCount === 1 && decimals >= 1 && decimals <= 2) {
      return text.replace(',', '.');
    }
    return text.replace(/,/g, '');
  }

  if (text.split('.').length - 1 > 1) {
    return text.replace(/\./g, '');
  }

  return text;
}

export function normalizeDecimal(raw: string): NormalizedValue {
  const text = raw.trim();
  if (!text) return { kind: 'empty' };

  let cleaned = stripCurrencyMarkers(text).replace(/[\s '’_]/g, '');
  let negative = false;

  const accounting = /^\((.*)\)$/.exec(cleaned);
  if (accounting) {
    negative = true;
    cleaned = accounting[1];
  }

  if (cleaned.startsWith('-') || cleaned.startsWith('+')) {
    negative = negative !== cleaned.startsWith('-');
    cleaned = cleaned.slice(1);
  } else if (cleaned.endsWith('-')) {
    negative = !negative;
    cleaned = cleaned.slice(0, -1);
  }

  cleaned = resolveSeparators(cleaned);

  const match = /^(\d+)(?:\.(\d+))?$/.exec(cleaned) ?? /^()\.(\d+)$/.exec(cleaned);
  if (!match) {
    return { kind: 'invalid', message: `Unrecognized amount '${text}'` };
  }

  const integerPart = match[1].replace(/^0+(?=\d)/, '') || '0';
  const fractionPart = match[2];
  const magnitude = fractionPart === undefined ? integerPart : `${integerPart}.${fractionPart}`;
  const isZero = /^[0.]+$/.test(magnitude);

  return { kind: 'ok', value: negative && !isZero ? `-${magnitude}` : magnitude };
}

/**
 * An exact decimal split into digit strings: no leading zeros in `integer`,
 * no trailing zeros in `fraction`, and zero is never negative.
 */
export interface ExactDecimal {
  negative: boolean;
  integer: string;
  fraction: string;
}

const EXACT_DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:e([+-]?\d{1,4}))?$/i;

/**
 * Parses canonical decimal text ("-1234.50") or a JavaScript number's
 * string form ("1e+21", "5e-7") without going through floating point.
 */
export function parseExactDecimal(text: string): ExactDecimal | null {
  const match = EXACT_DECIMAL_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, sign, integerDigits = '', fractionDigits = '', exponent] = match;
  if (!integerDigits && !fractionDigits) return null;

  let digits = integerDigits + fractionDigits;
  let point = integerDigits.length + (exponent ? Number(exponent) : 0);
  if (point < 0) {
    digits = '0'.repeat(-point) + digits;
    point = 0;
  }
  if (point > digits.length) {
    digits = digits.padEnd(point, '0');
  }

  const integer = digits.slice(0, point).replace(/^0+/, '');
  const fraction = digits.slice(point).replace(/0+$/, '');
  return { negative: sign === '-' && (integer !== '' || fraction !== ''), integer, fraction };
}

function compareMagnitude(a: ExactDecimal, b: ExactDecimal): number {
  if (a.integer.length !== b.integer.length) {
    return a.integer.length < b.integer.length ? -1 : 1;
  }
  if (a.integer !== b.integer) {
    return a.integer < b.integer ? -1 : 1;
  }

  const width = Math.max(a.fraction.length, b.fraction.length);
  const left = a.fraction.padEnd(width, '0');
  const right = b.fraction.padEnd(width, '0');
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/** -1, 0 or 1 as a is less than, equal to or greater than b. */
export function compareExactDecimals(a: ExactDecimal, b: ExactDecimal): number {
  if (a.negative !== b.negative) return a.negative ? -1 : 1;
  const magnitude = compareMagnitude(a, b);
  return a.negative ? -magnitude : magnitude;
}

// ============================================
// STRINGS / DISPATCH
// ============================================

export function normalizeString(raw: string): NormalizedValue {
  const text = raw.trim();
  return text ? { kind: 'ok', value: text } : { kind: 'empty' };
}

export function normalizeValue(type: CanonicalValueType, raw: string): NormalizedValue {
  switch (type) {
    case 'string':
      return normalizeString(raw);
    case 'date':
      return normalizeDate(raw);
    case 'decimal':
      return normalizeDecimal(raw);
    case 'currency':
      return normalizeCurrency(raw);
  }
}

/**
 * Validation Engine
 *
 * Evaluates a compiled rule set against canonical rows. Every rule is
 * evaluated for every row; each evaluation yields zero or one violation,
 * collected in rule-definition order. A row is valid iff none of its
 * violations has error severity.
 *
 * Rules are a closed tagged union. Adding a kind means adding a variant
 * and a case in evaluateRule; the `never` check makes a missed case a
 * compile error.
 */

import type { CanonicalField } from '../../shared/canonicalSchema';
import { Severity } from '../../shared/schema';
import type {
  CanonicalRow,
  ConversionNote,
  ValidationErrorCode,
  ValidationSummary,
  ValidationViolation,
} from '../../shared/types';
import { compareExactDecimals, parseExactDecimal, type ExactDecimal } from './valueNormalizer';

// ============================================
// 1. RULE TYPES
// ============================================

export interface RequiredFieldRule {
  kind: 'required';
  name: string;
  field: CanonicalField;
  severity: Severity;
  message: string;
}

export interface DateOrderRule {
  kind: 'date_order';
  name: string;
  startField: CanonicalField;
  endField: CanonicalField;
  severity: Severity;
  message: string;
  /** skip rows where a date is absent (not unreadable) instead of firing */
  optional: boolean;
}

export interface NumericRangeRule {
  kind: 'numeric_range';
  name: string;
  field: CanonicalField;
  min?: number;
  max?: number;
  severity: Severity;
  message: string;
  /** skip rows where the value is absent (not unreadable) instead of firing */
  optional: boolean;
}

export type ValidationRule = RequiredFieldRule | DateOrderRule | NumericRangeRule;

export type RuleSet = readonly ValidationRule[];

type RuleViolation = Pick<ValidationViolation, 'fieldName' | 'fieldValue' | 'ruleName' | 'errorCode' | 'severity' | 'message'>;

// ============================================
// 2. MESSAGE RENDERING
// ============================================

/**
 * Substitutes {placeholders}; unknown placeholders are left as written.
 */
export function renderMessage(template: string, vars: Record<string, string | number | undefined>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = vars[key];
    return value === undefined ? match : String(value);
  });
}

function withConversionNotes(message: string, notes: ConversionNote[]): string {
  if (notes.length === 0) return message;
  return `${message} (${notes.map((note) => note.message).join('; ')})`;
}

function notesFor(row: CanonicalRow, fields: CanonicalField[]): ConversionNote[] {
  return row.conversionNotes.filter((note) => fields.includes(note.field));
}

function presentValue(row: CanonicalRow, field: CanonicalField): string | undefined {
  const value = row.values[field];
  if (value === undefined || value.trim() === '') return undefined;
  return value;
}

function violation(
  rule: ValidationRule,
  errorCode: ValidationErrorCode,
  fieldName: string,
  fieldValue: string | null,
  message: string
): RuleViolation {
  return {
    ruleName: rule.name,
    errorCode,
    fieldName,
    fieldValue,
    severity: rule.severity,
    message,
  };
}

// ============================================
// 3. RULE EVALUATION
// ============================================

function evaluateRequired(rule: RequiredFieldRule, row: CanonicalRow): RuleViolation | null {
  if (presentValue(row, rule.field) !== undefined) return null;

  const message = renderMessage(rule.message, { field: rule.field, name: rule.name });
  return violation(rule, 'REQUIRED_FIELD_MISSING', rule.field, null, withConversionNotes(message, notesFor(row, [rule.field])));
}

function evaluateDateOrder(rule: DateOrderRule, row: CanonicalRow): RuleViolation | null {
  const start = presentValue(row, rule.startField);
  const end = presentValue(row, rule.endField);
  const fieldName = `${rule.startField},${rule.endField}`;

  if (start === undefined || end === undefined) {
    const notes = notesFor(row, [rule.startField, rule.endField]);
    // optional rules still fire when a date was present but unreadable
    if (rule.optional && notes.length === 0) return null;
    const message = renderMessage('Rule {name} requires valid dates in {start_field} and {end_field}', {
      name: rule.name,
      start_field: rule.startField,
      end_field: rule.endField,
    });
    return violation(
      rule,
      'DATE_VALUE_MISSING',
      fieldName,
      start ?? end ?? null,
      withConversionNotes(message, notes)
    );
  }

  // Both are yyyy-MM-dd, so lexical order is calendar order.
  if (start <= end) return null;

  const message = renderMessage(rule.message, {
    name: rule.name,
    start_field: rule.startField,
    end_field: rule.endField,
    value: `${start},${end}`,
  });
  return violation(rule, 'DATE_ORDER_VIOLATED', fieldName, `${start},${end}`, message);
}

function bound(limit: number | undefined): ExactDecimal | null {
  return limit === undefined ? null : parseExactDecimal(String(limit));
}

function evaluateNumericRange(rule: NumericRangeRule, row: CanonicalRow): RuleViolation | null {
  const raw = presentValue(row, rule.field);
  const amount = raw === undefined ? null : parseExactDecimal(raw);

  if (raw === undefined || amount === null) {
    const notes = notesFor(row, [rule.field]);
    if (raw === undefined && rule.optional && notes.length === 0) return null;
    const message = renderMessage("Field '{field}' is missing or not a valid number", { field: rule.field });
    return violation(rule, 'NUMERIC_VALUE_MISSING', rule.field, raw ?? null, withConversionNotes(message, notes));
  }

  const min = bound(rule.min);
  const max = bound(rule.max);
  const belowMin = min !== null && compareExactDecimals(amount, min) < 0;
  const aboveMax = max !== null && compareExactDecimals(amount, max) > 0;
  if (!belowMin && !aboveMax) return null;

  const message = renderMessage(rule.message, {
    name: rule.name,
    field: rule.field,
    value: raw,
    min: rule.min,
    max: rule.max,
  });
  return violation(rule, 'NUMERIC_OUT_OF_RANGE', rule.field, raw, message);
}

export function evaluateRule(rule: ValidationRule, row: CanonicalRow): RuleViolation | null {
  switch (rule.kind) {
    case 'required':
      return evaluateRequired(rule, row);
    case 'date_order':
      return evaluateDateOrder(rule, row);
    case 'numeric_range':
      return evaluateNumericRange(rule, row);
    default: {
      const unreachable: never = rule;
      return unreachable;
    }
  }
}

// ============================================
// 4. ROW / FILE VALIDATION
// ============================================

export function validateRow(row: CanonicalRow, rules: RuleSet): { row: CanonicalRow; violations: ValidationViolation[] } {
  const violations: ValidationViolation[] = [];

  for (const rule of rules) {
    const outcome = evaluateRule(rule, row);
    if (outcome) {
      violations.push({ fileId: row.fileId, rowIndex: row.rowIndex, ...outcome });
    }
  }

  const isValid = !violations.some((v) => v.severity === Severity.ERROR);
  return { row: { ...row, isValid }, violations };
}

/**
 * Validates every row. Violations are ordered by row index, then by rule
 * order within the row.
 */
export function validateRows(rows: CanonicalRow[], rules: RuleSet): ValidationSummary {
  const validated: CanonicalRow[] = [];
  const violations: ValidationViolation[] = [];
  let validCount = 0;

  for (const row of rows) {
    const result = validateRow(row, rules);
    validated.push(result.row);
    violations.push(...result.violations);
    if (result.row.isValid) validCount++;
  }

  return {
    rows: validated,
    violations,
    validCount,
    invalidCount: validated.length - validCount,
  };
}

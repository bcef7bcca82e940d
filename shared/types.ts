/**
 * Shared Types Module
 *
 * Pipeline value types used by the server services, the repositories and
 * the operator scripts. Table row types live next to their tables in
 * ./schema; these are the in-memory shapes that flow between stages.
 */

import type { CanonicalField } from './canonicalSchema';
import type { ProposalSource, ReviewStatus, Severity } from './schema';

// =================================================
// Decoder output
// =================================================

/** One decoded source row: raw header -> raw cell text */
export type RawRow = Record<string, string>;

export interface DecodedTable {
  headers: string[];
  rows: RawRow[];
}

// =================================================
// Mapper output
// =================================================

export type CanonicalRecord = Partial<Record<CanonicalField, string>>;

/**
 * A non-empty source value that could not be normalized.
 * The field is left absent on the row; validation decides what that means.
 */
export interface ConversionNote {
  field: CanonicalField;
  rawHeader: string;
  rawValue: string;
  message: string;
}

export interface CanonicalRow {
  fileId: string;
  /** 0-based, matches source row order */
  rowIndex: number;
  values: CanonicalRecord;
  rawData: RawRow;
  conversionNotes: ConversionNote[];
  isValid: boolean;
}

// =================================================
// Validation output
// =================================================

export type ValidationErrorCode =
  | 'REQUIRED_FIELD_MISSING'
  | 'DATE_VALUE_MISSING'
  | 'DATE_ORDER_VIOLATED'
  | 'NUMERIC_VALUE_MISSING'
  | 'NUMERIC_OUT_OF_RANGE';

export interface ValidationViolation {
  fileId: string;
  rowIndex: number;
  /** null for row-wide rules; "start,end" for date-order rules */
  fieldName: string | null;
  /** the offending value(s) as text, null when absent */
  fieldValue: string | null;
  ruleName: string;
  errorCode: ValidationErrorCode;
  severity: Severity;
  message: string;
}

export interface ValidationSummary {
  rows: CanonicalRow[];
  violations: ValidationViolation[];
  validCount: number;
  invalidCount: number;
}

// =================================================
// Mapping proposals
// =================================================

export interface ProposedFieldMapping {
  canonicalField: CanonicalField;
  rawHeader: string | null;
  confidence: number;
}

export interface MappingProposal {
  fileId: string;
  fields: ProposedFieldMapping[];
  overallConfidence: number;
  source: ProposalSource;
  reviewStatus: ReviewStatus;
}

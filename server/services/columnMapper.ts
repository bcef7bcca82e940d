/**
 * Column Mapper
 *
 * Applies a matched template to decoded rows: renames raw columns to
 * canonical fields, drops unmapped columns and normalizes typed values.
 * Rows are never dropped here; a value that fails to normalize is left
 * absent and recorded as a conversion note for the validation stage.
 */

import { CANONICAL_FIELD_TYPES, isCanonicalField, type CanonicalField } from '../../shared/canonicalSchema';
import type { Template } from '../../shared/schema';
import type { CanonicalRecord, CanonicalRow, ConversionNote, RawRow } from '../../shared/types';
import { normalizeHeader } from './headerNormalization';
import { normalizeValue } from './valueNormalizer';

export type MappingTemplate = Pick<Template, 'templateId' | 'columnMappings'>;

/**
 * normalized raw header -> canonical field, ignoring mappings to unknown fields
 */
export function buildHeaderLookup(template: MappingTemplate): Map<string, CanonicalField> {
  const lookup = new Map<string, CanonicalField>();
  for (const [rawHeader, target] of Object.entries(template.columnMappings)) {
    const key = normalizeHeader(rawHeader);
    if (key && isCanonicalField(target) && !lookup.has(key)) {
      lookup.set(key, target);
    }
  }
  return lookup;
}

export function mapRow(
  fileId: string,
  rowIndex: number,
  rawRow: RawRow,
  lookup: Map<string, CanonicalField>
): CanonicalRow {
  const values: CanonicalRecord = {};
  const conversionNotes: ConversionNote[] = [];
  const seen = new Set<CanonicalField>();

  for (const [rawHeader, rawValue] of Object.entries(rawRow)) {
    const field = lookup.get(normalizeHeader(rawHeader));
    if (!field || seen.has(field)) continue;

    const normalized = normalizeValue(CANONICAL_FIELD_TYPES[field], rawValue);
    switch (normalized.kind) {
      case 'ok':
        seen.add(field);
        values[field] = normalized.value;
        break;
      case 'invalid':
        seen.add(field);
        conversionNotes.push({ field, rawHeader, rawValue, message: normalized.message });
        break;
      case 'empty':
        // leaves the field open for a later column with the same key
        break;
    }
  }

  return {
    fileId,
    rowIndex,
    values,
    rawData: { ...rawRow },
    conversionNotes,
    isValid: true,
  };
}

export function mapRows(fileId: string, template: MappingTemplate, rows: RawRow[]): CanonicalRow[] {
  const lookup = buildHeaderLookup(template);
  return rows.map((row, index) => mapRow(fileId, index, row, lookup));
}

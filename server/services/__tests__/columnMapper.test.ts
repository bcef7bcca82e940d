/**
 * Column Mapper Tests
 *
 * Run with: npx vitest run server/services/__tests__/columnMapper.test.ts
 *
 * These tests verify:
 * 1. Raw columns are renamed through normalized template headers
 * 2. Unmapped columns and mappings to unknown fields are dropped
 * 3. Unreadable values become conversion notes instead of values
 * 4. Rows keep their order and raw data
 * 5. Mapping the same row twice gives the same result
 */

import { describe, it, expect } from 'vitest';
import { buildHeaderLookup, mapRow, mapRows, type MappingTemplate } from '../columnMapper';

const template: MappingTemplate = {
  templateId: 'premium-v1',
  columnMappings: {
    'Policy No': 'policy_number',
    'Gross Premium': 'premium_amount',
    'Start': 'inception_date',
    'Ccy': 'currency',
    'Bogus': 'not_a_field',
  },
};

describe('buildHeaderLookup', () => {
  it('keys the lookup by normalized header and skips unknown targets', () => {
    const lookup = buildHeaderLookup(template);

    expect([...lookup.entries()]).toEqual([
      ['policy_no', 'policy_number'],
      ['gross_premium', 'premium_amount'],
      ['start', 'inception_date'],
      ['ccy', 'currency'],
    ]);
  });
});

describe('mapRow', () => {
  const lookup = buildHeaderLookup(template);

  it('renames and normalizes mapped columns, ignoring the rest', () => {
    const row = mapRow('file-1', 0, {
      'policy no': ' P-100 ',
      'GROSS PREMIUM': '1,250.00',
      'Start': '15/01/2024',
      'Ccy': 'gbp',
      'Notes': 'ignore me',
    }, lookup);

    expect(row.values).toEqual({
      policy_number: 'P-100',
      premium_amount: '1250.00',
      inception_date: '2024-01-15',
      currency: 'GBP',
    });
    expect(row.conversionNotes).toEqual([]);
    expect(row.rawData.Notes).toBe('ignore me');
    expect(row.isValid).toBe(true);
  });

  it('records a conversion note and leaves the field absent for unreadable values', () => {
    const row = mapRow('file-1', 3, { 'Policy No': 'P-1', 'Gross Premium': 'n/a', 'Start': '' }, lookup);

    expect(row.values).toEqual({ policy_number: 'P-1' });
    expect(row.conversionNotes).toEqual([
      { field: 'premium_amount', rawHeader: 'Gross Premium', rawValue: 'n/a', message: "Unrecognized amount 'n/a'" },
    ]);
    expect(row.rowIndex).toBe(3);
  });

  it('keeps the first column when two raw headers normalize to the same key', () => {
    const row = mapRow('file-1', 0, { 'Policy No': 'FIRST', 'policy_no': 'SECOND' }, lookup);

    expect(row.values.policy_number).toBe('FIRST');
  });

  it('falls through to a later column when the first one is empty', () => {
    const row = mapRow('file-1', 0, { 'Policy No': '  ', 'policy_no': 'SECOND' }, lookup);

    expect(row.values.policy_number).toBe('SECOND');
    expect(row.conversionNotes).toEqual([]);
  });

  it('produces identical rows when the same row is mapped twice', () => {
    const raw = { 'Policy No': 'P-7', 'Gross Premium': '(1.234,50)', 'Start': '31-12-2024', 'Ccy': 'n/a' };

    const first = mapRow('file-1', 4, raw, lookup);
    const second = mapRow('file-1', 4, raw, lookup);

    expect(second).toEqual(first);
    expect(second.values).toEqual({ policy_number: 'P-7', premium_amount: '-1234.50', inception_date: '2024-12-31' });
    expect(second.conversionNotes).toEqual([
      { field: 'currency', rawHeader: 'Ccy', rawValue: 'n/a', message: "Unrecognized currency 'n/a'" },
    ]);
  });

  it('copies raw data rather than sharing it', () => {
    const raw = { 'Policy No': 'P-1' };
    const row = mapRow('file-1', 0, raw, lookup);
    raw['Policy No'] = 'changed';

    expect(row.rawData).toEqual({ 'Policy No': 'P-1' });
  });
});

describe('mapRows', () => {
  it('maps every row in source order', () => {
    const rows = mapRows('file-2', template, [{ 'Policy No': 'A' }, { 'Policy No': '' }, { 'Policy No': 'C' }]);

    expect(rows.map((row) => row.rowIndex)).toEqual([0, 1, 2]);
    expect(rows.map((row) => row.values.policy_number)).toEqual(['A', undefined, 'C']);
    expect(rows.every((row) => row.fileId === 'file-2')).toBe(true);
  });
});

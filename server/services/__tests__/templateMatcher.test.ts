/**
 * Template Matcher Tests
 *
 * Run with: npx vitest run server/services/__tests__/templateMatcher.test.ts
 *
 * These tests verify:
 * 1. Header normalization used for matching
 * 2. Scoring as the share of template keys present in the file
 * 3. Threshold, tie-breaking, file type and active filtering
 */

import { describe, it, expect } from 'vitest';
import { FileType } from '../../../shared/schema';
import { normalizeColumnMappings, normalizeHeader, normalizeHeaderSet } from '../headerNormalization';
import { matchTemplate, scoreTemplate, type MatchableTemplate } from '../templateMatcher';
import { ConfigurationError } from '../../lib/errors';

function template(templateId: string, headers: string[], overrides: Partial<MatchableTemplate> = {}): MatchableTemplate {
  const columnMappings: Record<string, string> = {};
  headers.forEach((header, index) => {
    columnMappings[header] = `field_${index}`;
  });
  return { templateId, fileType: FileType.PREMIUM, columnMappings, active: true, ...overrides };
}

describe('normalizeHeader', () => {
  it('lower-cases, trims and collapses punctuation runs', () => {
    expect(normalizeHeader(' Policy  No. ')).toBe('policy_no');
    expect(normalizeHeader('Premium (GBP)')).toBe('premium_gbp');
    expect(normalizeHeader('inception_date')).toBe('inception_date');
  });

  it('normalizes a header with nothing alphanumeric to an empty key', () => {
    expect(normalizeHeader(' -- ')).toBe('');
  });

  it('rejects column mappings whose keys collide after normalization', () => {
    expect(() => normalizeColumnMappings({ 'Policy No': 'policy_number', 'policy_no': 'policy_number' }))
      .toThrow(ConfigurationError);
  });
});

describe('scoreTemplate', () => {
  it('scores the fraction of template keys found in the headers', () => {
    const headers = normalizeHeaderSet(['Policy Number', 'Insured', 'Premium']);
    const scored = scoreTemplate(headers, template('t1', ['policy number', 'insured', 'premium', 'currency']));

    expect(scored.matchedKeys).toBe(3);
    expect(scored.totalKeys).toBe(4);
    expect(scored.score).toBe(0.75);
  });

  it('scores an empty template as 0', () => {
    expect(scoreTemplate(new Set(['a']), template('empty', [])).score).toBe(0);
  });
});

describe('matchTemplate', () => {
  const headers = ['Policy Number', 'Inception Date', 'Expiry Date', 'Premium Amount'];

  it('returns an exact match with score 1.0', () => {
    const result = matchTemplate(headers, [template('exact', ['policy_number', 'inception date', 'EXPIRY DATE', 'Premium Amount'])]);

    expect(result.match?.template.templateId).toBe('exact');
    expect(result.match?.score).toBe(1);
    expect(result.candidatesConsidered).toBe(1);
  });

  it('accepts a score equal to the threshold', () => {
    const fiveKeys = template('five', ['Policy Number', 'Inception Date', 'Expiry Date', 'Premium Amount', 'Currency']);
    const result = matchTemplate(headers, [fiveKeys], { threshold: 0.8 });

    expect(result.match?.score).toBe(0.8);
  });

  it('returns no match below the threshold but reports the best score', () => {
    const result = matchTemplate(['Policy Number', 'Notes'], [template('t', ['Policy Number', 'Insured', 'Premium'])]);

    expect(result.match).toBeNull();
    expect(result.bestScore).toBeCloseTo(1 / 3, 10);
  });

  it('returns no match for an empty catalog', () => {
    expect(matchTemplate(headers, [])).toEqual({ match: null, bestScore: 0, candidatesConsidered: 0 });
  });

  it('breaks score ties by key count, then by templateId', () => {
    const small = template('b-small', ['Policy Number', 'Premium Amount']);
    const large = template('z-large', headers);
    const twin = template('a-twin', headers);

    const result = matchTemplate(headers, [small, large, twin]);
    expect(result.match?.template.templateId).toBe('a-twin');

    const withoutTwin = matchTemplate(headers, [small, large]);
    expect(withoutTwin.match?.template.templateId).toBe('z-large');
  });

  it('ignores inactive templates', () => {
    const result = matchTemplate(headers, [template('inactive', headers, { active: false })]);

    expect(result.match).toBeNull();
    expect(result.candidatesConsidered).toBe(0);
  });

  it('restricts candidates to the file type unless the type is unknown', () => {
    const claims = template('claims', headers, { fileType: FileType.CLAIMS });

    expect(matchTemplate(headers, [claims], { fileType: FileType.PREMIUM }).match).toBeNull();
    expect(matchTemplate(headers, [claims], { fileType: FileType.UNKNOWN }).match?.template.templateId).toBe('claims');
    expect(matchTemplate(headers, [claims], { fileType: null }).match?.template.templateId).toBe('claims');
  });
});

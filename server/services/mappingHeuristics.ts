/**
 * Heuristic header → canonical field matching.
 *
 * score(field, header) = min(1, base + bonus)
 *   base  = max( sim(header, field name as words),
 *                SYNONYM_WEIGHT * max sim(header, synonym) )
 *   sim   = max(edit-distance similarity, token Jaccard)
 *   bonus = SYNONYM_BONUS when the header equals a synonym exactly
 *
 * Assignment is global greedy over all (field, header) pairs by descending
 * score, so a header is only ever used once and a strong pair is never
 * displaced by a weaker one that happened to be considered first.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import levenshtein from 'js-levenshtein';
import { z } from 'zod';
import { CANONICAL_FIELDS, isCanonicalField, type CanonicalField } from '../../shared/canonicalSchema';
import type { ProposedFieldMapping } from '../../shared/types';

export const DEFAULT_SUGGESTION_MIN_SCORE = 0.6;
export const SYNONYM_BONUS = 0.4;
export const SYNONYM_WEIGHT = 0.8;

// ============================================
// SYNONYM DICTIONARY
// ============================================

const synonymFileSchema = z.record(z.string(), z.array(z.string().min(1)));

export function normalizeForComparison(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function loadSynonyms(): Map<CanonicalField, string[]> {
  const file = fileURLToPath(new URL('../data/headerSynonyms.json', import.meta.url));
  const parsed = synonymFileSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
  const synonyms = new Map<CanonicalField, string[]>();

  for (const field of CANONICAL_FIELDS) {
    synonyms.set(field, []);
  }
  for (const [field, entries] of Object.entries(parsed)) {
    if (!isCanonicalField(field)) continue;
    synonyms.set(field, entries.map(normalizeForComparison).filter(Boolean));
  }
  return synonyms;
}

const SYNONYMS = loadSynonyms();

// ============================================
// SIMILARITY
// ============================================

export function editSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  const longest = Math.max(a.length, b.length);
  return 1 - levenshtein(a, b) / longest;
}

export function tokenJaccard(a: string, b: string): number {
  const left = new Set(a.split(' ').filter(Boolean));
  const right = new Set(b.split(' ').filter(Boolean));
  if (left.size === 0 || right.size === 0) return 0;

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

function textSimilarity(a: string, b: string): number {
  return Math.max(editSimilarity(a, b), tokenJaccard(a, b));
}

export function scoreHeader(field: CanonicalField, header: string): number {
  const normalized = normalizeForComparison(header);
  if (!normalized) return 0;

  const fieldWords = field.replace(/_/g, ' ');
  const synonyms = SYNONYMS.get(field) ?? [];

  let base = textSimilarity(normalized, fieldWords);
  for (const synonym of synonyms) {
    base = Math.max(base, SYNONYM_WEIGHT * textSimilarity(normalized, synonym));
  }

  const bonus = normalized === fieldWords || synonyms.includes(normalized) ? SYNONYM_BONUS : 0;
  return Math.min(1, base + bonus);
}

export function roundConfidence(value: number): number {
  return Math.round(value * 10000) / 10000;
}

// ============================================
// ASSIGNMENT
// ============================================

interface CandidatePair {
  field: CanonicalField;
  fieldIndex: number;
  header: string;
  headerIndex: number;
  score: number;
}

/**
 * One entry per canonical field, in canonical order. Fields whose best
 * available header does not score strictly above minScore stay unmapped
 * with confidence 0.
 */
export function suggestByHeuristics(
  headers: string[],
  minScore: number = DEFAULT_SUGGESTION_MIN_SCORE
): ProposedFieldMapping[] {
  const pairs: CandidatePair[] = [];

  CANONICAL_FIELDS.forEach((field, fieldIndex) => {
    headers.forEach((header, headerIndex) => {
      const score = scoreHeader(field, header);
      if (score > minScore) {
        pairs.push({ field, fieldIndex, header, headerIndex, score });
      }
    });
  });

  pairs.sort((a, b) => b.score - a.score || a.fieldIndex - b.fieldIndex || a.headerIndex - b.headerIndex);

  const assigned = new Map<CanonicalField, CandidatePair>();
  const usedHeaders = new Set<number>();

  for (const pair of pairs) {
    if (assigned.has(pair.field) || usedHeaders.has(pair.headerIndex)) continue;
    assigned.set(pair.field, pair);
    usedHeaders.add(pair.headerIndex);
  }

  return CANONICAL_FIELDS.map((field) => {
    const pair = assigned.get(field);
    return pair
      ? { canonicalField: field, rawHeader: pair.header, confidence: roundConfidence(pair.score) }
      : { canonicalField: field, rawHeader: null, confidence: 0 };
  });
}

export function overallConfidence(fields: ProposedFieldMapping[]): number {
  if (fields.length === 0) return 0;
  const total = fields.reduce((sum, field) => sum + field.confidence, 0);
  return roundConfidence(total / fields.length);
}

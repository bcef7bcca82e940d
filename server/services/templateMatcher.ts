/**
 * Template Matcher
 *
 * Scores a file's headers against the active template catalog. Pure: no
 * I/O, no logging; the orchestrator logs the outcome.
 *
 * score = |template keys present in file headers| / |template keys|
 *
 * A template matches when its score is at or above the threshold. Among
 * matches the highest score wins; ties go to the template with more
 * column mappings, then to the lexicographically smallest templateId.
 */

import { FileType, type Template } from '../../shared/schema';
import { normalizeHeader, normalizeHeaderSet } from './headerNormalization';

export const DEFAULT_MATCH_THRESHOLD = 0.8;

export type MatchableTemplate = Pick<Template, 'templateId' | 'fileType' | 'columnMappings' | 'active'>;

export interface TemplateScore<T extends MatchableTemplate> {
  template: T;
  score: number;
  matchedKeys: number;
  totalKeys: number;
}

export interface MatchResult<T extends MatchableTemplate> {
  /** null when no template reaches the threshold */
  match: TemplateScore<T> | null;
  /** best score seen, matched or not */
  bestScore: number;
  candidatesConsidered: number;
}

export interface MatchOptions {
  threshold?: number;
  fileType?: FileType | null;
}

export function scoreTemplate<T extends MatchableTemplate>(headers: Set<string>, template: T): TemplateScore<T> {
  const keys = new Set(Object.keys(template.columnMappings).map(normalizeHeader).filter(Boolean));
  let matchedKeys = 0;
  for (const key of keys) {
    if (headers.has(key)) matchedKeys++;
  }

  return {
    template,
    score: keys.size === 0 ? 0 : matchedKeys / keys.size,
    matchedKeys,
    totalKeys: keys.size,
  };
}

function compareScores<T extends MatchableTemplate>(a: TemplateScore<T>, b: TemplateScore<T>): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.totalKeys !== b.totalKeys) return b.totalKeys - a.totalKeys;
  if (a.template.templateId < b.template.templateId) return -1;
  if (a.template.templateId > b.template.templateId) return 1;
  return 0;
}

export function matchTemplate<T extends MatchableTemplate>(
  headers: string[],
  catalog: readonly T[],
  options: MatchOptions = {}
): MatchResult<T> {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const fileType = options.fileType && options.fileType !== FileType.UNKNOWN ? options.fileType : null;
  const headerSet = normalizeHeaderSet(headers);

  const candidates = catalog.filter((template) => template.active && (fileType === null || template.fileType === fileType));
  const scored = candidates.map((template) => scoreTemplate(headerSet, template)).sort(compareScores);

  const best = scored[0];
  if (!best) {
    return { match: null, bestScore: 0, candidatesConsidered: 0 };
  }

  return {
    match: best.score >= threshold ? best : null,
    bestScore: best.score,
    candidatesConsidered: scored.length,
  };
}

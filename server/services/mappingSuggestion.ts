/**
 * Mapping Suggestion Generator
 *
 * Runs only for files that matched no template. Strategy chain:
 *   1. AI collaborator (skipped when disabled), bounded by a timeout
 *   2. heuristic similarity matching, which cannot fail
 *
 * Any AI failure (request error, timeout, malformed or empty output) is
 * logged at warn level and absorbed; generate() never rejects because of it.
 * The resulting proposal is always "pending": nothing here creates or
 * activates a template.
 */

import { z } from 'zod';
import { CANONICAL_FIELDS, isCanonicalField, type CanonicalField } from '../../shared/canonicalSchema';
import { ProposalSource, ReviewStatus } from '../../shared/schema';
import type { MappingProposal, ProposedFieldMapping, RawRow } from '../../shared/types';
import { SuggestionGenerationError } from '../lib/errors';
import { loggers } from '../lib/logger';
import { TimeoutError, withTimeout } from '../lib/timeout';
import type { AiMappingCollaborator } from './aiMappingClient';
import { normalizeHeader } from './headerNormalization';
import { DEFAULT_SUGGESTION_MIN_SCORE, overallConfidence, roundConfidence, suggestByHeuristics } from './mappingHeuristics';

const log = loggers.suggestions;

export interface SuggestionOptions {
  timeoutMs: number;
  minScore: number;
  sampleRowCount: number;
}

export interface SuggestionInput {
  fileId: string;
  headers: string[];
  rows: RawRow[];
  filename?: string;
  sender?: string | null;
  fileType?: string;
}

// ============================================
// AI RESPONSE PARSING
// ============================================

const aiEntrySchema = z.object({
  canonical_field: z.string(),
  raw_header: z.string(),
  confidence: z.number(),
});

const aiResponseSchema = z.union([
  z.object({ mappings: z.array(z.unknown()) }).transform((value) => value.mappings),
  z.array(z.unknown()),
]);

export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```[a-zA-Z]*\s*/, '')
    .replace(/\s*```$/, '')
    .trim();
}

/**
 * Parses an AI response against the file's headers. Entries naming an
 * unknown field, a header not in the file, or a confidence outside [0, 1]
 * are discarded. When a field or header is proposed twice the higher
 * confidence wins. Throws SuggestionGenerationError when nothing usable
 * remains.
 */
export function parseAiMappingResponse(text: string, headers: string[]): ProposedFieldMapping[] {
  let document: unknown;
  try {
    document = JSON.parse(stripCodeFences(text));
  } catch (error) {
    throw new SuggestionGenerationError('malformed_response', 'AI mapping response is not valid JSON', error);
  }

  const entries = aiResponseSchema.safeParse(document);
  if (!entries.success) {
    throw new SuggestionGenerationError('malformed_response', 'AI mapping response has an unexpected shape');
  }

  // normalized header -> verbatim header, dropping headers that collide
  const headerByKey = new Map<string, string | null>();
  for (const header of headers) {
    const key = normalizeHeader(header);
    headerByKey.set(key, headerByKey.has(key) ? null : header);
  }

  const accepted: ProposedFieldMapping[] = [];
  for (const entry of entries.data) {
    const parsed = aiEntrySchema.safeParse(entry);
    if (!parsed.success) continue;

    const { canonical_field: field, raw_header: rawHeader, confidence } = parsed.data;
    if (!isCanonicalField(field)) continue;
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) continue;

    const header = headers.includes(rawHeader) ? rawHeader : headerByKey.get(normalizeHeader(rawHeader));
    if (!header) continue;

    accepted.push({ canonicalField: field, rawHeader: header, confidence: roundConfidence(confidence) });
  }

  const byField = new Map<CanonicalField, ProposedFieldMapping>();
  const usedHeaders = new Set<string>();
  const ranked = accepted
    .map((mapping, order) => ({ mapping, order }))
    .sort((a, b) => b.mapping.confidence - a.mapping.confidence || a.order - b.order);

  for (const { mapping } of ranked) {
    if (mapping.rawHeader === null) continue;
    if (byField.has(mapping.canonicalField) || usedHeaders.has(mapping.rawHeader)) continue;
    byField.set(mapping.canonicalField, mapping);
    usedHeaders.add(mapping.rawHeader);
  }

  if (byField.size === 0) {
    throw new SuggestionGenerationError('empty_response', 'AI mapping response contained no usable mappings');
  }

  return CANONICAL_FIELDS.map(
    (field) => byField.get(field) ?? { canonicalField: field, rawHeader: null, confidence: 0 }
  );
}

// ============================================
// GENERATOR
// ============================================

export class MappingSuggestionGenerator {
  private readonly options: SuggestionOptions;

  constructor(
    private readonly collaborator: AiMappingCollaborator,
    options: Partial<SuggestionOptions> = {}
  ) {
    this.options = {
      timeoutMs: options.timeoutMs ?? 30000,
      minScore: options.minScore ?? DEFAULT_SUGGESTION_MIN_SCORE,
      sampleRowCount: options.sampleRowCount ?? 3,
    };
  }

  get aiEnabled(): boolean {
    return this.collaborator.enabled;
  }

  async generate(input: SuggestionInput): Promise<MappingProposal> {
    if (this.collaborator.enabled) {
      const fields = await this.tryAi(input);
      if (fields) {
        return this.toProposal(input.fileId, fields, ProposalSource.AI);
      }
    }

    const fields = suggestByHeuristics(input.headers, this.options.minScore);
    return this.toProposal(input.fileId, fields, ProposalSource.HEURISTIC);
  }

  private async tryAi(input: SuggestionInput): Promise<ProposedFieldMapping[] | null> {
    const startTime = Date.now();
    try {
      const text = await withTimeout(
        (signal) =>
          this.collaborator.requestMapping(
            {
              headers: input.headers,
              sampleRows: input.rows.slice(0, this.options.sampleRowCount),
              context: { filename: input.filename, sender: input.sender, fileType: input.fileType },
            },
            signal
          ),
        this.options.timeoutMs,
        'AI mapping request'
      );

      const fields = parseAiMappingResponse(text, input.headers);
      log.info(
        { fileId: input.fileId, collaborator: this.collaborator.name, durationMs: Date.now() - startTime },
        'AI mapping suggestion accepted'
      );
      return fields;
    } catch (error) {
      log.warn(
        { fileId: input.fileId, collaborator: this.collaborator.name, reason: failureReason(error) },
        'AI mapping suggestion failed, falling back to heuristics'
      );
      return null;
    }
  }

  private toProposal(fileId: string, fields: ProposedFieldMapping[], source: ProposalSource): MappingProposal {
    return {
      fileId,
      fields,
      overallConfidence: overallConfidence(fields),
      source,
      reviewStatus: ReviewStatus.PENDING,
    };
  }
}

function failureReason(error: unknown): string {
  if (error instanceof SuggestionGenerationError) return error.reason;
  if (error instanceof TimeoutError) return 'timeout';
  return 'request_failed';
}

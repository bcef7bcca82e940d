/**
 * AI Mapping Collaborator
 *
 * Asks an external language model for a header → canonical field mapping.
 * Two implementations behind one interface, chosen from configuration:
 * - OpenAiMappingCollaborator: chat completion in JSON mode
 * - DisabledMappingCollaborator: always refuses, so the caller goes straight
 *   to the heuristic strategy
 *
 * Collaborators return the raw response text. Parsing and filtering happen
 * in the suggestion generator, which treats the text as untrusted.
 */

import OpenAI from 'openai';
import { CANONICAL_FIELDS, CANONICAL_FIELD_TYPES, type CanonicalField } from '../../shared/canonicalSchema';
import type { RawRow } from '../../shared/types';
import { isAiConfigured, type AppConfig } from '../config/env';
import { SuggestionGenerationError } from '../lib/errors';

export interface MappingRequest {
  headers: string[];
  sampleRows: RawRow[];
  context?: {
    filename?: string;
    sender?: string | null;
    fileType?: string;
  };
}

export interface AiMappingCollaborator {
  readonly enabled: boolean;
  readonly name: string;
  requestMapping(request: MappingRequest, signal?: AbortSignal): Promise<string>;
}

const FIELD_DESCRIPTIONS: Record<CanonicalField, string> = {
  policy_number: 'Policy number or reference identifier',
  insured_name: 'Name of the insured party or client',
  broker_name: 'Broker or intermediary name',
  product_type: 'Insurance product or line of business',
  coverage_type: 'Type or class of coverage',
  risk_location: 'Risk location or property address',
  inception_date: 'Policy start / inception date',
  expiry_date: 'Policy end / expiry date',
  premium_amount: 'Gross premium amount',
  claim_amount: 'Claim or loss amount',
  commission_amount: 'Commission or brokerage amount',
  net_premium: 'Premium net of deductions',
  currency: 'Currency of the amounts (e.g. USD, EUR, GBP)',
};

const SYSTEM_PROMPT =
  'You map insurance bordereaux column headers to a fixed set of canonical field names. ' +
  'Respond with a single JSON object and nothing else.';

export function buildMappingPrompt(request: MappingRequest): string {
  const fields = CANONICAL_FIELDS.map(
    (field) => `- ${field} (${CANONICAL_FIELD_TYPES[field]}): ${FIELD_DESCRIPTIONS[field]}`
  ).join('\n');
  const headers = request.headers.map((header) => `- ${JSON.stringify(header)}`).join('\n');

  const contextLines: string[] = [];
  if (request.context?.filename) contextLines.push(`Filename: ${request.context.filename}`);
  if (request.context?.sender) contextLines.push(`Sender: ${request.context.sender}`);
  if (request.context?.fileType) contextLines.push(`File type hint: ${request.context.fileType}`);

  const samples = request.sampleRows.length > 0
    ? `\nSample rows:\n${request.sampleRows.map((row) => JSON.stringify(row)).join('\n')}\n`
    : '';

  return `${contextLines.length > 0 ? `${contextLines.join('\n')}\n\n` : ''}File columns:
${headers}
${samples}
Canonical fields:
${fields}

Map each file column that clearly corresponds to a canonical field. Use each canonical field at most once
and each file column at most once. Omit columns with no clear match.

Return exactly:
{
  "mappings": [
    { "canonical_field": "<canonical field>", "raw_header": "<file column, verbatim>", "confidence": <0.0-1.0> }
  ]
}

Only use confidence of 0.8 or more for unambiguous matches.`;
}

// ============================================
// OPENAI IMPLEMENTATION
// ============================================

export interface OpenAiCollaboratorOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
}

export class OpenAiMappingCollaborator implements AiMappingCollaborator {
  readonly enabled = true;
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiCollaboratorOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.model = options.model;
  }

  async requestMapping(request: MappingRequest, signal?: AbortSignal): Promise<string> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildMappingPrompt(request) },
          ],
          temperature: 0.1,
          max_tokens: 2000,
          response_format: { type: 'json_object' },
        },
        { signal }
      );
    } catch (error) {
      throw new SuggestionGenerationError('request_failed', 'AI mapping request failed', error);
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new SuggestionGenerationError('empty_response', 'AI mapping response was empty');
    }
    return content;
  }
}

// ============================================
// DISABLED STUB
// ============================================

export class DisabledMappingCollaborator implements AiMappingCollaborator {
  readonly enabled = false;
  readonly name = 'disabled';

  async requestMapping(): Promise<string> {
    throw new SuggestionGenerationError('disabled', 'AI mapping suggestions are not configured');
  }
}

export function createMappingCollaborator(config: AppConfig): AiMappingCollaborator {
  const apiKey = config.openai.apiKey;
  if (!isAiConfigured(config) || !apiKey) {
    return new DisabledMappingCollaborator();
  }

  return new OpenAiMappingCollaborator({
    apiKey,
    model: config.openai.model,
    baseUrl: config.openai.baseUrl,
    timeoutMs: config.openai.timeoutMs,
  });
}

/**
 * Header normalization shared by the matcher, the mapper and template
 * document validation: lower-case, trimmed, each run of non-alphanumeric
 * characters collapsed to "_", no leading or trailing "_".
 *
 *   " Policy  No. " -> "policy_no"
 */

import { ConfigurationError } from '../lib/errors';

export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '');
}

export function normalizeHeaderSet(headers: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const header of headers) {
    const key = normalizeHeader(header);
    if (key) normalized.add(key);
  }
  return normalized;
}

/**
 * Normalizes the keys of a column mapping. Two raw headers that collapse to
 * the same key, or a key that normalizes to nothing, is a configuration error.
 */
export function normalizeColumnMappings(mappings: Record<string, string>): Record<string, string> {
  const normalized: Record<string, string> = {};

  for (const [rawHeader, canonicalField] of Object.entries(mappings)) {
    const key = normalizeHeader(rawHeader);
    if (!key) {
      throw new ConfigurationError(`Column mapping header '${rawHeader}' is empty after normalization`);
    }
    if (key in normalized) {
      throw new ConfigurationError(`Column mapping headers collide after normalization: '${key}'`, { header: rawHeader });
    }
    normalized[key] = canonicalField;
  }

  return normalized;
}

/**
 * Template Documents
 *
 * One JSON document per template in TEMPLATES_DIR:
 *
 *   {
 *     "template_id": "acme-premium-v1",
 *     "name": "Acme premium bordereau",
 *     "file_type": "premium",
 *     "column_mappings": { "Policy Ref": "policy_number", ... },
 *     "active": true
 *   }
 *
 * Mapping keys are stored normalized; targets must be canonical fields.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { isCanonicalField } from '../../shared/canonicalSchema';
import { FileType, insertTemplateSchema, type InsertTemplate } from '../../shared/schema';
import { ConfigurationError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { normalizeColumnMappings } from '../services/headerNormalization';

const log = createLogger({ module: 'template-documents' });

export const templateDocumentSchema = z.object({
  template_id: z.string().min(1),
  name: z.string().min(1),
  carrier: z.string().min(1).optional(),
  file_type: z.nativeEnum(FileType).default(FileType.UNKNOWN),
  column_mappings: z
    .record(z.string(), z.string())
    .refine((mappings) => Object.keys(mappings).length > 0, { message: 'At least one column mapping is required' }),
  active: z.boolean().default(true),
});

export type TemplateDocument = z.input<typeof templateDocumentSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validates a template before it is stored, whichever way it arrived
 * (document, proposal approval). Returns it with normalized mapping keys.
 */
export function prepareTemplate(template: InsertTemplate): InsertTemplate {
  const unknownTargets = Object.values(template.columnMappings).filter((target) => !isCanonicalField(target));
  if (unknownTargets.length > 0) {
    throw new ConfigurationError(
      `Template ${template.templateId} maps to unknown canonical fields: ${unknownTargets.join(', ')}`,
      { templateId: template.templateId, unknownTargets }
    );
  }

  const candidate = { ...template, columnMappings: normalizeColumnMappings(template.columnMappings) };
  const parsed = insertTemplateSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid template ${template.templateId}: ${formatIssues(parsed.error).join('; ')}`, {
      templateId: template.templateId,
    });
  }
  return parsed.data;
}

export function compileTemplateDocument(document: unknown, source = 'template document'): InsertTemplate {
  const parsed = templateDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatIssues(parsed.error).join('; ')}`, { source });
  }

  const doc = parsed.data;
  return prepareTemplate({
    templateId: doc.template_id,
    name: doc.name,
    carrier: doc.carrier ?? null,
    fileType: doc.file_type,
    columnMappings: doc.column_mappings,
    active: doc.active,
  });
}

/**
 * Reads every *.json document in a directory, in filename order. A missing
 * directory yields no templates.
 */
export async function loadTemplateDocuments(directory: string): Promise<InsertTemplate[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.warn({ directory }, 'Template directory not found');
      return [];
    }
    throw new ConfigurationError(`Could not read template directory ${directory}`, { directory });
  }

  const templates: InsertTemplate[] = [];
  const seen = new Set<string>();

  for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
    const filePath = path.join(directory, entry);
    const text = await fs.readFile(filePath, 'utf-8');

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch {
      throw new ConfigurationError(`Template document ${filePath} is not valid JSON`, { filePath });
    }

    const template = compileTemplateDocument(document, `template document ${entry}`);
    if (seen.has(template.templateId)) {
      throw new ConfigurationError(`Duplicate template_id '${template.templateId}' in ${filePath}`, { filePath });
    }
    seen.add(template.templateId);
    templates.push(template);
  }

  log.info({ directory, count: templates.length }, 'Template documents loaded');
  return templates;
}

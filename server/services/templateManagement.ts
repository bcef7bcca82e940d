/**
 * Template lifecycle after creation.
 *
 * A stored template never changes its mappings: files already matched to
 * it keep pointing at what they were processed with. Changing mappings
 * means revising, which stores a new generation and retires the old one.
 */

import type { FileType, Template } from '../../shared/schema';
import { prepareTemplate } from '../config/templateDocuments';
import { ConfigurationError, ConflictError, NotFoundError } from '../lib/errors';
import { loggers } from '../lib/logger';
import type { TemplateRepository } from '../storage';

const log = loggers.api.child({ component: 'template-management' });

export interface RevisionInput {
  /** defaults to the next generation id */
  templateId?: string;
  name?: string;
  carrier?: string | null;
  fileType?: FileType;
  columnMappings: Record<string, string>;
}

const GENERATION_SUFFIX = /^(.+)-v(\d+)$/;

/** acme-premium-v1 → acme-premium-v2; an id without a generation gets -v2 */
export function nextGenerationId(templateId: string): string {
  const match = GENERATION_SUFFIX.exec(templateId);
  return match ? `${match[1]}-v${Number(match[2]) + 1}` : `${templateId}-v2`;
}

export async function reviseTemplate(
  templates: TemplateRepository,
  templateId: string,
  input: RevisionInput
): Promise<Template> {
  const current = await templates.getTemplate(templateId);
  if (!current) {
    throw new NotFoundError('Template', templateId);
  }
  if (!current.active) {
    throw new ConflictError(`Template ${templateId} is inactive and cannot be revised`, { templateId });
  }

  if (Object.keys(input.columnMappings).length === 0) {
    throw new ConfigurationError('At least one column mapping is required');
  }

  const nextId = input.templateId ?? nextGenerationId(templateId);
  if (await templates.getTemplate(nextId)) {
    throw new ConflictError(`Template with ID '${nextId}' already exists`, { templateId: nextId });
  }

  const next = prepareTemplate({
    templateId: nextId,
    name: input.name ?? current.name,
    carrier: input.carrier === undefined ? current.carrier : input.carrier,
    fileType: input.fileType ?? current.fileType,
    columnMappings: input.columnMappings,
    active: true,
  });

  const created = await templates.reviseTemplate(templateId, next);
  if (!created) {
    throw new ConflictError(`Template ${templateId} was revised or deactivated concurrently`, { templateId });
  }

  log.info(
    { templateId: created.templateId, supersedes: templateId, mappingCount: Object.keys(created.columnMappings).length },
    'Template revised'
  );
  return created;
}

export async function setTemplateActive(templates: TemplateRepository, templateId: string, active: boolean): Promise<Template> {
  const updated = await templates.setActive(templateId, active);
  if (!updated) {
    throw new NotFoundError('Template', templateId);
  }

  log.info({ templateId, active }, active ? 'Template activated' : 'Template deactivated');
  return updated;
}

/**
 * Mapping Proposal Review
 *
 * Human approval turns a pending proposal into a new active template;
 * rejection just closes it. Nothing else ever creates a template from a
 * proposal.
 */

import { isCanonicalField, type CanonicalField } from '../../shared/canonicalSchema';
import { FileType, ReviewStatus, type MappingProposalRecord, type Template } from '../../shared/schema';
import { prepareTemplate } from '../config/templateDocuments';
import { ConfigurationError, ConflictError, NotFoundError } from '../lib/errors';
import { loggers } from '../lib/logger';
import type { PipelineStorage } from '../storage';

const log = loggers.api.child({ component: 'proposal-review' });

export interface ApprovalInput {
  templateId: string;
  name: string;
  carrier?: string | null;
  /** defaults to the file's type */
  fileType?: FileType;
  /** canonical field -> raw header, or null to leave the field unmapped */
  overrides?: Readonly<Record<string, string | null>>;
  reviewedBy?: string | null;
}

export interface ApprovalResult {
  proposal: MappingProposalRecord;
  template: Template;
}

type ReviewStorage = Pick<PipelineStorage, 'files' | 'templates' | 'proposals'>;

async function getPendingProposal(storage: ReviewStorage, proposalId: string): Promise<MappingProposalRecord> {
  const proposal = await storage.proposals.getProposal(proposalId);
  if (!proposal) {
    throw new NotFoundError('Mapping proposal', proposalId);
  }
  if (proposal.reviewStatus !== ReviewStatus.PENDING) {
    throw new ConflictError(`Mapping proposal ${proposalId} is already ${proposal.reviewStatus}`, {
      proposalId,
      reviewStatus: proposal.reviewStatus,
    });
  }
  return proposal;
}

/**
 * raw header -> canonical field, from the proposal's mapped fields with the
 * reviewer's overrides applied on top.
 */
export function buildColumnMappings(
  proposal: Pick<MappingProposalRecord, 'fields'>,
  overrides: Readonly<Record<string, string | null>> = {}
): Record<string, string> {
  const byField = new Map<CanonicalField, string>();
  for (const mapping of proposal.fields) {
    if (mapping.rawHeader !== null) byField.set(mapping.canonicalField, mapping.rawHeader);
  }

  for (const [field, header] of Object.entries(overrides)) {
    if (!isCanonicalField(field)) {
      throw new ConfigurationError(`Unknown canonical field '${field}'`);
    }
    if (header === null || header.trim() === '') {
      byField.delete(field);
      continue;
    }
    // a header reassigned to another field leaves its previous field unmapped
    for (const [other, otherHeader] of byField) {
      if (otherHeader === header) byField.delete(other);
    }
    byField.set(field, header);
  }

  const mappings: Record<string, string> = {};
  for (const [field, header] of byField) {
    mappings[header] = field;
  }
  return mappings;
}

export async function approveProposal(
  storage: ReviewStorage,
  proposalId: string,
  input: ApprovalInput
): Promise<ApprovalResult> {
  const proposal = await getPendingProposal(storage, proposalId);

  if (await storage.templates.getTemplate(input.templateId)) {
    throw new ConflictError(`Template with ID '${input.templateId}' already exists`, { templateId: input.templateId });
  }

  const columnMappings = buildColumnMappings(proposal, input.overrides);
  if (Object.keys(columnMappings).length === 0) {
    throw new ConfigurationError('At least one column mapping is required');
  }

  const file = await storage.files.getFile(proposal.fileId);
  const template = await storage.templates.createTemplate(
    prepareTemplate({
      templateId: input.templateId,
      name: input.name,
      carrier: input.carrier ?? null,
      fileType: input.fileType ?? file?.fileType ?? FileType.UNKNOWN,
      columnMappings,
      active: true,
      sourceProposalId: proposal.id,
    })
  );

  const reviewed = await storage.proposals.markReviewed(proposal.id, {
    reviewStatus: ReviewStatus.APPROVED,
    reviewedBy: input.reviewedBy,
    createdTemplateId: template.templateId,
  });
  if (!reviewed) {
    // a concurrent review won; the template stays, the proposal keeps the other outcome
    throw new ConflictError(`Mapping proposal ${proposalId} was reviewed concurrently`, {
      proposalId,
      templateId: template.templateId,
    });
  }

  log.info(
    {
      proposalId,
      fileId: proposal.fileId,
      templateId: template.templateId,
      mappingCount: Object.keys(template.columnMappings).length,
    },
    'Template created from mapping proposal'
  );
  return { proposal: reviewed, template };
}

export async function rejectProposal(
  storage: ReviewStorage,
  proposalId: string,
  reviewedBy?: string | null
): Promise<MappingProposalRecord> {
  await getPendingProposal(storage, proposalId);

  const reviewed = await storage.proposals.markReviewed(proposalId, {
    reviewStatus: ReviewStatus.REJECTED,
    reviewedBy,
  });
  if (!reviewed) {
    throw new ConflictError(`Mapping proposal ${proposalId} was reviewed concurrently`, { proposalId });
  }

  log.info({ proposalId, fileId: reviewed.fileId }, 'Mapping proposal rejected');
  return reviewed;
}

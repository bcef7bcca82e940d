import { and, count, desc, eq, gte, inArray, lte, type SQL } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import {
  bordereauxFiles,
  canonicalRows,
  FileStatus,
  mappingProposals,
  ReviewStatus,
  Severity,
  templates,
  validationErrors,
  type BordereauxFile,
  type FileType,
  type InsertBordereauxFile,
  type InsertTemplate,
  type MappingProposalRecord,
  type Template,
  type ValidationErrorRecord,
} from "../shared/schema";
import { TERMINAL_STATUSES, transition } from "../shared/fileStatus";
import type { CanonicalRow, MappingProposal, ValidationViolation } from "../shared/types";
import { FileClaimError, PersistenceError } from "./lib/errors";

/**
 * Repository interfaces for the pipeline, and their PostgreSQL
 * implementation. Services depend on the interfaces only; tests supply
 * in-memory implementations.
 */

// ============================================
// SHARED SHAPES
// ============================================

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export interface FileListFilters extends PageRequest {
  status?: FileStatus;
  sender?: string;
  createdFrom?: Date;
  createdTo?: Date;
}

export type NewFile = Pick<InsertBordereauxFile, "filename" | "sender" | "subject" | "contentHash" | "fileType" | "format">;

export interface FileStatusPatch {
  templateId?: string | null;
  matchScore?: number | null;
  errorMessage?: string | null;
  totalRows?: number;
}

export type PersistedStatus = FileStatus.PROCESSED | FileStatus.PARTIALLY_PROCESSED | FileStatus.FAILED;

export interface PersistableResult {
  status: PersistedStatus;
  /** valid rows only */
  rows: CanonicalRow[];
  /** every violation of the run, in (row, rule) order */
  violations: ValidationViolation[];
  totalRows: number;
  validRows: number;
  errorRows: number;
  errorMessage: string | null;
}

export interface ProposalListFilters extends PageRequest {
  fileId?: string;
  reviewStatus?: ReviewStatus;
}

export interface ReviewOutcome {
  reviewStatus: ReviewStatus.APPROVED | ReviewStatus.REJECTED;
  reviewedBy?: string | null;
  createdTemplateId?: string | null;
}

// ============================================
// REPOSITORY INTERFACES
// ============================================

export interface FileRepository {
  createFile(file: NewFile): Promise<BordereauxFile>;
  getFile(id: string): Promise<BordereauxFile | undefined>;
  findByContentHash(contentHash: string): Promise<BordereauxFile | undefined>;
  listFiles(filters: FileListFilters): Promise<Page<BordereauxFile>>;
  listFileIdsByStatus(status: FileStatus, limit?: number): Promise<string[]>;
  /** RECEIVED → MATCHING as a conditional write. Exactly one concurrent caller gets true. */
  claimForProcessing(id: string): Promise<boolean>;
  /** Conditional on the current status being `from`; false when it was not. */
  updateStatus(id: string, from: FileStatus, to: FileStatus, patch?: FileStatusPatch): Promise<boolean>;
  /** Terminal → RECEIVED, clearing counters and superseding prior results. False when not terminal. */
  resetForReprocessing(id: string): Promise<boolean>;
  /**
   * Removes a file that is RECEIVED or terminal, together with its rows,
   * errors and proposals. Undefined when the file is missing or in flight.
   */
  deleteFile(id: string): Promise<BordereauxFile | undefined>;
}

export interface ResultStore {
  /**
   * One transaction: replaces the file's rows and errors, then writes the
   * counters together with the terminal status. Requires status PERSISTING.
   */
  persistResults(fileId: string, result: PersistableResult): Promise<void>;
  listValidationErrors(fileId: string, page: PageRequest): Promise<Page<ValidationErrorRecord>>;
  countViolationsBySeverity(fileId: string): Promise<Record<Severity, number>>;
}

export interface TemplateRepository {
  listActive(fileType?: FileType | null): Promise<Template[]>;
  listAll(): Promise<Template[]>;
  getTemplate(templateId: string): Promise<Template | undefined>;
  createTemplate(template: InsertTemplate): Promise<Template>;
  setActive(templateId: string, active: boolean): Promise<Template | undefined>;
  /**
   * One transaction: retires `previousId` and stores `next` as its
   * successor. Undefined when `previousId` was not active.
   */
  reviseTemplate(previousId: string, next: InsertTemplate): Promise<Template | undefined>;
}

export interface ProposalRepository {
  createProposal(proposal: MappingProposal): Promise<MappingProposalRecord>;
  getProposal(id: string): Promise<MappingProposalRecord | undefined>;
  listProposals(filters: ProposalListFilters): Promise<Page<MappingProposalRecord>>;
  latestForFile(fileId: string): Promise<MappingProposalRecord | undefined>;
  /** Conditional on the proposal still being pending. */
  markReviewed(id: string, outcome: ReviewOutcome): Promise<MappingProposalRecord | undefined>;
}

export interface PipelineStorage {
  files: FileRepository;
  results: ResultStore;
  templates: TemplateRepository;
  proposals: ProposalRepository;
}

// ============================================
// POSTGRES IMPLEMENTATION
// ============================================

const INSERT_CHUNK_SIZE = 500;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class DrizzleStorage implements FileRepository, ResultStore, TemplateRepository, ProposalRepository, PipelineStorage {
  readonly files: FileRepository = this;
  readonly results: ResultStore = this;
  readonly templates: TemplateRepository = this;
  readonly proposals: ProposalRepository = this;

  constructor(private readonly db: NodePgDatabase) {}

  // ---- files ----

  async createFile(file: NewFile): Promise<BordereauxFile> {
    const [created] = await this.db
      .insert(bordereauxFiles)
      .values({ ...file, status: FileStatus.RECEIVED })
      .returning();
    if (!created) {
      throw new PersistenceError(`Failed to create file record for ${file.filename}`);
    }
    return created;
  }

  async getFile(id: string): Promise<BordereauxFile | undefined> {
    const [file] = await this.db.select().from(bordereauxFiles).where(eq(bordereauxFiles.id, id)).limit(1);
    return file;
  }

  async findByContentHash(contentHash: string): Promise<BordereauxFile | undefined> {
    const [file] = await this.db
      .select()
      .from(bordereauxFiles)
      .where(eq(bordereauxFiles.contentHash, contentHash))
      .limit(1);
    return file;
  }

  async listFiles(filters: FileListFilters): Promise<Page<BordereauxFile>> {
    const conditions: SQL[] = [];
    if (filters.status) conditions.push(eq(bordereauxFiles.status, filters.status));
    if (filters.sender) conditions.push(eq(bordereauxFiles.sender, filters.sender));
    if (filters.createdFrom) conditions.push(gte(bordereauxFiles.createdAt, filters.createdFrom));
    if (filters.createdTo) conditions.push(lte(bordereauxFiles.createdAt, filters.createdTo));
    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const items = await this.db
      .select()
      .from(bordereauxFiles)
      .where(where)
      .orderBy(desc(bordereauxFiles.createdAt))
      .limit(filters.limit)
      .offset(filters.offset);
    const [{ total }] = await this.db.select({ total: count() }).from(bordereauxFiles).where(where);

    return { items, total, limit: filters.limit, offset: filters.offset };
  }

  async listFileIdsByStatus(status: FileStatus, limit: number = 100): Promise<string[]> {
    const rows = await this.db
      .select({ id: bordereauxFiles.id })
      .from(bordereauxFiles)
      .where(eq(bordereauxFiles.status, status))
      .orderBy(bordereauxFiles.createdAt)
      .limit(limit);
    return rows.map((row) => row.id);
  }

  async claimForProcessing(id: string): Promise<boolean> {
    const now = new Date();
    const claimed = await this.db
      .update(bordereauxFiles)
      .set({
        status: transition(FileStatus.RECEIVED, FileStatus.MATCHING),
        processingStartedAt: now,
        updatedAt: now,
      })
      .where(and(eq(bordereauxFiles.id, id), eq(bordereauxFiles.status, FileStatus.RECEIVED)))
      .returning({ id: bordereauxFiles.id });
    return claimed.length === 1;
  }

  async updateStatus(id: string, from: FileStatus, to: FileStatus, patch: FileStatusPatch = {}): Promise<boolean> {
    const now = new Date();
    const updated = await this.db
      .update(bordereauxFiles)
      .set({
        ...patch,
        status: transition(from, to),
        updatedAt: now,
        ...(to === FileStatus.FAILED || to === FileStatus.NEEDS_TEMPLATE ? { processedAt: now } : {}),
      })
      .where(and(eq(bordereauxFiles.id, id), eq(bordereauxFiles.status, from)))
      .returning({ id: bordereauxFiles.id });
    return updated.length === 1;
  }

  async resetForReprocessing(id: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const reset = await tx
        .update(bordereauxFiles)
        .set({
          status: FileStatus.RECEIVED,
          templateId: null,
          matchScore: null,
          errorMessage: null,
          totalRows: 0,
          validRows: 0,
          errorRows: 0,
          processingStartedAt: null,
          processedAt: null,
          updatedAt: new Date(),
        })
        .where(and(eq(bordereauxFiles.id, id), inArray(bordereauxFiles.status, [...TERMINAL_STATUSES])))
        .returning({ id: bordereauxFiles.id });

      if (reset.length === 0) return false;

      await tx.delete(canonicalRows).where(eq(canonicalRows.fileId, id));
      await tx.delete(validationErrors).where(eq(validationErrors.fileId, id));
      return true;
    });
  }

  async deleteFile(id: string): Promise<BordereauxFile | undefined> {
    // rows, errors and proposals go with it (on delete cascade)
    const [deleted] = await this.db
      .delete(bordereauxFiles)
      .where(and(eq(bordereauxFiles.id, id), inArray(bordereauxFiles.status, [FileStatus.RECEIVED, ...TERMINAL_STATUSES])))
      .returning();
    return deleted;
  }

  // ---- results ----

  async persistResults(fileId: string, result: PersistableResult): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        const now = new Date();
        const updated = await tx
          .update(bordereauxFiles)
          .set({
            status: transition(FileStatus.PERSISTING, result.status),
            totalRows: result.totalRows,
            validRows: result.validRows,
            errorRows: result.errorRows,
            errorMessage: result.errorMessage,
            processedAt: now,
            updatedAt: now,
          })
          .where(and(eq(bordereauxFiles.id, fileId), eq(bordereauxFiles.status, FileStatus.PERSISTING)))
          .returning({ id: bordereauxFiles.id });

        if (updated.length === 0) {
          throw new FileClaimError(fileId, FileStatus.PERSISTING);
        }

        await tx.delete(canonicalRows).where(eq(canonicalRows.fileId, fileId));
        await tx.delete(validationErrors).where(eq(validationErrors.fileId, fileId));

        for (const rows of chunk(result.rows, INSERT_CHUNK_SIZE)) {
          await tx.insert(canonicalRows).values(
            rows.map((row) => ({
              fileId,
              rowIndex: row.rowIndex,
              data: row.values,
              rawData: row.rawData,
              conversionNotes: row.conversionNotes,
            }))
          );
        }

        const ordered = result.violations.map((violation, ordinal) => ({ violation, ordinal }));
        for (const batch of chunk(ordered, INSERT_CHUNK_SIZE)) {
          await tx.insert(validationErrors).values(
            batch.map(({ violation, ordinal }) => ({
              fileId,
              ordinal,
              rowIndex: violation.rowIndex,
              fieldName: violation.fieldName,
              fieldValue: violation.fieldValue,
              ruleName: violation.ruleName,
              errorCode: violation.errorCode,
              severity: violation.severity,
              message: violation.message,
            }))
          );
        }
      });
    } catch (error) {
      if (error instanceof FileClaimError) throw error;
      throw new PersistenceError(`Failed to persist results for file ${fileId}`, error);
    }
  }

  async listValidationErrors(fileId: string, page: PageRequest): Promise<Page<ValidationErrorRecord>> {
    const items = await this.db
      .select()
      .from(validationErrors)
      .where(eq(validationErrors.fileId, fileId))
      .orderBy(validationErrors.ordinal)
      .limit(page.limit)
      .offset(page.offset);
    const [{ total }] = await this.db
      .select({ total: count() })
      .from(validationErrors)
      .where(eq(validationErrors.fileId, fileId));

    return { items, total, limit: page.limit, offset: page.offset };
  }

  async countViolationsBySeverity(fileId: string): Promise<Record<Severity, number>> {
    const rows = await this.db
      .select({ severity: validationErrors.severity, total: count() })
      .from(validationErrors)
      .where(eq(validationErrors.fileId, fileId))
      .groupBy(validationErrors.severity);

    const counts: Record<Severity, number> = { [Severity.ERROR]: 0, [Severity.WARNING]: 0 };
    for (const row of rows) {
      counts[row.severity] = row.total;
    }
    return counts;
  }

  // ---- templates ----

  async listActive(fileType?: FileType | null): Promise<Template[]> {
    const conditions: SQL[] = [eq(templates.active, true)];
    if (fileType) conditions.push(eq(templates.fileType, fileType));
    return this.db.select().from(templates).where(and(...conditions)).orderBy(templates.templateId);
  }

  async listAll(): Promise<Template[]> {
    return this.db.select().from(templates).orderBy(templates.templateId);
  }

  async getTemplate(templateId: string): Promise<Template | undefined> {
    const [template] = await this.db.select().from(templates).where(eq(templates.templateId, templateId)).limit(1);
    return template;
  }

  async createTemplate(template: InsertTemplate): Promise<Template> {
    const [created] = await this.db.insert(templates).values(template).returning();
    if (!created) {
      throw new PersistenceError(`Failed to create template ${template.templateId}`);
    }
    return created;
  }

  async setActive(templateId: string, active: boolean): Promise<Template | undefined> {
    const [updated] = await this.db
      .update(templates)
      .set({ active })
      .where(eq(templates.templateId, templateId))
      .returning();
    return updated;
  }

  async reviseTemplate(previousId: string, next: InsertTemplate): Promise<Template | undefined> {
    try {
      return await this.db.transaction(async (tx) => {
        const retired = await tx
          .update(templates)
          .set({ active: false })
          .where(and(eq(templates.templateId, previousId), eq(templates.active, true)))
          .returning({ templateId: templates.templateId });
        if (retired.length === 0) return undefined;

        const [created] = await tx
          .insert(templates)
          .values({ ...next, supersedesTemplateId: previousId })
          .returning();
        return created;
      });
    } catch (error) {
      throw new PersistenceError(`Failed to revise template ${previousId}`, error);
    }
  }

  // ---- proposals ----

  async createProposal(proposal: MappingProposal): Promise<MappingProposalRecord> {
    const [created] = await this.db
      .insert(mappingProposals)
      .values({
        fileId: proposal.fileId,
        fields: proposal.fields,
        overallConfidence: proposal.overallConfidence,
        source: proposal.source,
        reviewStatus: proposal.reviewStatus,
      })
      .returning();
    if (!created) {
      throw new PersistenceError(`Failed to store mapping proposal for file ${proposal.fileId}`);
    }
    return created;
  }

  async getProposal(id: string): Promise<MappingProposalRecord | undefined> {
    const [proposal] = await this.db.select().from(mappingProposals).where(eq(mappingProposals.id, id)).limit(1);
    return proposal;
  }

  async listProposals(filters: ProposalListFilters): Promise<Page<MappingProposalRecord>> {
    const conditions: SQL[] = [];
    if (filters.fileId) conditions.push(eq(mappingProposals.fileId, filters.fileId));
    if (filters.reviewStatus) conditions.push(eq(mappingProposals.reviewStatus, filters.reviewStatus));
    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const items = await this.db
      .select()
      .from(mappingProposals)
      .where(where)
      .orderBy(desc(mappingProposals.createdAt))
      .limit(filters.limit)
      .offset(filters.offset);
    const [{ total }] = await this.db.select({ total: count() }).from(mappingProposals).where(where);

    return { items, total, limit: filters.limit, offset: filters.offset };
  }

  async latestForFile(fileId: string): Promise<MappingProposalRecord | undefined> {
    const [proposal] = await this.db
      .select()
      .from(mappingProposals)
      .where(eq(mappingProposals.fileId, fileId))
      .orderBy(desc(mappingProposals.createdAt))
      .limit(1);
    return proposal;
  }

  async markReviewed(id: string, outcome: ReviewOutcome): Promise<MappingProposalRecord | undefined> {
    const [updated] = await this.db
      .update(mappingProposals)
      .set({
        reviewStatus: outcome.reviewStatus,
        reviewedBy: outcome.reviewedBy ?? null,
        reviewedAt: new Date(),
        createdTemplateId: outcome.createdTemplateId ?? null,
      })
      .where(and(eq(mappingProposals.id, id), eq(mappingProposals.reviewStatus, ReviewStatus.PENDING)))
      .returning();
    return updated;
  }
}

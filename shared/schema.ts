import { sql } from "drizzle-orm";
import { pgTable, text, varchar, integer, boolean, timestamp, jsonb, uuid, index, doublePrecision, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import type { CanonicalRecord, ConversionNote, ProposedFieldMapping, ValidationErrorCode } from "./types";

// ============================================
// FILE STATUS ENUM
// ============================================
// Transitions between these values are owned by shared/fileStatus.ts.
// Nothing writes the status column without going through it.

export enum FileStatus {
  RECEIVED = "received",
  MATCHING = "matching",
  MAPPING = "mapping",
  VALIDATING = "validating",
  PERSISTING = "persisting",
  SUGGESTING = "suggesting",
  PROCESSED = "processed",
  PARTIALLY_PROCESSED = "partially_processed",
  NEEDS_TEMPLATE = "needs_template",
  FAILED = "failed",
}

export const FILE_STATUS_LABELS: Record<FileStatus, string> = {
  [FileStatus.RECEIVED]: "Received",
  [FileStatus.MATCHING]: "Matching template",
  [FileStatus.MAPPING]: "Mapping columns",
  [FileStatus.VALIDATING]: "Validating rows",
  [FileStatus.PERSISTING]: "Persisting results",
  [FileStatus.SUGGESTING]: "Suggesting mapping",
  [FileStatus.PROCESSED]: "Processed",
  [FileStatus.PARTIALLY_PROCESSED]: "Partially processed",
  [FileStatus.NEEDS_TEMPLATE]: "Needs template",
  [FileStatus.FAILED]: "Failed",
};

// ============================================
// FILE TYPE / FORMAT / SEVERITY / REVIEW ENUMS
// ============================================

export enum FileType {
  CLAIMS = "claims",
  PREMIUM = "premium",
  EXPOSURE = "exposure",
  UNKNOWN = "unknown",
}

export enum FileFormat {
  CSV = "csv",
  TSV = "tsv",
  XLSX = "xlsx",
}

export enum Severity {
  ERROR = "error",
  WARNING = "warning",
}

export enum ProposalSource {
  AI = "ai",
  HEURISTIC = "heuristic",
}

export enum ReviewStatus {
  PENDING = "pending",
  APPROVED = "approved",
  REJECTED = "rejected",
}

// ============================================
// BORDEREAUX FILES TABLE
// ============================================

export const bordereauxFiles = pgTable("bordereaux_files", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),

  // Source
  filename: varchar("filename", { length: 255 }).notNull(),
  sender: varchar("sender", { length: 255 }),
  subject: text("subject"),
  contentHash: varchar("content_hash", { length: 64 }).notNull(),
  fileType: varchar("file_type", { length: 20 }).$type<FileType>().notNull().default(FileType.UNKNOWN),
  format: varchar("format", { length: 10 }).$type<FileFormat>().notNull().default(FileFormat.CSV),

  // Pipeline progress
  status: varchar("status", { length: 30 }).$type<FileStatus>().notNull().default(FileStatus.RECEIVED),
  templateId: varchar("template_id", { length: 100 }),
  matchScore: doublePrecision("match_score"),
  errorMessage: text("error_message"),

  // Counters, written together with the terminal status
  totalRows: integer("total_rows").notNull().default(0),
  validRows: integer("valid_rows").notNull().default(0),
  errorRows: integer("error_rows").notNull().default(0),

  // Timestamps
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
  processingStartedAt: timestamp("processing_started_at"),
  processedAt: timestamp("processed_at"),
  updatedAt: timestamp("updated_at").notNull().default(sql`now()`),
}, (table) => ({
  statusIdx: index("bordereaux_files_status_idx").on(table.status),
  senderIdx: index("bordereaux_files_sender_idx").on(table.sender),
  contentHashIdx: uniqueIndex("bordereaux_files_content_hash_idx").on(table.contentHash),
  createdAtIdx: index("bordereaux_files_created_at_idx").on(table.createdAt),
}));

export const insertBordereauxFileSchema = createInsertSchema(bordereauxFiles, {
  fileType: z.nativeEnum(FileType),
  format: z.nativeEnum(FileFormat),
  status: z.nativeEnum(FileStatus),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export type InsertBordereauxFile = z.infer<typeof insertBordereauxFileSchema>;
export type BordereauxFile = typeof bordereauxFiles.$inferSelect;

// ============================================
// TEMPLATES TABLE
// ============================================
// column_mappings: normalized raw header -> canonical field name.

export const templates = pgTable("templates", {
  templateId: varchar("template_id", { length: 100 }).primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  carrier: varchar("carrier", { length: 255 }),
  fileType: varchar("file_type", { length: 20 }).$type<FileType>().notNull().default(FileType.UNKNOWN),
  columnMappings: jsonb("column_mappings").$type<Record<string, string>>().notNull(),
  active: boolean("active").notNull().default(true),
  sourceProposalId: uuid("source_proposal_id"),
  // previous generation; set when this template was created by revising it
  supersedesTemplateId: varchar("supersedes_template_id", { length: 100 }),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
}, (table) => ({
  fileTypeIdx: index("templates_file_type_idx").on(table.fileType),
  activeIdx: index("templates_active_idx").on(table.active),
}));

export const insertTemplateSchema = createInsertSchema(templates, {
  templateId: z.string().min(1).max(100).regex(/^[a-z0-9][a-z0-9_-]*$/, "lowercase letters, digits, '-' and '_' only"),
  fileType: z.nativeEnum(FileType),
  columnMappings: z.record(z.string(), z.string()),
}).omit({
  createdAt: true,
});

export type InsertTemplate = z.infer<typeof insertTemplateSchema>;
export type Template = typeof templates.$inferSelect;

// ============================================
// CANONICAL ROWS TABLE
// ============================================
// Only valid rows are stored here.

export const canonicalRows = pgTable("canonical_rows", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  fileId: uuid("file_id").notNull().references(() => bordereauxFiles.id, { onDelete: "cascade" }),
  rowIndex: integer("row_index").notNull(),
  data: jsonb("data").$type<CanonicalRecord>().notNull(),
  rawData: jsonb("raw_data").$type<Record<string, string>>().notNull(),
  conversionNotes: jsonb("conversion_notes").$type<ConversionNote[]>().notNull().default(sql`'[]'::jsonb`),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
}, (table) => ({
  fileRowIdx: uniqueIndex("canonical_rows_file_row_idx").on(table.fileId, table.rowIndex),
}));

export type CanonicalRowRecord = typeof canonicalRows.$inferSelect;

// ============================================
// VALIDATION ERRORS TABLE
// ============================================
// Append-only. ordinal preserves (row, rule) order of the run that produced them.

export const validationErrors = pgTable("validation_errors", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  fileId: uuid("file_id").notNull().references(() => bordereauxFiles.id, { onDelete: "cascade" }),
  ordinal: integer("ordinal").notNull(),
  rowIndex: integer("row_index").notNull(),
  fieldName: varchar("field_name", { length: 100 }),
  ruleName: varchar("rule_name", { length: 100 }).notNull(),
  errorCode: varchar("error_code", { length: 50 }).$type<ValidationErrorCode>().notNull(),
  fieldValue: text("field_value"),
  severity: varchar("severity", { length: 10 }).$type<Severity>().notNull(),
  message: text("message").notNull(),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
}, (table) => ({
  fileOrdinalIdx: index("validation_errors_file_ordinal_idx").on(table.fileId, table.ordinal),
}));

export type ValidationErrorRecord = typeof validationErrors.$inferSelect;

// ============================================
// MAPPING PROPOSALS TABLE
// ============================================

export const mappingProposals = pgTable("mapping_proposals", {
  id: uuid("id").primaryKey().default(sql`gen_random_uuid()`),
  fileId: uuid("file_id").notNull().references(() => bordereauxFiles.id, { onDelete: "cascade" }),
  fields: jsonb("fields").$type<ProposedFieldMapping[]>().notNull(),
  overallConfidence: doublePrecision("overall_confidence").notNull(),
  source: varchar("source", { length: 20 }).$type<ProposalSource>().notNull(),
  reviewStatus: varchar("review_status", { length: 20 }).$type<ReviewStatus>().notNull().default(ReviewStatus.PENDING),
  reviewedBy: varchar("reviewed_by", { length: 255 }),
  reviewedAt: timestamp("reviewed_at"),
  createdTemplateId: varchar("created_template_id", { length: 100 }),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
}, (table) => ({
  fileIdx: index("mapping_proposals_file_idx").on(table.fileId),
  reviewStatusIdx: index("mapping_proposals_review_status_idx").on(table.reviewStatus),
}));

export type MappingProposalRecord = typeof mappingProposals.$inferSelect;

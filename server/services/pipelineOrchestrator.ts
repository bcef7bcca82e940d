/**
 * Pipeline Orchestrator
 *
 * Drives one file through the stages and owns its status:
 *
 *   claim (RECEIVED → MATCHING) → decode → match
 *     match:    MAPPING → VALIDATING → PERSISTING → PROCESSED | PARTIALLY_PROCESSED | FAILED
 *     no match: SUGGESTING → NEEDS_TEMPLATE
 *
 * Every status write is conditional on the status this run last wrote, so
 * a concurrent run or an operator reset is detected instead of overwritten.
 * Row problems are data (conversion notes, violations); anything thrown is a
 * file-level failure that moves the file to FAILED and never escapes to the
 * batch.
 *
 * A file whose rows are all invalid, or that has no data rows, ends in
 * FAILED with its counters and violations still persisted.
 */

import type pino from 'pino';
import { FileStatus, type BordereauxFile } from '../../shared/schema';
import { isTerminalStatus, reprocessTransition } from '../../shared/fileStatus';
import type { DecodedTable } from '../../shared/types';
import { FileClaimError, NotFoundError, PipelineError, toFailureMessage } from '../lib/errors';
import { loggers, logError, logTiming } from '../lib/logger';
import type { PersistedStatus, PipelineStorage } from '../storage';
import type { BlobStore } from './blobStore';
import { mapRows } from './columnMapper';
import type { Decoder } from './csvDecoder';
import type { MappingSuggestionGenerator } from './mappingSuggestion';
import { DEFAULT_MATCH_THRESHOLD, matchTemplate } from './templateMatcher';
import { validateRows, type RuleSet } from './validationEngine';

export interface PipelineContext {
  storage: PipelineStorage;
  blobs: BlobStore;
  decoder: Decoder;
  suggestions: MappingSuggestionGenerator;
  rules: RuleSet;
  matchThreshold?: number;
  logger?: pino.Logger;
}

export interface FileRunResult {
  fileId: string;
  /** false when another run had already claimed the file */
  claimed: boolean;
  /** final status written by this run; null when skipped */
  status: FileStatus | null;
  templateId?: string;
  matchScore?: number;
  proposalId?: string;
  totalRows?: number;
  validRows?: number;
  errorRows?: number;
  error?: string;
}

export interface BatchRunResult {
  processedCount: number;
  successCount: number;
  failedCount: number;
  needsTemplateCount: number;
  skippedCount: number;
  results: FileRunResult[];
}

export interface BatchOptions {
  /** upper bound on files picked up in one run */
  limit?: number;
}

// ============================================
// SINGLE FILE RUN
// ============================================

/**
 * Tracks the status this run last wrote and refuses to write past a status
 * somebody else changed.
 */
class StatusCursor {
  current: FileStatus = FileStatus.MATCHING;

  constructor(
    private readonly ctx: PipelineContext,
    private readonly fileId: string,
    private readonly log: pino.Logger
  ) {}

  async advance(to: FileStatus, patch?: Parameters<PipelineStorage['files']['updateStatus']>[3]): Promise<void> {
    const from = this.current;
    const updated = await this.ctx.storage.files.updateStatus(this.fileId, from, to, patch);
    if (!updated) {
      throw new FileClaimError(this.fileId, from);
    }
    this.current = to;
    this.log.info({ fileId: this.fileId, from, to }, 'File status changed');
  }

  /** Records a status written by another component (persistResults). */
  moved(to: FileStatus): void {
    this.log.info({ fileId: this.fileId, from: this.current, to }, 'File status changed');
    this.current = to;
  }
}

function decideOutcome(totalRows: number, validRows: number): { status: PersistedStatus; errorMessage: string | null } {
  if (totalRows === 0) {
    return { status: FileStatus.FAILED, errorMessage: 'File contains no data rows' };
  }
  if (validRows === 0) {
    return { status: FileStatus.FAILED, errorMessage: `No valid rows: all ${totalRows} rows failed validation` };
  }
  if (validRows === totalRows) {
    return { status: FileStatus.PROCESSED, errorMessage: null };
  }
  return { status: FileStatus.PARTIALLY_PROCESSED, errorMessage: null };
}

async function loadTable(ctx: PipelineContext, file: BordereauxFile): Promise<DecodedTable> {
  const bytes = await ctx.blobs.fetch(file.contentHash);
  return ctx.decoder.decode(bytes, file.format);
}

async function runClaimedFile(
  ctx: PipelineContext,
  file: BordereauxFile,
  cursor: StatusCursor,
  log: pino.Logger
): Promise<FileRunResult> {
  const table = await loadTable(ctx, file);
  const catalog = await ctx.storage.templates.listActive();
  const { match, bestScore, candidatesConsidered } = matchTemplate(table.headers, catalog, {
    threshold: ctx.matchThreshold ?? DEFAULT_MATCH_THRESHOLD,
    fileType: file.fileType,
  });

  log.info(
    {
      fileId: file.id,
      headerCount: table.headers.length,
      rowCount: table.rows.length,
      candidatesConsidered,
      bestScore,
      templateId: match?.template.templateId ?? null,
    },
    match ? 'Template matched' : 'No template matched'
  );

  if (!match) {
    await cursor.advance(FileStatus.SUGGESTING, { matchScore: bestScore, totalRows: table.rows.length });

    const proposal = await ctx.suggestions.generate({
      fileId: file.id,
      headers: table.headers,
      rows: table.rows,
      filename: file.filename,
      sender: file.sender,
      fileType: file.fileType,
    });
    const stored = await ctx.storage.proposals.createProposal(proposal);
    log.info(
      { fileId: file.id, proposalId: stored.id, source: proposal.source, overallConfidence: proposal.overallConfidence },
      'Mapping proposal stored for review'
    );

    await cursor.advance(FileStatus.NEEDS_TEMPLATE);
    return {
      fileId: file.id,
      claimed: true,
      status: FileStatus.NEEDS_TEMPLATE,
      matchScore: bestScore,
      proposalId: stored.id,
      totalRows: table.rows.length,
    };
  }

  const { template, score } = match;
  await cursor.advance(FileStatus.MAPPING, {
    templateId: template.templateId,
    matchScore: score,
    totalRows: table.rows.length,
  });
  const mapped = mapRows(file.id, template, table.rows);

  await cursor.advance(FileStatus.VALIDATING);
  const summary = validateRows(mapped, ctx.rules);

  await cursor.advance(FileStatus.PERSISTING);
  const totalRows = summary.rows.length;
  const { status, errorMessage } = decideOutcome(totalRows, summary.validCount);

  await ctx.storage.results.persistResults(file.id, {
    status,
    rows: summary.rows.filter((row) => row.isValid),
    violations: summary.violations,
    totalRows,
    validRows: summary.validCount,
    errorRows: summary.invalidCount,
    errorMessage,
  });
  cursor.moved(status);

  return {
    fileId: file.id,
    claimed: true,
    status,
    templateId: template.templateId,
    matchScore: score,
    totalRows,
    validRows: summary.validCount,
    errorRows: summary.invalidCount,
    ...(errorMessage ? { error: errorMessage } : {}),
  };
}

/**
 * Claims and runs one RECEIVED file. Never rejects for file-level problems:
 * those end in FAILED and are reported in the result.
 */
export async function processFile(ctx: PipelineContext, fileId: string): Promise<FileRunResult> {
  const log = ctx.logger ?? loggers.pipeline;
  const startTime = Date.now();

  const claimed = await ctx.storage.files.claimForProcessing(fileId);
  if (!claimed) {
    log.debug({ fileId }, 'File already claimed or not in received status, skipping');
    return { fileId, claimed: false, status: null };
  }
  log.info({ fileId, from: FileStatus.RECEIVED, to: FileStatus.MATCHING }, 'File status changed');

  const cursor = new StatusCursor(ctx, fileId, log);
  try {
    const file = await ctx.storage.files.getFile(fileId);
    if (!file) {
      throw new PipelineError(`File ${fileId} disappeared after it was claimed`);
    }

    const result = await runClaimedFile(ctx, file, cursor, log);
    logTiming(log, 'processFile', startTime, { fileId, status: result.status });
    return result;
  } catch (error) {
    const message = toFailureMessage(error);
    logError(log, error, 'File processing failed', { fileId, stage: cursor.current });

    if (!isTerminalStatus(cursor.current)) {
      try {
        await cursor.advance(FileStatus.FAILED, { errorMessage: message });
      } catch (markError) {
        logError(log, markError, 'Could not mark file as failed', { fileId, stage: cursor.current });
      }
    }

    return {
      fileId,
      claimed: true,
      status: cursor.current === FileStatus.FAILED ? FileStatus.FAILED : null,
      error: message,
    };
  }
}

// ============================================
// BATCH RUN
// ============================================

/**
 * Runs every RECEIVED file once. Files are independent: one failing file
 * never stops the others. Files claimed by a concurrent run are skipped.
 */
export async function runBatch(ctx: PipelineContext, options: BatchOptions = {}): Promise<BatchRunResult> {
  const log = ctx.logger ?? loggers.pipeline;
  const startTime = Date.now();
  const fileIds = await ctx.storage.files.listFileIdsByStatus(FileStatus.RECEIVED, options.limit ?? 100);

  const batch: BatchRunResult = {
    processedCount: 0,
    successCount: 0,
    failedCount: 0,
    needsTemplateCount: 0,
    skippedCount: 0,
    results: [],
  };

  for (const fileId of fileIds) {
    let result: FileRunResult;
    try {
      result = await processFile(ctx, fileId);
    } catch (error) {
      // claim itself failed (e.g. the database was unreachable)
      logError(log, error, 'Could not start processing file', { fileId });
      result = { fileId, claimed: false, status: null, error: toFailureMessage(error) };
    }

    batch.results.push(result);
    if (!result.claimed) {
      batch.skippedCount++;
      continue;
    }

    batch.processedCount++;
    switch (result.status) {
      case FileStatus.PROCESSED:
      case FileStatus.PARTIALLY_PROCESSED:
        batch.successCount++;
        break;
      case FileStatus.NEEDS_TEMPLATE:
        batch.needsTemplateCount++;
        break;
      default:
        batch.failedCount++;
    }
  }

  logTiming(log, 'runBatch', startTime, {
    found: fileIds.length,
    processedCount: batch.processedCount,
    successCount: batch.successCount,
    failedCount: batch.failedCount,
    needsTemplateCount: batch.needsTemplateCount,
    skippedCount: batch.skippedCount,
  });
  return batch;
}

// ============================================
// FORCED REPROCESSING
// ============================================

/**
 * Explicit operator action: resets a terminal file to RECEIVED (prior rows
 * and violations are superseded) and runs it again. A file that is already
 * RECEIVED is simply run. In-flight files are rejected with
 * InvalidStatusTransitionError.
 */
export async function reprocessFile(ctx: PipelineContext, fileId: string): Promise<FileRunResult> {
  const log = ctx.logger ?? loggers.pipeline;
  const file = await ctx.storage.files.getFile(fileId);
  if (!file) {
    throw new NotFoundError('File', fileId);
  }

  if (file.status !== FileStatus.RECEIVED) {
    reprocessTransition(file.status);
    const reset = await ctx.storage.files.resetForReprocessing(fileId);
    if (!reset) {
      throw new FileClaimError(fileId, file.status);
    }
    log.info({ fileId, from: file.status, to: FileStatus.RECEIVED }, 'File reset for reprocessing');
  }

  return processFile(ctx, fileId);
}

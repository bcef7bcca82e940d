/**
 * Files Routes
 *
 * Read-only views over bordereaux files, upload, deletion and forced reprocessing.
 */

import { Router, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { FILE_STATUS_LABELS, FileType, Severity } from '../../shared/schema';
import type { AppContext } from '../context';
import { errors, asyncHandler } from '../middleware/errorHandler';
import { fileListQuerySchema, paginationQuerySchema, uuidParamSchema } from '../middleware/queryValidation';
import { sendCreated, sendSuccess } from '../middleware/responseHelpers';
import { parseBody, parseParams, parseQuery } from '../middleware/validation';
import { deleteFile, ingestFile } from '../services/ingestion';
import { reprocessFile } from '../services/pipelineOrchestrator';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 50 * 1024 * 1024, // 50MB limit
    files: 1,
  },
});

const uploadBodySchema = z.object({
  sender: z.string().min(1).max(255).optional(),
  subject: z.string().min(1).optional(),
  fileType: z.nativeEnum(FileType).optional(),
});

export function createFilesRouter(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/files
   * Newest first, filtered by status, sender and creation date
   */
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const filters = parseQuery(fileListQuerySchema, req);
    const page = await ctx.storage.files.listFiles(filters);
    sendSuccess(res, page);
  }));

  /**
   * POST /api/files
   * Multipart upload (field "file"); identical content returns the existing file
   */
  router.post('/', upload.single('file'), asyncHandler(async (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      throw errors.badRequest('No file provided');
    }
    const body = parseBody(uploadBodySchema, req);

    const result = await ingestFile(
      { files: ctx.storage.files, blobs: ctx.blobs },
      {
        bytes: file.buffer,
        filename: file.originalname,
        sender: body.sender,
        subject: body.subject,
        fileType: body.fileType,
      }
    );

    if (result.duplicate) {
      sendSuccess(res, result.file, 'File with identical content already received');
    } else {
      sendCreated(res, result.file);
    }
  }));

  /**
   * GET /api/files/:id
   * File detail with summary stats
   */
  router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseParams(uuidParamSchema, req);
    const file = await ctx.storage.files.getFile(id);
    if (!file) {
      throw errors.notFound('File');
    }

    const [severityCounts, latestProposal] = await Promise.all([
      ctx.storage.results.countViolationsBySeverity(id),
      ctx.storage.proposals.latestForFile(id),
    ]);

    sendSuccess(res, {
      file,
      stats: {
        statusLabel: FILE_STATUS_LABELS[file.status],
        totalRows: file.totalRows,
        validRows: file.validRows,
        errorRows: file.errorRows,
        errorCount: severityCounts[Severity.ERROR],
        warningCount: severityCounts[Severity.WARNING],
        templateId: file.templateId,
        matchScore: file.matchScore,
        latestProposalId: latestProposal?.id ?? null,
      },
    });
  }));

  /**
   * GET /api/files/:id/errors
   * Validation errors in (row, rule) order
   */
  router.get('/:id/errors', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseParams(uuidParamSchema, req);
    const page = parseQuery(paginationQuerySchema, req);

    if (!(await ctx.storage.files.getFile(id))) {
      throw errors.notFound('File');
    }

    sendSuccess(res, await ctx.storage.results.listValidationErrors(id, page));
  }));

  /**
   * POST /api/files/:id/reprocess
   * Resets a terminal file to received and runs it again
   */
  router.post('/:id/reprocess', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseParams(uuidParamSchema, req);
    req.logger?.info({ fileId: id }, 'Reprocessing requested');

    const result = await reprocessFile(ctx.pipeline, id);
    sendSuccess(res, result);
  }));

  /**
   * DELETE /api/files/:id
   * Removes a received or finished file with its results and stored bytes
   */
  router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseParams(uuidParamSchema, req);
    const file = await deleteFile({ files: ctx.storage.files, blobs: ctx.blobs }, id);
    sendSuccess(res, file, 'File deleted');
  }));

  return router;
}

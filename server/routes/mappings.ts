/**
 * Mapping Proposal Routes
 *
 * Review queue for files that matched no template.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { FileType } from '../../shared/schema';
import { isTerminalStatus } from '../../shared/fileStatus';
import type { AppContext } from '../context';
import { asyncHandler, errors } from '../middleware/errorHandler';
import { proposalListQuerySchema, uuidParamSchema } from '../middleware/queryValidation';
import { sendCreated, sendSuccess } from '../middleware/responseHelpers';
import { parseBody, parseParams, parseQuery } from '../middleware/validation';
import { reprocessFile, type FileRunResult } from '../services/pipelineOrchestrator';
import { approveProposal, rejectProposal } from '../services/proposalReview';

const approveBodySchema = z.object({
  templateId: z.string().min(1).max(100),
  name: z.string().min(1).max(255),
  carrier: z.string().min(1).max(255).optional(),
  fileType: z.nativeEnum(FileType).optional(),
  overrides: z.record(z.string(), z.string().nullable()).optional(),
  reviewedBy: z.string().min(1).max(255).optional(),
  /** run the source file again against the new template */
  reprocess: z.boolean().default(false),
});

const rejectBodySchema = z.object({
  reviewedBy: z.string().min(1).max(255).optional(),
});

export function createMappingsRouter(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/mappings/proposals?fileId=&status=
   */
  router.get('/proposals', asyncHandler(async (req: Request, res: Response) => {
    const { fileId, status, limit, offset } = parseQuery(proposalListQuerySchema, req);
    const page = await ctx.storage.proposals.listProposals({ fileId, reviewStatus: status, limit, offset });
    sendSuccess(res, page);
  }));

  /**
   * GET /api/mappings/proposals/:id
   */
  router.get('/proposals/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseParams(uuidParamSchema, req);
    const proposal = await ctx.storage.proposals.getProposal(id);
    if (!proposal) {
      throw errors.notFound('Mapping proposal');
    }
    sendSuccess(res, proposal);
  }));

  /**
   * POST /api/mappings/proposals/:id/approve
   * Creates a new active template from the proposal plus overrides
   */
  router.post('/proposals/:id/approve', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseParams(uuidParamSchema, req);
    const { reprocess, ...input } = parseBody(approveBodySchema, req);

    const result = await approveProposal(ctx.storage, id, input);

    let run: FileRunResult | null = null;
    if (reprocess) {
      const file = await ctx.storage.files.getFile(result.proposal.fileId);
      if (file && isTerminalStatus(file.status)) {
        run = await reprocessFile(ctx.pipeline, file.id);
      }
    }

    sendCreated(res, { ...result, run }, 'Template created from mapping proposal');
  }));

  /**
   * POST /api/mappings/proposals/:id/reject
   */
  router.post('/proposals/:id/reject', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseParams(uuidParamSchema, req);
    const { reviewedBy } = parseBody(rejectBodySchema, req);
    sendSuccess(res, await rejectProposal(ctx.storage, id, reviewedBy));
  }));

  return router;
}

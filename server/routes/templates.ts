/**
 * Templates Routes
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { FileType } from '../../shared/schema';
import type { AppContext } from '../context';
import { asyncHandler, errors } from '../middleware/errorHandler';
import { templateIdParamSchema, templateListQuerySchema } from '../middleware/queryValidation';
import { sendCreated, sendSuccess } from '../middleware/responseHelpers';
import { parseBody, parseParams, parseQuery } from '../middleware/validation';
import { reviseTemplate, setTemplateActive } from '../services/templateManagement';

const revisionBodySchema = z.object({
  templateId: z.string().min(1).max(100).optional(),
  name: z.string().min(1).max(255).optional(),
  carrier: z.string().min(1).max(255).nullable().optional(),
  fileType: z.nativeEnum(FileType).optional(),
  columnMappings: z.record(z.string(), z.string()),
});

export function createTemplatesRouter(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/templates?fileType=&active=
   */
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const { fileType, active } = parseQuery(templateListQuerySchema, req);

    const all = active ? await ctx.storage.templates.listActive(fileType) : await ctx.storage.templates.listAll();
    const templates = all.filter(
      (template) => (!fileType || template.fileType === fileType) && (active !== false || !template.active)
    );
    sendSuccess(res, templates);
  }));

  /**
   * GET /api/templates/:templateId
   */
  router.get('/:templateId', asyncHandler(async (req: Request, res: Response) => {
    const { templateId } = parseParams(templateIdParamSchema, req);
    const template = await ctx.storage.templates.getTemplate(templateId);
    if (!template) {
      throw errors.notFound('Template');
    }
    sendSuccess(res, template);
  }));

  /**
   * POST /api/templates/:templateId/revisions
   * Stores changed mappings as the next generation and retires this one
   */
  router.post('/:templateId/revisions', asyncHandler(async (req: Request, res: Response) => {
    const { templateId } = parseParams(templateIdParamSchema, req);
    const input = parseBody(revisionBodySchema, req);

    const template = await reviseTemplate(ctx.storage.templates, templateId, input);
    sendCreated(res, template, `Template ${templateId} revised`);
  }));

  /**
   * POST /api/templates/:templateId/deactivate
   */
  router.post('/:templateId/deactivate', asyncHandler(async (req: Request, res: Response) => {
    const { templateId } = parseParams(templateIdParamSchema, req);
    sendSuccess(res, await setTemplateActive(ctx.storage.templates, templateId, false));
  }));

  /**
   * POST /api/templates/:templateId/activate
   */
  router.post('/:templateId/activate', asyncHandler(async (req: Request, res: Response) => {
    const { templateId } = parseParams(templateIdParamSchema, req);
    sendSuccess(res, await setTemplateActive(ctx.storage.templates, templateId, true));
  }));

  return router;
}

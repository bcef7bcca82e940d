/**
 * Query Parameter Schemas
 *
 * Shared zod schemas for pagination, ids and the file list filters.
 */

import { z } from 'zod';
import { FileStatus, FileType, ReviewStatus } from '../../shared/schema';

/**
 * Standard pagination query schema
 */
export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().default(50),
  offset: z.coerce.number().int().min(0).optional().default(0),
});

/**
 * UUID parameter schema
 */
export const uuidParamSchema = z.object({
  id: z.string().uuid('Invalid UUID format'),
});

export const templateIdParamSchema = z.object({
  templateId: z.string().min(1).max(100),
});

// Accepts a calendar date (2024-01-31) or a full ISO timestamp.
const isoDate = z
  .union([z.string().date(), z.string().datetime({ offset: true })])
  .transform((value) => new Date(value));

/**
 * GET /api/files filters
 */
export const fileListQuerySchema = paginationQuerySchema
  .extend({
    status: z.nativeEnum(FileStatus).optional(),
    sender: z.string().min(1).optional(),
    createdFrom: isoDate.optional(),
    createdTo: isoDate.optional(),
  })
  .refine((data) => !data.createdFrom || !data.createdTo || data.createdFrom <= data.createdTo, {
    message: 'createdFrom must be before or equal to createdTo',
    path: ['createdFrom'],
  });

export const templateListQuerySchema = z.object({
  fileType: z.nativeEnum(FileType).optional(),
  active: z.enum(['true', 'false']).optional().transform((value) => (value === undefined ? undefined : value === 'true')),
});

export const proposalListQuerySchema = paginationQuerySchema.extend({
  fileId: z.string().uuid('Invalid UUID format').optional(),
  status: z.nativeEnum(ReviewStatus).optional(),
});

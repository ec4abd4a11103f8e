/**
 * Extraction Controller
 * HTTP request/response handling for extraction endpoints
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import {
  ExtractionService,
  extractionService,
  prepareRoots,
  toCatalogPayload,
  toReportEntries,
} from './extraction.service';
import { IExtractResponse } from './extraction.types';

export const extractRequestSchema = z.object({
  urls: z
    .array(
      z
        .string()
        .trim()
        .url('Invalid URL format')
        .refine((url) => /^https?:\/\//i.test(url), 'Only http and https URLs are supported')
    )
    .min(1, 'At least one URL is required'),
  max_pages: z.number().int().positive().max(1000).optional(),
  max_depth: z.number().int().min(0).max(20).optional(),
  timeout_seconds: z.number().int().positive().max(300).optional(),
  use_cache: z.boolean().optional(),
});

export type IExtractRequest = z.infer<typeof extractRequestSchema>;

export class ExtractionController {
  constructor(private readonly service: ExtractionService = extractionService) {}

  /**
   * POST /api/extract
   * Crawl the given documentation URLs and return the module catalog
   */
  extract = asyncHandler(async (req: Request, res: Response) => {
    const validationResult = extractRequestSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ApiError(
        400,
        'Validation failed',
        validationResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    const body: IExtractRequest = validationResult.data;
    const roots = prepareRoots(body.urls);
    const result = await this.service.run(roots, {
      maxPages: body.max_pages,
      maxDepth: body.max_depth,
      timeoutSeconds: body.timeout_seconds,
      useCache: body.use_cache,
    });

    const { modules } = toCatalogPayload(result.modules);
    const response: IExtractResponse = {
      success: true,
      modules,
      stats: {
        total_modules: modules.length,
        total_submodules: modules.reduce((sum, module) => sum + module.submodules.length, 0),
        urls_processed: roots.length,
        pages_crawled: result.report.pagesCrawled,
      },
      report: {
        skipped: toReportEntries(result.report.skipped),
        failed: toReportEntries(result.report.failed),
      },
    };

    res.json(response);
  });
}

export const extractionController = new ExtractionController();

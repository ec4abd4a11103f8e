/**
 * Extraction Service
 * Crawl, clean and infer: the full documentation pipeline
 */

import { FetchCache } from '../../lib/cache';
import { CrawlIssue, Crawler, normalizeUrl } from '../../lib/crawling';
import { InferenceEngine, Module, PageForest } from '../../lib/inference';
import { htmlProcessor, sectionBuilder } from '../../lib/processing';
import { PreconditionError } from '../../lib/scraping';
import {
  ExtractionOptions,
  ExtractionResult,
  ICatalogPayload,
  IReportEntry,
} from './extraction.types';

/**
 * Trimmed, non-empty, first occurrence kept
 */
export function prepareRoots(urls: string[]): string[] {
  const roots: string[] = [];
  for (const url of urls) {
    const trimmed = url.trim();
    if (trimmed && !roots.includes(trimmed)) {
      roots.push(trimmed);
    }
  }
  return roots;
}

export function toCatalogPayload(modules: Module[]): ICatalogPayload {
  return {
    modules: modules.map((module) => ({
      name: module.name,
      description: module.description,
      confidence: module.confidence,
      source_urls: [...module.sourceUrls],
      submodules: module.submodules.map((submodule) => ({
        name: submodule.name,
        description: submodule.description,
        confidence: submodule.confidence,
        source_urls: [...submodule.sourceUrls],
      })),
    })),
  };
}

export function toReportEntries(issues: CrawlIssue[]): IReportEntry[] {
  return issues.map((issue) => ({
    url: issue.url,
    type: issue.type,
    reason: issue.reason,
    ...(issue.statusCode !== undefined && { status_code: issue.statusCode }),
  }));
}

export class ExtractionService {
  /**
   * Run one extraction. Per-page problems end up in the report; only an
   * empty root set or an invalid limit throws.
   */
  async run(urls: string[], options: ExtractionOptions = {}): Promise<ExtractionResult> {
    const roots = prepareRoots(urls);
    if (roots.length === 0) {
      throw new PreconditionError('At least one URL is required');
    }

    const cache = options.useCache === false ? undefined : (options.cache ?? new FetchCache());
    const crawler = new Crawler({
      maxPages: options.maxPages,
      maxDepth: options.maxDepth,
      timeoutMs: options.timeoutSeconds !== undefined ? options.timeoutSeconds * 1000 : undefined,
      allowedDomains: options.allowedDomains,
      cache,
      fetchImpl: options.fetchImpl,
    });

    console.log(`Extraction: Starting for ${roots.length} URL(s)`);
    const crawl = await crawler.crawl(roots);

    const forests: PageForest[] = [];
    for (const page of crawl.pages) {
      const sourceUrl = normalizeUrl(page.finalUrl) ?? page.finalUrl;
      try {
        const blocks = htmlProcessor.clean(page.html);
        forests.push({ sourceUrl, sections: sectionBuilder.build(blocks, sourceUrl) });
      } catch (error) {
        console.warn(
          `Extraction: Skipping ${sourceUrl}, could not build sections:`,
          error instanceof Error ? error.message : error
        );
      }
    }

    const modules = new InferenceEngine(options.inference).infer(forests);
    if (modules.length === 0) {
      console.warn('Extraction: No modules found');
    }

    console.log(
      `Extraction: Complete - ${modules.length} module(s) from ${crawl.pages.length} page(s)`
    );

    return {
      modules,
      report: {
        pagesCrawled: crawl.pages.length,
        skipped: crawl.skipped,
        failed: crawl.failed,
      },
      statistics: crawl.statistics,
    };
  }
}

export const extractionService = new ExtractionService();

export function runExtraction(
  urls: string[],
  options: ExtractionOptions = {}
): Promise<ExtractionResult> {
  return extractionService.run(urls, options);
}

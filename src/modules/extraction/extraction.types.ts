/**
 * Extraction Module Types
 * Pipeline options, results and the serialized catalog shape
 */

import type { FetchCache } from '../../lib/cache/cache.manager';
import type { CrawlIssue, CrawlingStatistics, FetchFunction } from '../../lib/crawling/crawling.types';
import type { InferenceConfig, Module } from '../../lib/inference/inference.types';

// ============================================================================
// Pipeline
// ============================================================================

export interface ExtractionOptions {
  maxPages?: number;
  maxDepth?: number;
  timeoutSeconds?: number;
  allowedDomains?: string[];
  useCache?: boolean;
  /** Used instead of the default file cache when useCache is not false */
  cache?: FetchCache;
  fetchImpl?: FetchFunction;
  inference?: Partial<InferenceConfig>;
}

export interface ExtractionReport {
  pagesCrawled: number;
  skipped: CrawlIssue[];
  failed: CrawlIssue[];
}

export interface ExtractionResult {
  modules: Module[];
  report: ExtractionReport;
  statistics: CrawlingStatistics;
}

// ============================================================================
// Serialized catalog
// ============================================================================

export interface ICatalogSubmodule {
  name: string;
  description: string;
  confidence: number;
  source_urls: string[];
}

export interface ICatalogModule extends ICatalogSubmodule {
  submodules: ICatalogSubmodule[];
}

export interface ICatalogPayload {
  modules: ICatalogModule[];
}

// ============================================================================
// HTTP
// ============================================================================

export interface IReportEntry {
  url: string;
  type: string;
  reason: string;
  status_code?: number;
}

export interface IExtractResponse {
  success: boolean;
  modules: ICatalogModule[];
  stats: {
    total_modules: number;
    total_submodules: number;
    urls_processed: number;
    pages_crawled: number;
  };
  report: {
    skipped: IReportEntry[];
    failed: IReportEntry[];
  };
}

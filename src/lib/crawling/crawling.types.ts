/**
 * Crawling Types
 * Type definitions for the breadth-first documentation crawler
 */

import type { FetchCache } from '../cache/cache.manager';
import type { CrawlErrorType } from '../scraping/errors';

/**
 * Fetch implementation used by the crawler (global fetch by default)
 */
export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Crawling configuration interface
 */
export interface CrawlingConfig {
  /**
   * Maximum successfully fetched pages across all roots
   */
  maxPages: number;

  /**
   * Maximum crawl depth, relative to each page's own root
   */
  maxDepth: number;

  /**
   * Request timeout in milliseconds
   */
  timeoutMs: number;

  /**
   * Allowed domains (empty means derived from the roots)
   */
  allowedDomains: string[];

  /**
   * Redirect hops followed before giving up
   */
  maxRedirects: number;

  /**
   * Responses larger than this are skipped
   */
  maxContentBytes: number;

  /**
   * Responses shorter than this are skipped
   */
  minHtmlLength: number;

  /**
   * Identifying client marker sent with every request
   */
  userAgent: string;
}

/**
 * Options accepted by crawl(); everything but the limits is optional
 */
export interface CrawlOptions extends Partial<CrawlingConfig> {
  cache?: FetchCache;
  fetchImpl?: FetchFunction;
}

/**
 * Frontier entry
 */
export interface CrawlTask {
  /** Normalized key for the visited set and the cache */
  url: string;
  /** URL as resolved from the root or link, slash and query intact */
  fetchUrl: string;
  depth: number;
  rootUrl: string;
}

/**
 * A page fetched during one crawl
 */
export interface FetchedPage {
  /** Normalized key the page was queued under */
  readonly requestedUrl: string;
  readonly finalUrl: string;
  readonly statusCode: number;
  readonly html: string;
  readonly contentType: string;
  readonly depth: number;
  readonly rootUrl: string;
  readonly fromCache: boolean;
}

/**
 * A URL that was not turned into a FetchedPage
 */
export interface CrawlIssue {
  url: string;
  type: CrawlErrorType;
  reason: string;
  statusCode?: number;
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  pagesVisited: number;
  pagesSkipped: number;
  pagesFailed: number;
  cacheHits: number;
  linksDiscovered: number;
  duplicatesDetected: number;
  outOfScopeLinks: number;
  depthReached: number;
  totalTime: number;
  averagePageTime: number;
  successRate: number;
}

export interface CrawlResult {
  pages: FetchedPage[];
  skipped: CrawlIssue[];
  failed: CrawlIssue[];
  statistics: CrawlingStatistics;
}

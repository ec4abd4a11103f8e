/**
 * Crawler
 * Bounded breadth-first traversal over one or more documentation roots
 */

import { env } from '../../config/env';
import type { FetchCache } from '../cache/cache.manager';
import {
  CrawlError,
  CrawlErrorType,
  PreconditionError,
  UnsupportedContentError,
  HttpStatusError,
  classifyError,
  isSkippable,
} from '../scraping/errors';
import { fetchPage } from '../scraping/page-fetcher';
import { CrawlingQueue } from './crawling-queue';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import {
  CrawlIssue,
  CrawlOptions,
  CrawlResult,
  CrawlTask,
  CrawlingConfig,
  FetchFunction,
  FetchedPage,
} from './crawling.types';
import { DuplicateDetector } from './duplicate-detector';
import { LinkDiscoverer } from './link-discoverer';
import { deriveAllowedDomains, isBinaryUrl, normalizeUrl, resolveUrl } from './url-normalizer';

export const DEFAULT_CRAWLING_CONFIG: CrawlingConfig = {
  maxPages: env.CRAWL_MAX_PAGES,
  maxDepth: env.CRAWL_MAX_DEPTH,
  timeoutMs: env.CRAWL_TIMEOUT_SECONDS * 1000,
  allowedDomains: [],
  maxRedirects: env.CRAWL_MAX_REDIRECTS,
  maxContentBytes: env.CRAWL_MAX_CONTENT_BYTES,
  minHtmlLength: env.CRAWL_MIN_HTML_LENGTH,
  userAgent: env.USER_AGENT,
};

function validateConfig(config: CrawlingConfig): void {
  if (!Number.isInteger(config.maxPages) || config.maxPages <= 0) {
    throw new PreconditionError(`maxPages must be a positive integer (got ${config.maxPages})`);
  }
  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
    throw new PreconditionError(`maxDepth must be a non-negative integer (got ${config.maxDepth})`);
  }
  if (!(config.timeoutMs > 0)) {
    throw new PreconditionError(`timeout must be positive (got ${config.timeoutMs}ms)`);
  }
}

function toIssue(error: CrawlError, url: string): CrawlIssue {
  return {
    url,
    type: error.type,
    reason: error.message,
    statusCode: error instanceof HttpStatusError ? error.statusCode : undefined,
  };
}

export class Crawler {
  private readonly config: CrawlingConfig;
  private readonly cache?: FetchCache;
  private readonly fetchImpl?: FetchFunction;
  private readonly linkDiscoverer = new LinkDiscoverer();

  constructor(options: CrawlOptions = {}) {
    const defaults = DEFAULT_CRAWLING_CONFIG;
    this.config = {
      maxPages: options.maxPages ?? defaults.maxPages,
      maxDepth: options.maxDepth ?? defaults.maxDepth,
      timeoutMs: options.timeoutMs ?? defaults.timeoutMs,
      allowedDomains: options.allowedDomains ?? defaults.allowedDomains,
      maxRedirects: options.maxRedirects ?? defaults.maxRedirects,
      maxContentBytes: options.maxContentBytes ?? defaults.maxContentBytes,
      minHtmlLength: options.minHtmlLength ?? defaults.minHtmlLength,
      userAgent: options.userAgent ?? defaults.userAgent,
    };
    this.cache = options.cache;
    this.fetchImpl = options.fetchImpl;
  }

  getConfig(): Readonly<CrawlingConfig> {
    return this.config;
  }

  /**
   * Crawl every root breadth-first. Per-URL failures never abort the crawl.
   *
   * @throws PreconditionError when roots is empty or a limit is invalid,
   * before any network activity
   */
  async crawl(roots: string[]): Promise<CrawlResult> {
    if (roots.length === 0) {
      throw new PreconditionError('At least one root URL is required');
    }
    validateConfig(this.config);

    const queue = new CrawlingQueue();
    const visited = new DuplicateDetector();
    const statistics = new CrawlingStatisticsTracker();
    const fetchedUrls = new Set<string>();
    const pages: FetchedPage[] = [];
    const skipped: CrawlIssue[] = [];
    const failed: CrawlIssue[] = [];

    const seeds: string[] = [];
    for (const root of roots) {
      const fetchUrl = resolveUrl(root);
      const normalized = fetchUrl === null ? null : normalizeUrl(fetchUrl);
      if (fetchUrl === null || normalized === null) {
        console.warn(`Crawler: Ignoring invalid root URL ${root}`);
        failed.push({ url: root, type: CrawlErrorType.PRECONDITION, reason: 'Invalid URL' });
        statistics.recordFailed();
        continue;
      }
      if (visited.addUrl(normalized)) {
        continue;
      }
      seeds.push(normalized);
      queue.enqueue({ url: normalized, fetchUrl, depth: 0, rootUrl: normalized });
    }

    const allowedDomains =
      this.config.allowedDomains.length > 0
        ? this.config.allowedDomains.map((domain) => domain.toLowerCase())
        : deriveAllowedDomains(seeds);

    console.log(
      `Crawler: Starting crawl of ${seeds.length} root(s), maxPages=${this.config.maxPages}, ` +
        `maxDepth=${this.config.maxDepth}, domains=[${allowedDomains.join(', ')}]`
    );

    while (!queue.isEmpty() && pages.length < this.config.maxPages) {
      const task = queue.dequeue();
      if (!task) break;

      // Reached earlier through a redirect
      if (fetchedUrls.has(task.url)) {
        statistics.recordDuplicate();
        continue;
      }

      if (isBinaryUrl(task.url)) {
        skipped.push(toIssue(new UnsupportedContentError('Binary resource', task.url), task.url));
        statistics.recordSkipped();
        continue;
      }

      const startedAt = Date.now();
      let page: FetchedPage;
      try {
        page = await this.fetchTask(task);
      } catch (error) {
        const crawlError = classifyError(error, task.url);
        if (isSkippable(crawlError)) {
          console.log(`Crawler: Skipped ${task.url} - ${crawlError.message}`);
          skipped.push(toIssue(crawlError, task.url));
          statistics.recordSkipped();
        } else {
          console.warn(`Crawler: Failed ${task.url} - ${crawlError.message}`);
          failed.push(toIssue(crawlError, task.url));
          statistics.recordFailed();
        }
        continue;
      }

      fetchedUrls.add(task.url);
      const finalUrl = normalizeUrl(page.finalUrl) ?? task.url;

      // Another URL already redirected to the same page
      if (finalUrl !== task.url && fetchedUrls.has(finalUrl)) {
        console.log(`Crawler: ${task.url} redirects to already fetched ${finalUrl}`);
        statistics.recordDuplicate();
        continue;
      }

      pages.push(page);
      statistics.recordPageVisit(task.depth, Date.now() - startedAt, page.fromCache);
      fetchedUrls.add(finalUrl);
      visited.addUrl(finalUrl);

      if (task.depth >= this.config.maxDepth) {
        continue;
      }

      this.enqueueLinks(task, page, allowedDomains, { queue, visited, statistics, skipped });
    }

    const result: CrawlResult = {
      pages,
      skipped,
      failed,
      statistics: statistics.getStatistics(),
    };

    console.log(
      `Crawler: Complete - ${pages.length} page(s), ${skipped.length} skipped, ${failed.length} failed, ` +
        `${result.statistics.cacheHits} from cache`
    );

    return result;
  }

  /**
   * Cache first, then network. Successful network fetches are cached under
   * the URL that was requested, not the one redirected to.
   */
  private async fetchTask(task: CrawlTask): Promise<FetchedPage> {
    const cached = this.cache?.get(task.url);
    if (cached) {
      return {
        requestedUrl: task.url,
        finalUrl: cached.finalUrl,
        statusCode: cached.statusCode,
        html: cached.html,
        contentType: cached.contentType,
        depth: task.depth,
        rootUrl: task.rootUrl,
        fromCache: true,
      };
    }

    console.log(`Crawler: Visiting ${task.fetchUrl} (depth ${task.depth})`);
    const result = await fetchPage(task.fetchUrl, {
      timeoutMs: this.config.timeoutMs,
      maxRedirects: this.config.maxRedirects,
      maxContentBytes: this.config.maxContentBytes,
      minHtmlLength: this.config.minHtmlLength,
      userAgent: this.config.userAgent,
      fetchImpl: this.fetchImpl,
    });

    this.cache?.set(task.url, {
      finalUrl: result.finalUrl,
      html: result.html,
      statusCode: result.statusCode,
      contentType: result.contentType,
    });

    return {
      requestedUrl: task.url,
      finalUrl: result.finalUrl,
      statusCode: result.statusCode,
      html: result.html,
      contentType: result.contentType,
      depth: task.depth,
      rootUrl: task.rootUrl,
      fromCache: false,
    };
  }

  private enqueueLinks(
    task: CrawlTask,
    page: FetchedPage,
    allowedDomains: string[],
    state: {
      queue: CrawlingQueue;
      visited: DuplicateDetector;
      statistics: CrawlingStatisticsTracker;
      skipped: CrawlIssue[];
    }
  ): void {
    const links = this.linkDiscoverer.discoverLinks(page.html, page.finalUrl, allowedDomains);
    state.statistics.recordLinkDiscovery(links.total);
    state.statistics.recordOutOfScope(links.outOfScope);

    for (const binaryUrl of links.binaries) {
      if (state.visited.addUrl(binaryUrl)) continue;
      state.skipped.push(toIssue(new UnsupportedContentError('Binary resource', binaryUrl), binaryUrl));
      state.statistics.recordSkipped();
    }

    for (const link of links.pages) {
      if (state.visited.addUrl(link.url)) {
        state.statistics.recordDuplicate();
        continue;
      }
      state.queue.enqueue({
        url: link.url,
        fetchUrl: link.fetchUrl,
        depth: task.depth + 1,
        rootUrl: task.rootUrl,
      });
    }
  }
}

/**
 * Convenience wrapper: crawl roots with the given options
 */
export function crawl(roots: string[], options: CrawlOptions = {}): Promise<CrawlResult> {
  return new Crawler(options).crawl(roots);
}

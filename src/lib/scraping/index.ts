/**
 * Scraping Utilities - Barrel Export
 *
 * - Request headers
 * - Page fetching with redirect and content checks
 * - Crawl error taxonomy
 */

export { ACCEPT_HTML, buildRequestHeaders } from './headers';

export { PageFetchOptions, PageFetchResult, fetchPage } from './page-fetcher';

export {
  CrawlErrorType,
  CrawlError,
  NetworkError,
  HttpStatusError,
  UnsupportedContentError,
  MalformedHtmlError,
  PreconditionError,
  classifyError,
  isSkippable,
} from './errors';

/**
 * Crawl Error Handling
 * Error taxonomy for fetching and parsing documentation pages
 */

export enum CrawlErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  HTTP_STATUS = 'HTTP_STATUS',
  UNSUPPORTED_CONTENT = 'UNSUPPORTED_CONTENT',
  MALFORMED_HTML = 'MALFORMED_HTML',
  PRECONDITION = 'PRECONDITION',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Base class for every error raised by the crawl pipeline
 */
export class CrawlError extends Error {
  readonly type: CrawlErrorType;
  readonly url?: string;

  constructor(type: CrawlErrorType, message: string, url?: string) {
    super(message);
    this.name = 'CrawlError';
    this.type = type;
    this.url = url;
  }
}

/**
 * Timeout, connection refused, DNS failure. The URL is marked failed.
 */
export class NetworkError extends CrawlError {
  constructor(message: string, url?: string, timedOut: boolean = false) {
    super(timedOut ? CrawlErrorType.TIMEOUT : CrawlErrorType.NETWORK_ERROR, message, url);
    this.name = 'NetworkError';
  }
}

/**
 * Non-2xx response, or a redirect chain longer than the hop limit
 */
export class HttpStatusError extends CrawlError {
  readonly statusCode: number;

  constructor(statusCode: number, url?: string, message?: string) {
    super(CrawlErrorType.HTTP_STATUS, message || `HTTP ${statusCode}`, url);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
  }
}

/**
 * Non-HTML, oversized or empty response. The URL is marked skipped.
 */
export class UnsupportedContentError extends CrawlError {
  readonly contentType?: string;

  constructor(message: string, url?: string, contentType?: string) {
    super(CrawlErrorType.UNSUPPORTED_CONTENT, message, url);
    this.name = 'UnsupportedContentError';
    this.contentType = contentType;
  }
}

/**
 * HTML the parser could not handle; the cleaner falls back to best-effort text
 */
export class MalformedHtmlError extends CrawlError {
  constructor(message: string, url?: string) {
    super(CrawlErrorType.MALFORMED_HTML, message, url);
    this.name = 'MalformedHtmlError';
  }
}

/**
 * Invalid input detected before any network activity
 */
export class PreconditionError extends CrawlError {
  constructor(message: string) {
    super(CrawlErrorType.PRECONDITION, message);
    this.name = 'PreconditionError';
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string') return code;
  // undici wraps socket failures: TypeError('fetch failed', { cause })
  const cause = 'cause' in error ? error.cause : undefined;
  return cause !== error ? errorCode(cause) : undefined;
}

/**
 * Classify a thrown fetch error into the crawl taxonomy
 */
export function classifyError(error: unknown, url?: string): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';
  const code = errorCode(error);

  // Timeout errors
  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    code === 'ETIMEDOUT' ||
    code === 'UND_ERR_CONNECT_TIMEOUT' ||
    code === 'UND_ERR_HEADERS_TIMEOUT'
  ) {
    return new NetworkError('Request timed out', url, true);
  }

  // Network errors
  if (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'EAI_AGAIN' ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return new NetworkError(`Network connection failed${code ? ` (${code})` : ''}`, url);
  }

  return new CrawlError(CrawlErrorType.UNKNOWN, message || 'Unknown error', url);
}

/**
 * Whether the error means the URL should be reported as skipped rather than failed
 */
export function isSkippable(error: CrawlError): boolean {
  return error.type === CrawlErrorType.UNSUPPORTED_CONTENT;
}

/**
 * Page Fetcher
 * Single HTTP GET with timeout, bounded redirect chain and content classification
 */

import { isBinaryUrl, isHtmlContentType } from '../crawling/url-normalizer';
import type { FetchFunction } from '../crawling/crawling.types';
import { buildRequestHeaders } from './headers';
import { HttpStatusError, UnsupportedContentError, classifyError } from './errors';

export interface PageFetchOptions {
  timeoutMs: number;
  maxRedirects: number;
  maxContentBytes: number;
  minHtmlLength: number;
  userAgent: string;
  fetchImpl?: FetchFunction;
}

export interface PageFetchResult {
  finalUrl: string;
  statusCode: number;
  contentType: string;
  html: string;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * One GET with its own timeout. Every failure is rethrown as a CrawlError.
 */
async function fetchWithTimeout(
  fetchImpl: FetchFunction,
  url: string,
  options: PageFetchOptions
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    return await fetchImpl(url, {
      method: 'GET',
      headers: buildRequestHeaders(options.userAgent),
      redirect: 'manual',
      signal: controller.signal,
    });
  } catch (error) {
    throw classifyError(error, url);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Read the body chunk by chunk, giving up as soon as it grows past
 * maxContentBytes or takes longer than timeoutMs.
 */
async function readBody(
  response: Response,
  url: string,
  contentType: string,
  options: PageFetchOptions
): Promise<string> {
  if (!response.body) {
    return '';
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  const collect = async (): Promise<string> => {
    for (;;) {
      const chunk = await reader.read();
      if (chunk.done) {
        return Buffer.concat(chunks).toString('utf8');
      }
      received += chunk.value.byteLength;
      if (received > options.maxContentBytes) {
        throw new UnsupportedContentError(
          `Content too large (over ${options.maxContentBytes} bytes)`,
          url,
          contentType
        );
      }
      chunks.push(chunk.value);
    }
  };

  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error('Body read timeout')), options.timeoutMs);
  });

  try {
    return await Promise.race([collect(), timeout]);
  } catch (error) {
    await reader.cancel().catch((cancelError: unknown) => {
      console.debug(
        `Fetcher: Could not cancel body of ${url}:`,
        cancelError instanceof Error ? cancelError.message : cancelError
      );
    });
    throw classifyError(error, url);
  } finally {
    clearTimeout(timeoutId);
  }
}

async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) return;
  try {
    await response.body.cancel();
  } catch (error) {
    console.debug(`Fetcher: Could not discard body of ${response.url}:`, error instanceof Error ? error.message : error);
  }
}

/**
 * Fetch a page, following up to maxRedirects hops.
 *
 * @throws NetworkError on timeout or connection failure
 * @throws HttpStatusError on non-2xx status or an over-long redirect chain
 * @throws UnsupportedContentError for non-HTML, oversized or near-empty bodies
 */
export async function fetchPage(url: string, options: PageFetchOptions): Promise<PageFetchResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let currentUrl = url;
  let redirects = 0;

  for (;;) {
    const response = await fetchWithTimeout(fetchImpl, currentUrl, options);

    if (REDIRECT_STATUSES.has(response.status)) {
      const location = response.headers.get('location');
      await discardBody(response);

      if (!location) {
        throw new HttpStatusError(response.status, currentUrl, `Redirect without Location header`);
      }
      if (redirects >= options.maxRedirects) {
        throw new HttpStatusError(response.status, url, `Too many redirects (>${options.maxRedirects})`);
      }

      let nextUrl: URL;
      try {
        nextUrl = new URL(location, currentUrl);
      } catch {
        throw new HttpStatusError(response.status, currentUrl, `Invalid redirect target: ${location}`);
      }
      if (nextUrl.protocol !== 'http:' && nextUrl.protocol !== 'https:') {
        throw new UnsupportedContentError(`Redirect to unsupported scheme ${nextUrl.protocol}`, currentUrl);
      }

      currentUrl = nextUrl.href;
      redirects++;
      if (isBinaryUrl(currentUrl)) {
        throw new UnsupportedContentError('Redirect to binary resource', currentUrl);
      }
      continue;
    }

    if (response.status < 200 || response.status >= 300) {
      await discardBody(response);
      throw new HttpStatusError(response.status, currentUrl);
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!isHtmlContentType(contentType)) {
      await discardBody(response);
      throw new UnsupportedContentError(`Non-HTML content (${contentType})`, currentUrl, contentType);
    }

    const declaredLength = Number(response.headers.get('content-length') ?? NaN);
    if (Number.isFinite(declaredLength) && declaredLength > options.maxContentBytes) {
      await discardBody(response);
      throw new UnsupportedContentError(`Content too large (${declaredLength} bytes)`, currentUrl, contentType);
    }

    const html = await readBody(response, currentUrl, contentType, options);

    if (html.trim().length < options.minHtmlLength) {
      throw new UnsupportedContentError(`Content too short (${html.trim().length} chars)`, currentUrl, contentType);
    }

    return {
      finalUrl: currentUrl,
      statusCode: response.status,
      contentType: contentType || 'text/html',
      html,
    };
  }
}

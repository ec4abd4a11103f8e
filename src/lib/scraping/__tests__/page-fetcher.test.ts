/**
 * Page Fetcher Tests
 */

import { createFetchStub, redirectTo, requestedUrls } from '../../../__tests__/helpers/mocks';
import type { FetchFunction } from '../../crawling/crawling.types';
import { CrawlErrorType } from '../errors';
import { PageFetchOptions, fetchPage } from '../page-fetcher';

const HTML = '<html><body><h1>Getting Started</h1></body></html>';

function options(fetchImpl: FetchFunction, overrides: Partial<PageFetchOptions> = {}): PageFetchOptions {
  return {
    timeoutMs: 1000,
    maxRedirects: 2,
    maxContentBytes: 1000,
    minHtmlLength: 20,
    userAgent: 'test-agent/1.0',
    fetchImpl,
    ...overrides,
  };
}

describe('fetchPage', () => {
  it('should return the page with its content type', async () => {
    const stub = createFetchStub({ 'https://docs.example.com/a': { body: HTML } });

    const result = await fetchPage('https://docs.example.com/a', options(stub));

    expect(result).toEqual({
      finalUrl: 'https://docs.example.com/a',
      statusCode: 200,
      contentType: 'text/html; charset=utf-8',
      html: HTML,
    });
  });

  it('should send the crawler headers without following redirects itself', async () => {
    const stub = createFetchStub({ 'https://docs.example.com/a': { body: HTML } });

    await fetchPage('https://docs.example.com/a', options(stub));

    const init = stub.mock.calls[0][1];
    expect(init).toMatchObject({
      method: 'GET',
      redirect: 'manual',
      headers: expect.objectContaining({ 'User-Agent': 'test-agent/1.0' }),
    });
  });

  it('should follow relative redirects', async () => {
    const stub = createFetchStub({
      'https://docs.example.com/a': redirectTo('/b', 302),
      'https://docs.example.com/b': { body: HTML },
    });

    const result = await fetchPage('https://docs.example.com/a', options(stub));

    expect(result.finalUrl).toBe('https://docs.example.com/b');
    expect(requestedUrls(stub)).toEqual(['https://docs.example.com/a', 'https://docs.example.com/b']);
  });

  it('should stop after the redirect limit', async () => {
    const stub = createFetchStub({
      'https://docs.example.com/a': redirectTo('/b'),
      'https://docs.example.com/b': redirectTo('/c'),
      'https://docs.example.com/c': redirectTo('/d'),
    });

    await expect(fetchPage('https://docs.example.com/a', options(stub))).rejects.toMatchObject({
      type: CrawlErrorType.HTTP_STATUS,
      statusCode: 301,
      message: 'Too many redirects (>2)',
      url: 'https://docs.example.com/a',
    });
    expect(stub).toHaveBeenCalledTimes(3);
  });

  it('should reject a redirect without a location', async () => {
    const stub = createFetchStub({ 'https://docs.example.com/a': { status: 302 } });

    await expect(fetchPage('https://docs.example.com/a', options(stub))).rejects.toMatchObject({
      statusCode: 302,
      message: 'Redirect without Location header',
    });
  });

  it('should skip a redirect to a binary resource', async () => {
    const stub = createFetchStub({ 'https://docs.example.com/a': redirectTo('/manual.pdf') });

    await expect(fetchPage('https://docs.example.com/a', options(stub))).rejects.toMatchObject({
      type: CrawlErrorType.UNSUPPORTED_CONTENT,
      message: 'Redirect to binary resource',
      url: 'https://docs.example.com/manual.pdf',
    });
  });

  it('should reject non-2xx statuses', async () => {
    const stub = createFetchStub({ 'https://docs.example.com/a': { status: 404, body: 'Not Found' } });

    await expect(fetchPage('https://docs.example.com/a', options(stub))).rejects.toMatchObject({
      type: CrawlErrorType.HTTP_STATUS,
      statusCode: 404,
      message: 'HTTP 404',
    });
  });

  it('should skip non-HTML content', async () => {
    const stub = createFetchStub({
      'https://docs.example.com/a': { body: '%PDF-1.7 binary', contentType: 'application/pdf' },
    });

    await expect(fetchPage('https://docs.example.com/a', options(stub))).rejects.toMatchObject({
      type: CrawlErrorType.UNSUPPORTED_CONTENT,
      message: 'Non-HTML content (application/pdf)',
      contentType: 'application/pdf',
    });
  });

  it('should accept a missing content type', async () => {
    const stub = createFetchStub({ 'https://docs.example.com/a': { body: HTML, contentType: '' } });

    const result = await fetchPage('https://docs.example.com/a', options(stub));

    expect(result.contentType).toBe('text/html');
  });

  it('should skip oversized and near-empty bodies', async () => {
    const stub = createFetchStub({
      'https://docs.example.com/big': { body: 'a'.repeat(1001) },
      'https://docs.example.com/tiny': { body: '  <p>hi</p>  ' },
    });

    await expect(fetchPage('https://docs.example.com/big', options(stub))).rejects.toMatchObject({
      type: CrawlErrorType.UNSUPPORTED_CONTENT,
      message: 'Content too large (over 1000 bytes)',
    });
    await expect(fetchPage('https://docs.example.com/tiny', options(stub))).rejects.toMatchObject({
      type: CrawlErrorType.UNSUPPORTED_CONTENT,
      message: 'Content too short (9 chars)',
    });
  });

  it('should skip a declared length over the limit without reading the body', async () => {
    const stub = createFetchStub({
      'https://docs.example.com/big': { body: HTML, headers: { 'content-length': '5000' } },
    });

    await expect(fetchPage('https://docs.example.com/big', options(stub))).rejects.toMatchObject({
      message: 'Content too large (5000 bytes)',
    });
  });

  it('should stop reading a streamed body once it passes the limit', async () => {
    let produced = 0;
    async function* endless(): AsyncGenerator<Uint8Array> {
      for (;;) {
        produced++;
        yield Buffer.from(`<p>${'x'.repeat(396)}</p>`);
      }
    }
    const streaming: FetchFunction = async () =>
      new Response(endless(), { headers: { 'content-type': 'text/html' } });

    await expect(fetchPage('https://docs.example.com/stream', options(streaming))).rejects.toMatchObject({
      type: CrawlErrorType.UNSUPPORTED_CONTENT,
      message: 'Content too large (over 1000 bytes)',
      url: 'https://docs.example.com/stream',
    });
    expect(produced).toBeLessThan(10);
  });

  it('should classify connection failures', async () => {
    const stub = createFetchStub({});

    await expect(fetchPage('https://missing.example.com/', options(stub))).rejects.toMatchObject({
      type: CrawlErrorType.NETWORK_ERROR,
      message: 'Network connection failed (ENOTFOUND)',
      url: 'https://missing.example.com/',
    });
  });

  it('should abort requests that exceed the timeout', async () => {
    const hanging: FetchFunction = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const aborted = new Error('This operation was aborted');
          aborted.name = 'AbortError';
          reject(aborted);
        });
      });

    await expect(
      fetchPage('https://docs.example.com/slow', options(hanging, { timeoutMs: 10 }))
    ).rejects.toMatchObject({ type: CrawlErrorType.TIMEOUT, message: 'Request timed out' });
  });
});

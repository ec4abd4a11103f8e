/**
 * Request Headers
 * Headers sent with every crawler request
 */

export const ACCEPT_HTML = 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5';

/**
 * Build headers identifying the crawler to the documentation site
 */
export function buildRequestHeaders(userAgent: string, extra?: Record<string, string>): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept': ACCEPT_HTML,
    'Accept-Language': 'en-US,en;q=0.8',
    ...extra,
  };
}

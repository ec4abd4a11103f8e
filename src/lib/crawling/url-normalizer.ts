/**
 * URL Normalization Utilities
 * Canonical URLs, binary-link classification and domain scoping
 */

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

// Links with these suffixes never lead to an HTML page
const BINARY_EXTENSIONS = new Set([
  'pdf', 'zip', 'gz', 'tgz', 'tar', 'rar', '7z', 'bz2', 'xz',
  'png', 'jpg', 'jpeg', 'gif', 'svg', 'webp', 'ico', 'bmp', 'tif', 'tiff', 'avif',
  'mp3', 'mp4', 'wav', 'ogg', 'avi', 'mov', 'webm', 'mkv',
  'woff', 'woff2', 'ttf', 'otf', 'eot',
  'css', 'js', 'mjs', 'map', 'json', 'xml', 'rss', 'atom', 'csv', 'txt',
  'doc', 'docx', 'xls', 'xlsx', 'ppt', 'pptx', 'odt', 'epub',
  'exe', 'dmg', 'msi', 'pkg', 'deb', 'rpm', 'apk', 'iso', 'bin', 'jar', 'wasm',
]);

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

const IGNORED_SCHEMES = /^(mailto|javascript|tel|data|ftp|file|sms):/i;

/**
 * Resolve a link to the absolute URL that should be requested: fragment and
 * credentials dropped, path and query left as written. Returns null for
 * anything that is not an http(s) URL.
 */
export function resolveUrl(url: string, baseUrl?: string): string | null {
  const trimmed = url.trim();
  if (!trimmed || IGNORED_SCHEMES.test(trimmed)) {
    return null;
  }

  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
  } catch {
    return null;
  }

  if (!SUPPORTED_PROTOCOLS.has(urlObj.protocol)) {
    return null;
  }

  urlObj.hash = '';
  urlObj.username = '';
  urlObj.password = '';
  return urlObj.href;
}

/**
 * Normalize a URL: resolve against baseUrl, lower-case scheme and host, drop
 * default ports, fragments, duplicate slashes and the trailing slash, sort query
 * parameters. Returns null for anything that is not an http(s) URL.
 *
 * The result is an identity key for the visited set and the cache; requests
 * go to the resolveUrl form.
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  const resolved = resolveUrl(url, baseUrl);
  if (resolved === null) {
    return null;
  }

  // WHATWG URL already lower-cases scheme/host and strips default ports
  const urlObj = new URL(resolved);

  let pathname = urlObj.pathname.replace(/\/{2,}/g, '/');
  if (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.replace(/\/+$/, '') || '/';
  }
  urlObj.pathname = pathname;

  if (urlObj.search) {
    const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
      a.localeCompare(b)
    );
    urlObj.search = '';
    sortedParams.forEach(([key, value]) => {
      urlObj.searchParams.append(key, value);
    });
  }

  return urlObj.href;
}

/**
 * Extract host from URL, lower-cased (empty string when unparsable)
 */
export function extractHost(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Registrable scope of a root URL: its host without a leading "www."
 */
export function extractDomain(url: string): string {
  const host = extractHost(url);
  return host.startsWith('www.') ? host.substring(4) : host;
}

/**
 * Allowed domains derived from a set of root URLs (deduplicated, order kept)
 */
export function deriveAllowedDomains(roots: string[]): string[] {
  const domains: string[] = [];
  for (const root of roots) {
    const domain = extractDomain(root);
    if (domain && !domains.includes(domain)) {
      domains.push(domain);
    }
  }
  return domains;
}

/**
 * True when the URL's host equals, or is a subdomain of, one of the domains
 */
export function isWithinDomains(url: string, domains: string[]): boolean {
  const host = extractHost(url);
  if (!host) return false;
  return domains.some((domain) => {
    const allowed = domain.toLowerCase();
    return host === allowed || host.endsWith(`.${allowed}`);
  });
}

/**
 * True when the URL path ends with a known non-HTML file suffix
 */
export function isBinaryUrl(url: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }

  const lastSegment = pathname.substring(pathname.lastIndexOf('/') + 1);
  const dotIndex = lastSegment.lastIndexOf('.');
  if (dotIndex <= 0) return false;
  return BINARY_EXTENSIONS.has(lastSegment.substring(dotIndex + 1));
}

/**
 * True when a Content-Type header denotes an HTML document.
 * A missing header is accepted; the body is checked later.
 */
export function isHtmlContentType(contentType: string | null | undefined): boolean {
  if (!contentType) return true;
  const mimeType = contentType.split(';')[0].trim().toLowerCase();
  return HTML_CONTENT_TYPES.includes(mimeType);
}

/**
 * Validate URL format (absolute http/https only)
 */
export function isValidUrl(url: string): boolean {
  return normalizeUrl(url) !== null;
}

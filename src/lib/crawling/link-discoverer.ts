/**
 * Link Discoverer
 * Outbound link discovery from fetched HTML pages
 */

import * as cheerio from 'cheerio';
import { isBinaryUrl, isWithinDomains, normalizeUrl, resolveUrl } from './url-normalizer';

export interface DiscoveredLink {
  /** Normalized key */
  url: string;
  /** Resolved URL as linked, requested as is */
  fetchUrl: string;
}

export interface DiscoveredLinks {
  /** In-scope page links in document order */
  pages: DiscoveredLink[];
  /** Normalized in-scope links to binary resources */
  binaries: string[];
  /** Links dropped because their host is outside the allowed domains */
  outOfScope: number;
  /** All anchors with a usable href */
  total: number;
}

export class LinkDiscoverer {
  /**
   * Discover links from HTML, resolved against the page's final URL
   */
  discoverLinks(html: string, baseUrl: string, allowedDomains: string[]): DiscoveredLinks {
    const $ = cheerio.load(html);
    const pages: DiscoveredLink[] = [];
    const binaries: string[] = [];
    const seen = new Set<string>();
    let outOfScope = 0;
    let total = 0;

    // <base href> changes how relative links resolve
    const resolveBase = this.resolveBaseHref($('base[href]').first().attr('href'), baseUrl);

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href');
      if (!href || href.trim().startsWith('#')) return;

      const fetchUrl = resolveUrl(href, resolveBase);
      const normalized = fetchUrl === null ? null : normalizeUrl(fetchUrl);
      if (fetchUrl === null || normalized === null) return;
      total++;

      if (seen.has(normalized)) return;
      seen.add(normalized);

      if (!isWithinDomains(normalized, allowedDomains)) {
        outOfScope++;
        return;
      }

      if (isBinaryUrl(normalized)) {
        binaries.push(normalized);
      } else {
        pages.push({ url: normalized, fetchUrl });
      }
    });

    return { pages, binaries, outOfScope, total };
  }

  /**
   * Resolve a <base href> against the page URL, keeping its trailing slash
   */
  private resolveBaseHref(baseHref: string | undefined, pageUrl: string): string {
    if (!baseHref) return pageUrl;
    try {
      const resolved = new URL(baseHref, pageUrl);
      return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.href : pageUrl;
    } catch {
      return pageUrl;
    }
  }
}

export const linkDiscoverer = new LinkDiscoverer();

/**
 * Duplicate Detector
 * Visited-set of normalized URLs shared by every root of one crawl
 */

import { normalizeUrl } from './url-normalizer';

export class DuplicateDetector {
  private visitedUrls: Set<string> = new Set();

  /**
   * Mark a URL as seen. Returns true if it had been seen already
   * (or cannot be normalized, which makes it unusable either way).
   */
  addUrl(url: string): boolean {
    const normalized = normalizeUrl(url);
    if (normalized === null || this.visitedUrls.has(normalized)) {
      return true;
    }

    this.visitedUrls.add(normalized);
    return false;
  }
}

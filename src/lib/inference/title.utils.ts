/**
 * Title Utilities
 * Heading normalization, navigation filtering and fuzzy comparison
 */

import * as natural from 'natural';
import { normalizeWhitespace, wordCount } from '../processing/text.processor';

const NAVIGATION_TITLES = new Set([
  'home',
  'menu',
  'search',
  'login',
  'log in',
  'sign in',
  'sign up',
  'logout',
  'log out',
  'skip to content',
  'skip to main content',
  'skip navigation',
  'table of contents',
  'contents',
  'on this page',
  'navigation',
  'breadcrumb',
  'previous',
  'next',
  'back to top',
  'cookie settings',
  'privacy policy',
  'terms of service',
]);

const PAGE_COUNTER_PATTERNS = [/^page\s*\d+$/, /^\d+\s+of\s+\d+$/];

const LEADING_NUMBERING = /^\d+(?:\.\d+)*\.?\s+/;
const TRAILING_PUNCTUATION = /[\s.:;,!?¶§#]+$/;

/**
 * Lower-case, collapse whitespace, drop leading numbering ("2.3 ") and
 * trailing punctuation or anchor marks.
 */
export function normalizeTitle(title: string): string {
  return normalizeWhitespace(title.toLowerCase())
    .replace(LEADING_NUMBERING, '')
    .replace(TRAILING_PUNCTUATION, '')
    .trim();
}

export function isNoiseTitle(title: string): boolean {
  const normalized = normalizeTitle(title);
  if (normalized.length < 2) return true;
  if (NAVIGATION_TITLES.has(normalized)) return true;
  // Counters are matched before numbering is stripped: "2 of 10"
  const plain = normalizeWhitespace(title.toLowerCase());
  return PAGE_COUNTER_PATTERNS.some((pattern) => pattern.test(plain));
}

/**
 * Edit-distance ratio in [0, 1]: 1 - distance / longer length
 */
export function titleSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - natural.LevenshteinDistance(a, b) / longest;
}

export function titleWordCount(title: string): number {
  return wordCount(normalizeTitle(title));
}

/**
 * Processing Types
 * Text blocks and section trees produced from one page
 */

export type TextBlockKind = 'heading' | 'paragraph' | 'list_item';

/**
 * One unit of readable content in document order.
 * level is 1-4 for headings and 0 otherwise.
 */
export interface TextBlock {
  readonly kind: TextBlockKind;
  readonly level: number;
  readonly text: string;
}

/**
 * Heading-rooted node of a page outline. Every child has a strictly
 * greater level than its parent.
 */
export interface Section {
  title: string;
  level: number;
  bodyText: string;
  children: Section[];
  sourceUrl: string;
}

export interface CleanerConfig {
  /** Heading tags deeper than this become paragraphs */
  maxHeadingLevel: number;
  /** Character cap for the summary fallback when no sentence qualifies */
  summaryFallbackLength: number;
  /** Fragments with fewer words are not counted as sentences */
  minSentenceWords: number;
  overviewTitle: string;
}

export const DEFAULT_CLEANER_CONFIG: CleanerConfig = {
  maxHeadingLevel: 4,
  summaryFallbackLength: 200,
  minSentenceWords: 3,
  overviewTitle: 'Overview',
};

export type DescriptionKind = 'module' | 'submodule';

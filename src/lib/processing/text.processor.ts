/**
 * Text Processor
 * Whitespace normalization, sentence splitting and extractive summaries
 */

import { CleanerConfig, DEFAULT_CLEANER_CONFIG, DescriptionKind } from './processing.types';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function wordCount(text: string): number {
  const normalized = normalizeWhitespace(text);
  return normalized ? normalized.split(' ').length : 0;
}

export class TextProcessor {
  private config: CleanerConfig;

  constructor(config?: Partial<CleanerConfig>) {
    this.config = { ...DEFAULT_CLEANER_CONFIG, ...config };
  }

  /**
   * Sentences of at least minSentenceWords words, in order
   */
  splitSentences(text: string): string[] {
    const normalized = normalizeWhitespace(text);
    if (!normalized) {
      return [];
    }
    return normalized
      .split(SENTENCE_BOUNDARY)
      .filter((sentence) => wordCount(sentence) >= this.config.minSentenceWords);
  }

  /**
   * Leading sentences up to maxSentences. Falls back to a character-capped
   * prefix when no fragment qualifies as a sentence. Empty only for empty input.
   */
  summarize(text: string, maxSentences: number = 2): string {
    const normalized = normalizeWhitespace(text);
    if (!normalized) {
      return '';
    }

    const sentences = this.splitSentences(normalized);
    if (sentences.length > 0 && maxSentences > 0) {
      return sentences.slice(0, maxSentences).join(' ');
    }

    const limit = this.config.summaryFallbackLength;
    const prefix = normalized.slice(0, limit).trim();
    return normalized.length > limit ? `${prefix}...` : prefix;
  }

  /**
   * Summary of text, or a sentence built from the title when text is empty
   */
  describe(title: string, text: string, maxSentences: number, kind: DescriptionKind): string {
    const summary = this.summarize(text, maxSentences);
    if (summary) {
      return summary;
    }
    const name = normalizeWhitespace(title);
    return kind === 'module' ? `Module for ${name}.` : `Functionality related to ${name}.`;
  }
}

export const textProcessor = new TextProcessor();

export function summarize(text: string, maxSentences: number = 2): string {
  return textProcessor.summarize(text, maxSentences);
}

/**
 * HTML Processor
 * Noise removal and reading-order block extraction from raw HTML
 */

import * as cheerio from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode, Element, Text } from 'domhandler';
import { MalformedHtmlError } from '../scraping/errors';
import { normalizeWhitespace } from './text.processor';
import { CleanerConfig, DEFAULT_CLEANER_CONFIG, TextBlock, TextBlockKind } from './processing.types';

export type HtmlParser = (html: string) => cheerio.CheerioAPI;

export interface HtmlProcessorOptions extends Partial<CleanerConfig> {
  parser?: HtmlParser;
}

const NOISE_TAGS = new Set([
  'script',
  'style',
  'noscript',
  'template',
  'svg',
  'iframe',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'button',
]);

const NOISE_ROLES = new Set(['navigation', 'banner', 'contentinfo', 'complementary', 'search']);

const HIDDEN_STYLE = /display\s*:\s*none|visibility\s*:\s*hidden/i;

const PARAGRAPH_TAGS = new Set(['p', 'dd', 'blockquote']);
const LIST_ITEM_TAGS = new Set(['li', 'dt']);

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

/**
 * Element kinds a DOM walk distinguishes. Comments, directives and CDATA
 * carry no readable content and are not visited.
 */
type VisitedNode = { kind: 'element'; node: Element } | { kind: 'text'; node: Text };

interface OpenBlock {
  kind: TextBlockKind;
  level: number;
  parts: string[];
}

function toVisited(node: AnyNode): VisitedNode | null {
  if (isTag(node)) return { kind: 'element', node };
  if (isText(node)) return { kind: 'text', node };
  return null;
}

export function isNoiseElement(element: Element): boolean {
  if (NOISE_TAGS.has(element.tagName)) return true;

  const attribs = element.attribs;
  if ('hidden' in attribs) return true;
  if (attribs['aria-hidden'] === 'true') return true;
  if (attribs.style && HIDDEN_STYLE.test(attribs.style)) return true;
  if (attribs.role && NOISE_ROLES.has(attribs.role.toLowerCase())) return true;

  return false;
}

export class HtmlProcessor {
  private config: CleanerConfig;
  private parser: HtmlParser;

  constructor(options: HtmlProcessorOptions = {}) {
    const { parser, ...config } = options;
    this.config = { ...DEFAULT_CLEANER_CONFIG, ...config };
    this.parser = parser ?? ((html) => cheerio.load(html));
  }

  /**
   * Ordered text blocks of the readable content. Falls back to tag stripping
   * when the document cannot be walked; never throws.
   */
  clean(html: string): TextBlock[] {
    if (!html || html.trim().length === 0) {
      return [];
    }

    try {
      const $ = this.parser(html);
      this.removeNoise($);
      const root = $.root().get(0);
      if (!root) {
        throw new MalformedHtmlError('Document has no root node');
      }
      return this.extractBlocks(root.children);
    } catch (error) {
      const malformed =
        error instanceof MalformedHtmlError
          ? error
          : new MalformedHtmlError(error instanceof Error ? error.message : String(error));
      console.warn(`Cleaner: Falling back to tag stripping - ${malformed.message}`);
      return this.stripTags(html);
    }
  }

  /**
   * Detach every element matching the noise predicate. Runs before block
   * extraction so navigation text never reaches a block.
   */
  private removeNoise($: cheerio.CheerioAPI): void {
    $('*')
      .filter((_, node) => isTag(node) && isNoiseElement(node))
      .remove();
  }

  private classify(tagName: string): { kind: TextBlockKind; level: number } | null {
    const heading = /^h([1-6])$/.exec(tagName);
    if (heading) {
      const level = Number(heading[1]);
      return level <= this.config.maxHeadingLevel
        ? { kind: 'heading', level }
        : { kind: 'paragraph', level: 0 };
    }
    if (PARAGRAPH_TAGS.has(tagName)) return { kind: 'paragraph', level: 0 };
    if (LIST_ITEM_TAGS.has(tagName)) return { kind: 'list_item', level: 0 };
    return null;
  }

  private extractBlocks(nodes: AnyNode[]): TextBlock[] {
    const open: OpenBlock[] = [];

    const walk = (node: AnyNode, current: OpenBlock | null): void => {
      const visited = toVisited(node);
      if (!visited) return;

      switch (visited.kind) {
        case 'text':
          current?.parts.push(visited.node.data);
          return;
        case 'element': {
          const element = visited.node;
          if (element.tagName === 'br') {
            current?.parts.push(' ');
            return;
          }
          const block = this.classify(element.tagName);
          // A nested block takes its own slot, so the parent's text excludes it
          let target = current;
          if (block) {
            target = { ...block, parts: [] };
            open.push(target);
          }
          for (const child of element.children) {
            walk(child, target);
          }
          return;
        }
      }
    };

    for (const node of nodes) {
      walk(node, null);
    }

    const blocks: TextBlock[] = [];
    for (const block of open) {
      const text = normalizeWhitespace(block.parts.join(' '));
      if (text) {
        blocks.push({ kind: block.kind, level: block.level, text });
      }
    }
    return blocks;
  }

  /**
   * Best-effort extraction: every non-empty line of tag-stripped text
   * becomes a paragraph.
   */
  private stripTags(html: string): TextBlock[] {
    const text = html
      .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
      .replace(/<br\s*\/?>|<\/(p|div|li|dt|dd|h[1-6]|section|article|blockquote|tr)\s*>/gi, '\n')
      .replace(/<[^>]*>/g, ' ')
      .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity);

    return text
      .split(/\n+/)
      .map(normalizeWhitespace)
      .filter((line) => line.length > 0)
      .map((line): TextBlock => ({ kind: 'paragraph', level: 0, text: line }));
  }
}

export const htmlProcessor = new HtmlProcessor();

export function clean(html: string): TextBlock[] {
  return htmlProcessor.clean(html);
}

/**
 * Section Builder
 * Rebuild a heading outline from a flat block stream
 */

import { CleanerConfig, DEFAULT_CLEANER_CONFIG, Section, TextBlock } from './processing.types';

function appendBody(section: Section, text: string): void {
  section.bodyText = section.bodyText ? `${section.bodyText} ${text}` : text;
}

export class SectionBuilder {
  private config: CleanerConfig;

  constructor(config?: Partial<CleanerConfig>) {
    this.config = { ...DEFAULT_CLEANER_CONFIG, ...config };
  }

  /**
   * Single left-to-right scan with a stack of open sections.
   * A heading of level L closes every open section of level >= L and opens
   * under whatever remains on top; body blocks go to the top section.
   * Body text before the first heading is gathered into one level-1
   * overview root that never goes on the stack.
   */
  build(blocks: TextBlock[], sourceUrl: string): Section[] {
    const roots: Section[] = [];
    const stack: Section[] = [];
    let overview: Section | null = null;

    for (const block of blocks) {
      if (block.kind === 'heading') {
        const section: Section = {
          title: block.text,
          level: block.level,
          bodyText: '',
          children: [],
          sourceUrl,
        };

        while (stack.length > 0 && stack[stack.length - 1].level >= block.level) {
          stack.pop();
        }

        const parent = stack[stack.length - 1];
        if (parent) {
          parent.children.push(section);
        } else {
          roots.push(section);
        }
        stack.push(section);
        continue;
      }

      const top = stack[stack.length - 1];
      if (top) {
        appendBody(top, block.text);
        continue;
      }

      if (!overview) {
        overview = {
          title: this.config.overviewTitle,
          level: 1,
          bodyText: '',
          children: [],
          sourceUrl,
        };
        roots.push(overview);
      }
      appendBody(overview, block.text);
    }

    return roots;
  }
}

export const sectionBuilder = new SectionBuilder();

export function buildSections(blocks: TextBlock[], sourceUrl: string): Section[] {
  return sectionBuilder.build(blocks, sourceUrl);
}

/**
 * Depth-first visit of every section in a forest, parents before children
 */
export function* walkSections(forest: Section[], depth: number = 0): Generator<[Section, number]> {
  for (const section of forest) {
    yield [section, depth];
    yield* walkSections(section.children, depth + 1);
  }
}

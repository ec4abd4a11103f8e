/**
 * Inference Engine
 * Merge per-page section forests into a scored module catalog
 */

import { TextProcessor } from '../processing/text.processor';
import type { Section } from '../processing/processing.types';
import { scoreConfidence } from './confidence';
import {
  Candidate,
  CandidateKind,
  DEFAULT_INFERENCE_CONFIG,
  InferenceConfig,
  Module,
  PageForest,
  Submodule,
} from './inference.types';
import { isNoiseTitle, normalizeTitle, titleSimilarity, titleWordCount } from './title.utils';

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Unique non-empty bodies, longest first. Equal lengths keep their order.
 */
function orderBodies(bodies: string[]): string[] {
  return unique(bodies.filter((body) => body.length > 0)).sort((a, b) => b.length - a.length);
}

function cloneCandidate(candidate: Candidate): Candidate {
  return {
    ...candidate,
    bodies: [...candidate.bodies],
    sourceUrls: [...candidate.sourceUrls],
    children: candidate.children.map(cloneCandidate),
  };
}

function sortByConfidence<T extends { confidence: number }>(items: T[]): T[] {
  // Array.prototype.sort is stable, so ties keep first-seen order
  return [...items].sort((a, b) => b.confidence - a.confidence);
}

export class InferenceEngine {
  private config: InferenceConfig;
  private text: TextProcessor;

  constructor(config?: Partial<InferenceConfig>) {
    this.config = { ...DEFAULT_INFERENCE_CONFIG, ...config };
    this.text = new TextProcessor();
  }

  getConfig(): Readonly<InferenceConfig> {
    return this.config;
  }

  /**
   * Build the catalog. Pages are read in the order given, which defines
   * first-seen order for names and tie-breaking.
   */
  infer(forests: PageForest[]): Module[] {
    const candidates: Candidate[] = [];
    for (const forest of forests) {
      this.collect(forest.sections, forest.sourceUrl, null, candidates);
    }

    const modules = sortByConfidence(candidates.map((candidate) => this.toModule(candidate)));
    const submoduleCount = modules.reduce((sum, module) => sum + module.submodules.length, 0);
    console.log(
      `Inference: ${modules.length} module(s), ${submoduleCount} submodule(s) from ${forests.length} page(s)`
    );
    return modules;
  }

  /**
   * Whether two titles name the same topic
   */
  matches(a: Candidate, b: Candidate): boolean {
    return a.key === b.key || titleSimilarity(a.key, b.key) >= this.config.similarityThreshold;
  }

  /**
   * Merge two candidates into a new one; neither input is modified.
   * The first keeps its name. Merging a candidate with itself yields an
   * equal candidate.
   */
  mergeCandidates(a: Candidate, b: Candidate): Candidate {
    const merged = cloneCandidate(a);
    this.absorb(merged, b);
    return merged;
  }

  createCandidate(
    section: Section,
    kind: CandidateKind,
    sourceUrl: string = section.sourceUrl
  ): Candidate {
    return {
      kind,
      name: section.title,
      key: normalizeTitle(section.title),
      bodies: section.bodyText ? [section.bodyText] : [],
      sourceUrls: [sourceUrl],
      children: [],
      hasChildren: section.children.some((child) => !isNoiseTitle(child.title)),
    };
  }

  /**
   * Levels up to maxModuleLevel open module candidates. Deeper levels up to
   * maxSubmoduleLevel attach as submodules to the nearest enclosing module
   * and are dropped when there is none. A noise title drops its subtree.
   */
  private collect(
    sections: Section[],
    sourceUrl: string,
    parent: Candidate | null,
    modules: Candidate[]
  ): void {
    for (const section of sections) {
      if (isNoiseTitle(section.title)) {
        continue;
      }
      if (section.level <= this.config.maxModuleLevel) {
        const target = this.mergeInto(modules, this.createCandidate(section, 'module', sourceUrl));
        this.collect(section.children, sourceUrl, target, modules);
        continue;
      }

      if (section.level <= this.config.maxSubmoduleLevel && parent) {
        this.mergeInto(parent.children, this.createCandidate(section, 'submodule', sourceUrl));
      }
      this.collect(section.children, sourceUrl, parent, modules);
    }
  }

  private mergeInto(list: Candidate[], incoming: Candidate): Candidate {
    const existing = list.find((candidate) => this.matches(candidate, incoming));
    if (!existing) {
      list.push(incoming);
      return incoming;
    }
    this.absorb(existing, incoming);
    return existing;
  }

  private absorb(target: Candidate, source: Candidate): void {
    target.sourceUrls = unique([...target.sourceUrls, ...source.sourceUrls]);
    target.bodies = orderBodies([...target.bodies, ...source.bodies]);
    target.hasChildren = target.hasChildren || source.hasChildren;
    for (const child of source.children) {
      this.mergeInto(target.children, cloneCandidate(child));
    }
  }

  private toSubmodule(candidate: Candidate): Submodule {
    const description = this.text.describe(
      candidate.name,
      orderBodies(candidate.bodies).join(' '),
      this.config.submoduleSentences,
      'submodule'
    );
    return {
      name: candidate.name,
      description,
      confidence: scoreConfidence(
        {
          kind: 'submodule',
          description,
          hasChildren: candidate.hasChildren,
          titleWords: titleWordCount(candidate.name),
        },
        this.config
      ),
      sourceUrls: [...candidate.sourceUrls],
    };
  }

  private toModule(candidate: Candidate): Module {
    const ranked = candidate.children
      .map((child) => ({ child, submodule: this.toSubmodule(child) }))
      .sort((a, b) => b.submodule.confidence - a.submodule.confidence);

    const childBodies = ranked
      .slice(0, this.config.topChildren)
      .flatMap(({ child }) => orderBodies(child.bodies));
    const description = this.text.describe(
      candidate.name,
      [...orderBodies(candidate.bodies), ...childBodies].join(' '),
      this.config.moduleSentences,
      'module'
    );

    return {
      name: candidate.name,
      description,
      confidence: scoreConfidence(
        {
          kind: 'module',
          description,
          hasChildren: ranked.length > 0,
          titleWords: titleWordCount(candidate.name),
        },
        this.config
      ),
      sourceUrls: [...candidate.sourceUrls],
      submodules: ranked.map(({ submodule }) => submodule),
    };
  }
}

export const inferenceEngine = new InferenceEngine();

export function infer(forests: PageForest[]): Module[] {
  return inferenceEngine.infer(forests);
}

/**
 * Inference Types
 * Module catalog entries and scoring constants
 */

import { env } from '../../config/env';
import type { Section } from '../processing/processing.types';

export interface Submodule {
  name: string;
  description: string;
  confidence: number;
  sourceUrls: string[];
}

export interface Module extends Submodule {
  submodules: Submodule[];
}

/**
 * Section forest of one page
 */
export interface PageForest {
  sourceUrl: string;
  sections: Section[];
}

export type CandidateKind = 'module' | 'submodule';

/**
 * Merge unit before scoring. bodies is kept longest first so the richest
 * text leads every summary.
 */
export interface Candidate {
  kind: CandidateKind;
  name: string;
  key: string;
  bodies: string[];
  sourceUrls: string[];
  children: Candidate[];
  hasChildren: boolean;
}

export interface InferenceConfig {
  similarityThreshold: number;
  moduleBaseConfidence: number;
  submoduleBaseConfidence: number;
  confidencePerWord: number;
  maxLengthBonus: number;
  structureBonus: number;
  shortTitlePenalty: number;
  minConfidence: number;
  maxConfidence: number;
  /** Submodules whose bodies feed a module description */
  topChildren: number;
  moduleSentences: number;
  submoduleSentences: number;
  maxModuleLevel: number;
  maxSubmoduleLevel: number;
}

export const DEFAULT_INFERENCE_CONFIG: InferenceConfig = {
  similarityThreshold: env.SIMILARITY_THRESHOLD,
  moduleBaseConfidence: 0.6,
  submoduleBaseConfidence: 0.5,
  confidencePerWord: 0.01,
  maxLengthBonus: 0.2,
  structureBonus: 0.1,
  shortTitlePenalty: 0.1,
  minConfidence: 0.3,
  maxConfidence: 0.95,
  topChildren: 5,
  moduleSentences: 3,
  submoduleSentences: 2,
  maxModuleLevel: 2,
  maxSubmoduleLevel: 4,
};

/**
 * Confidence Scoring
 */

import { wordCount } from '../processing/text.processor';
import { CandidateKind, InferenceConfig } from './inference.types';

export interface ConfidenceInput {
  kind: CandidateKind;
  description: string;
  hasChildren: boolean;
  titleWords: number;
}

/**
 * base + length bonus + structure bonus - short title penalty, clamped to
 * [minConfidence, maxConfidence] and rounded to two decimals
 */
export function scoreConfidence(input: ConfidenceInput, config: InferenceConfig): number {
  const base =
    input.kind === 'module' ? config.moduleBaseConfidence : config.submoduleBaseConfidence;
  const lengthBonus = Math.min(
    config.maxLengthBonus,
    config.confidencePerWord * wordCount(input.description)
  );
  const structureBonus = input.hasChildren ? config.structureBonus : 0;
  const titlePenalty = input.titleWords < 2 ? config.shortTitlePenalty : 0;

  const raw = base + lengthBonus + structureBonus - titlePenalty;
  const clamped = Math.min(config.maxConfidence, Math.max(config.minConfidence, raw));
  return Math.round(clamped * 100) / 100;
}

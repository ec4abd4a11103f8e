/**
 * Title Utilities Tests
 */

import { scoreConfidence } from '../confidence';
import { DEFAULT_INFERENCE_CONFIG } from '../inference.types';
import { isNoiseTitle, normalizeTitle, titleSimilarity, titleWordCount } from '../title.utils';

describe('normalizeTitle', () => {
  it('should strip numbering and trailing marks', () => {
    expect(normalizeTitle('2.3  Getting   Started ¶')).toBe('getting started');
    expect(normalizeTitle('Configuration:')).toBe('configuration');
  });
});

describe('isNoiseTitle', () => {
  it('should flag navigation and page counters', () => {
    expect(isNoiseTitle('Skip to content')).toBe(true);
    expect(isNoiseTitle('Page 3')).toBe(true);
    expect(isNoiseTitle('2 of 10')).toBe(true);
    expect(isNoiseTitle('A')).toBe(true);
  });

  it('should keep real topics', () => {
    expect(isNoiseTitle('API')).toBe(false);
    expect(isNoiseTitle('Search Indexing')).toBe(false);
  });
});

describe('titleSimilarity', () => {
  it('should be an edit-distance ratio', () => {
    expect(titleSimilarity('billing', 'billing')).toBe(1);
    expect(titleSimilarity('user management', 'user managment')).toBeCloseTo(1 - 1 / 15, 5);
    expect(titleSimilarity('', '')).toBe(1);
  });
});

describe('titleWordCount', () => {
  it('should count words of the normalized title', () => {
    expect(titleWordCount('3. Rate Limits')).toBe(2);
  });
});

describe('scoreConfidence', () => {
  it('should combine base, length bonus, structure bonus and title penalty', () => {
    expect(
      scoreConfidence(
        { kind: 'submodule', description: 'one two three four five', hasChildren: true, titleWords: 1 },
        DEFAULT_INFERENCE_CONFIG
      )
    ).toBe(0.55);
  });

  it('should cap the length bonus', () => {
    const description = 'word '.repeat(100);

    expect(
      scoreConfidence({ kind: 'module', description, hasChildren: true, titleWords: 3 }, DEFAULT_INFERENCE_CONFIG)
    ).toBe(0.9);
  });

  it('should clamp to the configured range', () => {
    const config = { ...DEFAULT_INFERENCE_CONFIG, maxConfidence: 0.85, minConfidence: 0.45 };

    expect(
      scoreConfidence({ kind: 'module', description: 'word '.repeat(50), hasChildren: true, titleWords: 3 }, config)
    ).toBe(0.85);
    expect(scoreConfidence({ kind: 'submodule', description: '', hasChildren: false, titleWords: 1 }, config)).toBe(
      0.45
    );
  });
});

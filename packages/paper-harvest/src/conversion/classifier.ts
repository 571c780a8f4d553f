import type { ClassifierThresholds } from '../config.js';
import type { DocumentClassification, DocumentSample, SampleMetrics } from './types.js';

export type ClassificationThresholds = Pick<ClassifierThresholds, 'readableRatio' | 'repeatRatio' | 'repeatRunLength'>;

export const DEFAULT_THRESHOLDS: ClassificationThresholds = {
  readableRatio: 0.5,
  repeatRatio: 0.1,
  repeatRunLength: 3
};

const WORD_CHARACTER = /^[\p{L}\p{N}]$/u;
const WHITESPACE = /^\s$/u;
const COMMON_PUNCTUATION = new Set(Array.from(`.,;:!?'"()-[]{}@#$%&*+=/<>_~\`^|\\，。、；：？！“”‘’（）《》【】…—·`));

const isReadable = (char: string): boolean => WORD_CHARACTER.test(char) || COMMON_PUNCTUATION.has(char);

/**
 * `readableRatio`: letters, digits and common punctuation over non-whitespace characters.
 * `repeatRatio`: positions that start a run of `runLength` identical non-whitespace characters,
 * over all characters.
 */
export const measureSample = (text: string, runLength: number = DEFAULT_THRESHOLDS.repeatRunLength): SampleMetrics => {
  const chars = Array.from(text);
  let nonWhitespace = 0;
  let readable = 0;
  let repeatStarts = 0;

  for (const [index, char] of chars.entries()) {
    if (WHITESPACE.test(char)) {
      continue;
    }

    nonWhitespace += 1;
    if (isReadable(char)) {
      readable += 1;
    }

    if (index + runLength <= chars.length && chars.slice(index, index + runLength).every((next) => next === char)) {
      repeatStarts += 1;
    }
  }

  return {
    readableRatio: nonWhitespace === 0 ? 0 : readable / nonWhitespace,
    repeatRatio: chars.length === 0 ? 0 : repeatStarts / chars.length,
    characters: chars.length
  };
};

export const classifyText = (
  text: string,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS
): DocumentClassification => {
  if (text.trim().length === 0) {
    return 'Scanned';
  }

  const metrics = measureSample(text, thresholds.repeatRunLength);
  if (metrics.readableRatio < thresholds.readableRatio || metrics.repeatRatio > thresholds.repeatRatio) {
    return 'Garbled';
  }

  return 'TextLayer';
};

/** Pure: the same sample and thresholds always give the same answer. A missing sample is `Unknown`. */
export const classify = (
  sample: DocumentSample | null,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS
): DocumentClassification => (sample === null ? 'Unknown' : classifyText(sample.text, thresholds));

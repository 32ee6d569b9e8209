import type { QuantitativeMetrics } from "../types.js";
import { countPattern, ratio, splitSentences, extractWords } from "./helpers.js";

const EMOJI = /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}]/gu;
const HASHTAG = /#[\p{L}\p{N}_]+/gu;

/**
 * Words per sentence, splitting on runs of terminal punctuation.
 */
export function averageSentenceLength(text: string): number {
  const sentences = splitSentences(text);
  const totalWords = sentences.reduce(
    (sum, s) => sum + s.split(/\s+/).length,
    0
  );
  return ratio(totalWords, sentences.length);
}

/**
 * Characters per word token.
 */
export function averageWordLength(text: string): number {
  const words = extractWords(text);
  const totalChars = words.reduce((sum, w) => sum + [...w].length, 0);
  return ratio(totalChars, words.length);
}

/**
 * Quantitative style signals over a batch of samples. Frequencies are
 * occurrences per sample across the whole batch.
 */
export function quantitativeAnalysis(samples: string[]): QuantitativeMetrics {
  const totalText = samples.join(" ");
  const n = samples.length;

  return {
    avgSentenceLength: averageSentenceLength(totalText),
    avgWordLength: averageWordLength(totalText),
    emojiFrequency: ratio(countPattern(totalText, EMOJI), n),
    hashtagFrequency: ratio(countPattern(totalText, HASHTAG), n),
    exclamationFrequency: ratio(countPattern(totalText, /!/g), n),
    questionFrequency: ratio(countPattern(totalText, /\?/g), n),
  };
}

// ─── StyleProfile: learned description of a writing voice ────────────────────

export interface StyleProfile
  extends StyleDescriptors,
    QuantitativeMetrics {
  version: 1;
  analyzedAt: string;
  sampleCount: number;
}

// ─── Qualitative descriptors (from the language model) ───────────────────────

export interface StyleDescriptors {
  tone: string;
  voice: string;
  vocabularyLevel: string;
  sentenceStyle: string;
  punctuationPatterns: string[];
  emojiUsage: string;
  hashtagStyle: string;
  commonPhrases: string[];
  personalityTraits: string[];
  topicsOfInterest: string[];
  writingQuirks: string[];
}

// ─── Quantitative metrics (always computed from samples) ─────────────────────

export interface QuantitativeMetrics {
  avgSentenceLength: number;
  avgWordLength: number;
  /** Emoji per sample, not a proportion. */
  emojiFrequency: number;
  hashtagFrequency: number;
  exclamationFrequency: number;
  questionFrequency: number;
}

export interface StyleThresholds {
  emojiThreshold: number;
  hashtagThreshold: number;
}

/**
 * The part of a language-model client the analyzer needs.
 */
export interface StyleAnalysisModel {
  analyze(prompt: string): Promise<string>;
}

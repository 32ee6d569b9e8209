import {
  attempt,
  createChildLogger,
  formatError,
  type StyleSettings,
} from "@echopost/core";
import type {
  QuantitativeMetrics,
  StyleAnalysisModel,
  StyleDescriptors,
  StyleProfile,
  StyleThresholds,
} from "./types.js";
import { quantitativeAnalysis } from "./analyzers/text-metrics.js";
import { extractJsonObject } from "./parse.js";
import { buildAnalysisPrompt } from "./prompts.js";
import { ModelStyleAnalysisSchema } from "./schema.js";
import { formatStylePrompt } from "./format.js";

const logger = createChildLogger({ module: "style-fingerprint:analyze" });

export type StyleAnalyzerOptions = Partial<StyleSettings> & {
  now?: () => Date;
};

const DEFAULTS: StyleSettings = {
  maxSamples: 10,
  maxPromptChars: 8000,
  emojiThreshold: 0.5,
  hashtagThreshold: 0.2,
};

/**
 * Learns a StyleProfile from writing samples and renders it as a
 * directive for generation prompts. Owns the current profile.
 */
export class StyleAnalyzer {
  private profile: StyleProfile | null = null;
  private readonly settings: StyleSettings;
  private readonly now: () => Date;

  constructor(
    private readonly model: StyleAnalysisModel,
    options: StyleAnalyzerOptions = {}
  ) {
    const { now, ...settings } = options;
    this.settings = { ...DEFAULTS, ...settings };
    this.now = now ?? (() => new Date());
  }

  get thresholds(): StyleThresholds {
    return {
      emojiThreshold: this.settings.emojiThreshold,
      hashtagThreshold: this.settings.hashtagThreshold,
    };
  }

  getProfile(): StyleProfile | null {
    return this.profile;
  }

  setProfile(profile: StyleProfile | null): void {
    this.profile = profile;
  }

  /**
   * Analyze samples into a full profile and make it current.
   * Returns null, without calling the model, when there are no samples.
   */
  async analyzeSamples(samples: string[]): Promise<StyleProfile | null> {
    if (samples.length === 0) {
      logger.warn("No samples provided for analysis");
      return null;
    }

    logger.info({ sampleCount: samples.length }, "Analyzing writing samples");

    const combined = samples
      .slice(0, this.settings.maxSamples)
      .join("\n\n---\n\n")
      .slice(0, this.settings.maxPromptChars);

    const quantitative = quantitativeAnalysis(samples);
    const descriptors = await this.describe(combined, quantitative);

    const profile: StyleProfile = {
      version: 1,
      analyzedAt: this.now().toISOString(),
      sampleCount: samples.length,
      ...descriptors,
      ...quantitative,
    };

    this.profile = profile;
    return profile;
  }

  getStylePrompt(): string {
    return formatStylePrompt(this.profile, this.thresholds);
  }

  private async describe(
    samplesText: string,
    quantitative: QuantitativeMetrics
  ): Promise<StyleDescriptors> {
    const response = await attempt(() =>
      this.model.analyze(buildAnalysisPrompt(samplesText))
    );
    if (!response.success) {
      logger.error(
        { error: formatError(response.error) },
        "Style analysis call failed, using default profile"
      );
      return this.defaultDescriptors(quantitative);
    }

    const json = extractJsonObject(response.value);
    if (!json.success) {
      logger.error(
        { preview: response.value.slice(0, 200) },
        "Failed to extract style profile from model response, using default profile"
      );
      return this.defaultDescriptors(quantitative);
    }

    const fields = ModelStyleAnalysisSchema.parse(json.value);
    const fallback = this.defaultDescriptors(quantitative);

    logger.info("Style analysis completed");

    return {
      tone: fields.tone,
      voice: fields.voice,
      vocabularyLevel: fields.vocabulary_level,
      sentenceStyle: fields.sentence_style,
      punctuationPatterns: fields.punctuation_patterns,
      emojiUsage: fields.emoji_usage ?? fallback.emojiUsage,
      hashtagStyle: fields.hashtag_style ?? fallback.hashtagStyle,
      commonPhrases: fields.common_phrases,
      personalityTraits: fields.personality_traits,
      topicsOfInterest: fields.topics_of_interest,
      writingQuirks: fields.writing_quirks,
    };
  }

  private defaultDescriptors(
    quantitative: QuantitativeMetrics
  ): StyleDescriptors {
    const { emojiThreshold, hashtagThreshold } = this.settings;
    return {
      tone: "neutral",
      voice: "conversational",
      vocabularyLevel: "moderate",
      sentenceStyle: "varied",
      punctuationPatterns: ["standard"],
      emojiUsage:
        quantitative.emojiFrequency > emojiThreshold ? "moderate" : "rare",
      hashtagStyle:
        quantitative.hashtagFrequency > hashtagThreshold ? "occasional" : "none",
      commonPhrases: [],
      personalityTraits: [],
      topicsOfInterest: [],
      writingQuirks: [],
    };
  }
}

import { z } from "zod";
import type { StyleProfile } from "./types.js";

const descriptor = (fallback: string) => z.string().min(1).catch(fallback);
const list = z.array(z.string()).catch([]);

/**
 * Shape we ask the model for. Every field tolerates absence or a wrong
 * type, falling back to a neutral value.
 */
export const ModelStyleAnalysisSchema = z.object({
  tone: descriptor("neutral"),
  voice: descriptor("conversational"),
  vocabulary_level: descriptor("moderate"),
  sentence_style: descriptor("varied"),
  punctuation_patterns: list,
  emoji_usage: z.string().min(1).optional().catch(undefined),
  hashtag_style: z.string().min(1).optional().catch(undefined),
  common_phrases: list,
  personality_traits: list,
  topics_of_interest: list,
  writing_quirks: list,
});

export type ModelStyleAnalysis = z.infer<typeof ModelStyleAnalysisSchema>;

const metric = z.number().nonnegative();

export const StyleProfileSchema: z.ZodType<StyleProfile> = z.object({
  version: z.literal(1),
  analyzedAt: z.string(),
  sampleCount: z.number().int().nonnegative(),
  tone: z.string(),
  voice: z.string(),
  vocabularyLevel: z.string(),
  sentenceStyle: z.string(),
  punctuationPatterns: z.array(z.string()),
  emojiUsage: z.string(),
  hashtagStyle: z.string(),
  commonPhrases: z.array(z.string()),
  personalityTraits: z.array(z.string()),
  topicsOfInterest: z.array(z.string()),
  writingQuirks: z.array(z.string()),
  avgSentenceLength: metric,
  avgWordLength: metric,
  emojiFrequency: metric,
  hashtagFrequency: metric,
  exclamationFrequency: metric,
  questionFrequency: metric,
});

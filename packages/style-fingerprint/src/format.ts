import type { StyleProfile, StyleThresholds } from "./types.js";

export type FormatMode = "prompt" | "detailed";

export const DEFAULT_STYLE_PROMPT = "Write in a natural, conversational style.";

const DEFAULT_THRESHOLDS: StyleThresholds = {
  emojiThreshold: 0.5,
  hashtagThreshold: 0.2,
};

/**
 * Render a profile as a one-line directive for generation prompts.
 * Clause order is fixed: tone, voice, vocabulary, personality, phrases,
 * sentence length, emoji, hashtags.
 */
export function formatStylePrompt(
  profile: StyleProfile | null,
  thresholds: StyleThresholds = DEFAULT_THRESHOLDS
): string {
  if (!profile) return DEFAULT_STYLE_PROMPT;

  const parts: string[] = [
    `Tone: ${profile.tone}`,
    `Voice: ${profile.voice}`,
    `Vocabulary: ${profile.vocabularyLevel}`,
  ];

  if (profile.personalityTraits.length > 0) {
    parts.push(`Personality: ${profile.personalityTraits.join(", ")}`);
  }

  if (profile.commonPhrases.length > 0) {
    parts.push(`Common phrases: ${profile.commonPhrases.slice(0, 3).join(", ")}`);
  }

  if (profile.avgSentenceLength < 10) {
    parts.push("Use short, punchy sentences");
  } else if (profile.avgSentenceLength > 20) {
    parts.push("Use longer, more detailed sentences");
  }

  if (profile.emojiFrequency > thresholds.emojiThreshold) {
    parts.push("Include emojis occasionally");
  }

  if (profile.hashtagFrequency > thresholds.hashtagThreshold) {
    parts.push("Use relevant hashtags");
  }

  return parts.join(". ") + ".";
}

/**
 * Format a profile for people ("detailed") or for the model ("prompt").
 */
export function formatStyleProfile(
  profile: StyleProfile,
  mode: FormatMode = "detailed",
  thresholds: StyleThresholds = DEFAULT_THRESHOLDS
): string {
  switch (mode) {
    case "prompt":
      return formatStylePrompt(profile, thresholds);
    case "detailed":
      return formatDetailed(profile);
  }
}

function formatList(items: string[]): string {
  return items.length > 0 ? items.join(", ") : "(none)";
}

function formatDetailed(profile: StyleProfile): string {
  const lines: string[] = [];

  lines.push(`Style Profile v${profile.version}`);
  lines.push(`Analyzed: ${profile.analyzedAt}`);
  lines.push(`Samples: ${profile.sampleCount}`);
  lines.push("");

  lines.push("── Descriptors ──");
  lines.push(`  Tone:            ${profile.tone}`);
  lines.push(`  Voice:           ${profile.voice}`);
  lines.push(`  Vocabulary:      ${profile.vocabularyLevel}`);
  lines.push(`  Sentences:       ${profile.sentenceStyle}`);
  lines.push(`  Emoji usage:     ${profile.emojiUsage}`);
  lines.push(`  Hashtag style:   ${profile.hashtagStyle}`);
  lines.push(`  Punctuation:     ${formatList(profile.punctuationPatterns)}`);
  lines.push(`  Phrases:         ${formatList(profile.commonPhrases)}`);
  lines.push(`  Personality:     ${formatList(profile.personalityTraits)}`);
  lines.push(`  Topics:          ${formatList(profile.topicsOfInterest)}`);
  lines.push(`  Quirks:          ${formatList(profile.writingQuirks)}`);
  lines.push("");

  lines.push("── Metrics ──");
  lines.push(`  Avg sentence length:  ${profile.avgSentenceLength.toFixed(1)} words`);
  lines.push(`  Avg word length:      ${profile.avgWordLength.toFixed(1)} chars`);
  lines.push(`  Emoji per sample:     ${profile.emojiFrequency.toFixed(2)}`);
  lines.push(`  Hashtags per sample:  ${profile.hashtagFrequency.toFixed(2)}`);
  lines.push(`  Exclamations/sample:  ${profile.exclamationFrequency.toFixed(2)}`);
  lines.push(`  Questions per sample: ${profile.questionFrequency.toFixed(2)}`);

  return lines.join("\n");
}

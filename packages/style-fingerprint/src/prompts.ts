export const ANALYSIS_FIELDS = [
  "tone",
  "voice",
  "vocabulary_level",
  "sentence_style",
  "punctuation_patterns",
  "emoji_usage",
  "hashtag_style",
  "common_phrases",
  "personality_traits",
  "topics_of_interest",
  "writing_quirks",
] as const;

export function buildAnalysisPrompt(samplesText: string): string {
  return `Analyze the following writing samples and extract detailed style characteristics. Focus on:

1. Tone and voice (formal, casual, humorous, serious, etc.)
2. Vocabulary level and word choice patterns
3. Sentence structure (short/long sentences, complexity)
4. Punctuation style
5. Use of emojis, if any
6. Use of hashtags and their style
7. Common phrases or expressions
8. Writing rhythm and flow
9. Topic preferences
10. Personality traits evident in writing

Writing samples:
${samplesText}

Respond with a single JSON object containing exactly these fields:
{
  "tone": "description of overall tone",
  "voice": "description of voice characteristics",
  "vocabulary_level": "simple/moderate/advanced",
  "sentence_style": "description of sentence patterns",
  "punctuation_patterns": ["pattern1", "pattern2"],
  "emoji_usage": "none/rare/moderate/frequent",
  "hashtag_style": "description or none",
  "common_phrases": ["phrase1", "phrase2"],
  "personality_traits": ["trait1", "trait2"],
  "topics_of_interest": ["topic1", "topic2"],
  "writing_quirks": ["quirk1", "quirk2"]
}`;
}

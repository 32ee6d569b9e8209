import {
  attempt,
  createChildLogger,
  formatError,
  type ContentGenerationSettings,
  type ReplySettings,
} from "@echopost/core";
import type { StyleAnalyzer } from "@echopost/style-fingerprint";
import type { LlmClient } from "./llm.js";
import { cleanTweet } from "./clean.js";
import { parseIdeas } from "./ideas.js";
import { buildIdeasPrompt, buildReplyPrompt, buildTweetPrompt } from "./prompts.js";

const logger = createChildLogger({ module: "content-pipeline:generator" });

export const FALLBACK_POSTS = [
  "Thinking about innovation and the future of technology.",
  "Excited about what's next!",
  "Just sharing some thoughts today.",
  "Interesting times we're living in.",
  "Always learning, always growing.",
] as const;

export const FALLBACK_REPLIES = [
  "Interesting perspective!",
  "Thanks for sharing this!",
  "Great point!",
  "This is thought-provoking.",
  "Appreciate the insights!",
] as const;

export interface ContentGeneratorSettings {
  contentGeneration: ContentGenerationSettings;
  replies: ReplySettings;
}

export type StyleSource = Pick<
  StyleAnalyzer,
  "getStylePrompt" | "getProfile" | "thresholds"
>;

export interface ReplyCandidate {
  text: string;
}

/**
 * Writes posts, replies and topic ideas in the learned style. Generation
 * never throws: model failures fall back to canned text or an empty list.
 */
export class ContentGenerator {
  constructor(
    private readonly llm: Pick<LlmClient, "generate">,
    private readonly style: StyleSource,
    private readonly settings: ContentGeneratorSettings,
    private readonly random: () => number = Math.random
  ) {}

  async generateTweet(topic?: string, context?: string): Promise<string> {
    const { contentGeneration } = this.settings;
    const profile = this.style.getProfile();

    const prompt = buildTweetPrompt({
      stylePrompt: this.style.getStylePrompt(),
      topic,
      context,
      maxHashtags: contentGeneration.includeHashtags
        ? contentGeneration.maxHashtags
        : undefined,
      emojis:
        contentGeneration.includeEmojis &&
        profile !== null &&
        profile.emojiFrequency > this.style.thresholds.emojiThreshold,
    });

    const tweet = await this.complete(prompt);
    if (tweet === null) return this.pick(FALLBACK_POSTS);

    logger.info({ preview: tweet.slice(0, 50), topic }, "Generated tweet");
    return tweet;
  }

  async generateReply(originalText: string, originalAuthor?: string): Promise<string> {
    const prompt = buildReplyPrompt({
      stylePrompt: this.style.getStylePrompt(),
      originalText,
      originalAuthor,
    });

    const reply = await this.complete(prompt);
    if (reply === null) return this.pick(FALLBACK_REPLIES);

    logger.info({ preview: reply.slice(0, 50), originalAuthor }, "Generated reply");
    return reply;
  }

  async generateTweetIdeas(count = 5): Promise<string[]> {
    const topics = this.style.getProfile()?.topicsOfInterest ?? [];

    const response = await attempt(() =>
      this.llm.generate(buildIdeasPrompt(count, topics), {
        temperature: 0.9,
        maxTokens: 300,
      })
    );
    if (!response.success) {
      logger.error({ error: formatError(response.error) }, "Failed to generate tweet ideas");
      return [];
    }

    const ideas = parseIdeas(response.value, count);
    logger.info({ count: ideas.length }, "Generated tweet ideas");
    return ideas;
  }

  shouldReplyToTweet(candidate: ReplyCandidate): boolean {
    const { replyProbability, keywordsToMonitor } = this.settings.replies;

    if (this.random() >= replyProbability) return false;
    if (keywordsToMonitor.length === 0) return true;

    const text = candidate.text.toLowerCase();
    const keyword = keywordsToMonitor.find((k) => text.includes(k.toLowerCase()));
    if (keyword === undefined) return false;

    logger.info({ keyword }, "Tweet matches keyword");
    return true;
  }

  /** Cleaned model output, or null when the call failed or left nothing. */
  private async complete(prompt: string): Promise<string | null> {
    const { temperature, maxTokens } = this.settings.contentGeneration;

    const response = await attempt(() =>
      this.llm.generate(prompt, { temperature, maxTokens })
    );
    if (!response.success) {
      logger.error({ error: formatError(response.error) }, "Generation failed, using fallback");
      return null;
    }

    const text = cleanTweet(response.value);
    if (!text) {
      logger.warn("Model returned empty text, using fallback");
      return null;
    }
    return text;
  }

  private pick(pool: readonly string[]): string {
    const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
    return pool[index];
  }
}

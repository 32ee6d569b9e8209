import { z } from "zod";

// ─── Posting ────────────────────────────────────────────────────────────────

export const PostingSettingsSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxPostsPerDay: z.number().int().positive().default(10),
    postingHours: z
      .object({
        start: z.number().int().min(0).max(23).default(9),
        end: z.number().int().min(0).max(24).default(21),
      })
      .default({}),
    intervalJitter: z.number().min(0).max(1).default(0.2),
  })
  .default({});

// ─── Replies ────────────────────────────────────────────────────────────────

export const ReplySettingsSchema = z
  .object({
    enabled: z.boolean().default(true),
    // Longer delays overflow setTimeout.
    checkIntervalMinutes: z.number().positive().max(35_000).default(30),
    replyProbability: z.number().min(0).max(1).default(0.3),
    keywordsToMonitor: z.array(z.string()).default([]),
    maxRepliesPerCheck: z.number().int().nonnegative().default(5),
    maxMentionsPerCheck: z.number().int().positive().default(10),
    timelineFetchSize: z.number().int().positive().default(20),
  })
  .default({});

// ─── Content generation ─────────────────────────────────────────────────────

export const ContentGenerationSettingsSchema = z
  .object({
    temperature: z.number().min(0).max(2).default(0.8),
    maxTokens: z.number().int().positive().default(100),
    includeHashtags: z.boolean().default(false),
    maxHashtags: z.number().int().nonnegative().default(3),
    includeEmojis: z.boolean().default(false),
  })
  .default({});

// ─── Style analysis ─────────────────────────────────────────────────────────

export const StyleSettingsSchema = z
  .object({
    maxSamples: z.number().int().positive().default(10),
    maxPromptChars: z.number().int().positive().default(8000),
    emojiThreshold: z.number().nonnegative().default(0.5),
    hashtagThreshold: z.number().nonnegative().default(0.2),
  })
  .default({});

// ─── Root ───────────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
  posting: PostingSettingsSchema,
  replies: ReplySettingsSchema,
  contentGeneration: ContentGenerationSettingsSchema,
  style: StyleSettingsSchema,
});

export type Settings = z.infer<typeof SettingsSchema>;
export type PostingSettings = Settings["posting"];
export type ReplySettings = Settings["replies"];
export type ContentGenerationSettings = Settings["contentGeneration"];
export type StyleSettings = Settings["style"];

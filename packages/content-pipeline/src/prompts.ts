import { MAX_POST_LENGTH } from "@echopost/core";

const RETURN_ONLY = (what: string) =>
  `IMPORTANT: Return ONLY the ${what} text, nothing else. No quotes, no explanations.`;

export interface TweetPromptInput {
  stylePrompt: string;
  topic?: string;
  context?: string;
  /** Set when hashtags are wanted. */
  maxHashtags?: number;
  emojis: boolean;
}

export function buildTweetPrompt(input: TweetPromptInput): string {
  const parts = [
    `Generate a single tweet (max ${MAX_POST_LENGTH} characters) that sounds natural and authentic.`,
    `Writing style requirements: ${input.stylePrompt}`,
  ];

  if (input.topic) parts.push(`Topic: ${input.topic}`);
  if (input.context) parts.push(`Context/Inspiration: ${input.context}`);

  if (input.maxHashtags !== undefined) {
    parts.push(`Include up to ${input.maxHashtags} relevant hashtags if appropriate.`);
  }
  if (input.emojis) {
    parts.push("Include emojis where they feel natural.");
  }

  parts.push(RETURN_ONLY("tweet"));
  return parts.join("\n\n");
}

export interface ReplyPromptInput {
  stylePrompt: string;
  originalText: string;
  originalAuthor?: string;
}

export function buildReplyPrompt(input: ReplyPromptInput): string {
  const parts = [
    "Generate a thoughtful and engaging reply to the following tweet.",
    `Original tweet: ${input.originalText}`,
  ];

  if (input.originalAuthor) parts.push(`Replying to: @${input.originalAuthor}`);

  parts.push(`Writing style requirements: ${input.stylePrompt}`);
  parts.push(
    [
      "The reply should:",
      "- Be relevant and add value to the conversation",
      "- Sound natural and authentic",
      `- Be max ${MAX_POST_LENGTH} characters`,
      "- Not be overly promotional or spammy",
    ].join("\n")
  );
  parts.push(RETURN_ONLY("reply"));

  return parts.join("\n\n");
}

export function buildIdeasPrompt(count: number, topics: string[]): string {
  const parts = [`Generate ${count} interesting and engaging tweet topic ideas.`];

  if (topics.length > 0) {
    parts.push(`Preferred topics: ${topics.slice(0, 5).join(", ")}`);
  }

  parts.push(
    "Provide diverse topics that would make for engaging tweets.\nReturn as a numbered list, one topic per line."
  );
  return parts.join("\n\n");
}

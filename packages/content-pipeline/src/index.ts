export {
  createLlmClient,
  ANALYZER_SYSTEM_PROMPT,
  type LlmClient,
  type LlmConfig,
  type GenerateOptions,
} from "./llm.js";
export {
  ContentGenerator,
  FALLBACK_POSTS,
  FALLBACK_REPLIES,
  type ContentGeneratorSettings,
  type ReplyCandidate,
  type StyleSource,
} from "./generator.js";
export { cleanTweet } from "./clean.js";
export { parseIdeas } from "./ideas.js";
export { buildTweetPrompt, buildReplyPrompt, buildIdeasPrompt } from "./prompts.js";

export { TwitterPlatform, type TwitterConfig } from "./adapters/twitter.js";
export { prepareText } from "./text.js";
export type {
  PlatformClient,
  PlatformAccount,
  PlatformError,
  PlatformResult,
  PostedTweet,
  PostedReply,
  Mention,
  TimelineTweet,
} from "./types.js";

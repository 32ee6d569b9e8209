import type { ProviderError, Result, ValidationError } from "@echopost/core";

export interface PlatformAccount {
  id: string;
  handle: string;
}

export interface PostedTweet {
  id: string;
  text: string;
  createdAt: string;
}

export interface PostedReply extends PostedTweet {
  replyTo: string;
}

export interface Mention {
  id: string;
  text: string;
  authorId: string;
  createdAt: string;
  conversationId?: string;
}

export interface TimelineTweet {
  id: string;
  text: string;
  authorId: string;
  authorHandle: string;
  createdAt: string;
}

export type PlatformError = ProviderError | ValidationError;

export type PlatformResult<T> = Result<T, PlatformError>;

/**
 * The social platform as the scheduler sees it. Calls never reject;
 * failures come back as results.
 */
export interface PlatformClient {
  getAccount(): Promise<PlatformResult<PlatformAccount>>;
  postText(text: string): Promise<PlatformResult<PostedTweet>>;
  replyTo(tweetId: string, text: string): Promise<PlatformResult<PostedReply>>;
  /** Newest first. */
  getMentions(sinceId: string | undefined, max: number): Promise<PlatformResult<Mention[]>>;
  getTimeline(max: number): Promise<PlatformResult<TimelineTweet[]>>;
}

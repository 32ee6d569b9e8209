import {
  ProviderError,
  attempt,
  createChildLogger,
  fail,
  formatError,
  ok,
} from "@echopost/core";
import { TwitterApi, type TwitterApiReadWrite } from "twitter-api-v2";
import { prepareText } from "../text.js";
import type {
  Mention,
  PlatformAccount,
  PlatformClient,
  PlatformResult,
  PostedReply,
  PostedTweet,
  TimelineTweet,
} from "../types.js";

const logger = createChildLogger({ module: "publishing:twitter" });

export interface TwitterConfig {
  apiKey: string;
  apiSecret: string;
  accessToken: string;
  accessSecret: string;
}

// Timeline endpoints reject page sizes outside these bounds.
const MENTIONS_PAGE = { min: 5, max: 100 };
const TIMELINE_PAGE = { min: 1, max: 100 };

function clamp(value: number, bounds: { min: number; max: number }): number {
  return Math.min(Math.max(Math.floor(value), bounds.min), bounds.max);
}

/**
 * X/Twitter over the v2 API with OAuth 1.0a user credentials.
 */
export class TwitterPlatform implements PlatformClient {
  private readonly client: TwitterApiReadWrite;
  private account: PlatformAccount | null = null;

  constructor(
    config: TwitterConfig,
    private readonly now: () => Date = () => new Date()
  ) {
    this.client = new TwitterApi({
      appKey: config.apiKey,
      appSecret: config.apiSecret,
      accessToken: config.accessToken,
      accessSecret: config.accessSecret,
    }).readWrite;
  }

  async getAccount(): Promise<PlatformResult<PlatformAccount>> {
    if (this.account) return ok(this.account);

    const result = await this.call("getAccount", () => this.client.v2.me());
    if (!result.success) return result;

    this.account = { id: result.value.data.id, handle: result.value.data.username };
    logger.info({ handle: this.account.handle }, "Authenticated with Twitter");
    return ok(this.account);
  }

  async postText(text: string): Promise<PlatformResult<PostedTweet>> {
    const prepared = prepareText(text);
    if (!prepared.success) return prepared;

    const result = await this.call("postText", () =>
      this.client.v2.tweet(prepared.value)
    );
    if (!result.success) return result;

    const { id } = result.value.data;
    logger.info({ tweetId: id }, "Tweet posted");
    return ok({ id, text: result.value.data.text, createdAt: this.now().toISOString() });
  }

  async replyTo(tweetId: string, text: string): Promise<PlatformResult<PostedReply>> {
    const prepared = prepareText(text);
    if (!prepared.success) return prepared;

    const result = await this.call("replyTo", () =>
      this.client.v2.reply(prepared.value, tweetId)
    );
    if (!result.success) return result;

    const { id } = result.value.data;
    logger.info({ tweetId: id, replyTo: tweetId }, "Reply posted");
    return ok({
      id,
      text: result.value.data.text,
      createdAt: this.now().toISOString(),
      replyTo: tweetId,
    });
  }

  async getMentions(
    sinceId: string | undefined,
    max: number
  ): Promise<PlatformResult<Mention[]>> {
    const account = await this.getAccount();
    if (!account.success) return account;

    const result = await this.call("getMentions", () =>
      this.client.v2.userMentionTimeline(account.value.id, {
        max_results: clamp(max, MENTIONS_PAGE),
        since_id: sinceId,
        "tweet.fields": ["created_at", "author_id", "conversation_id"],
      })
    );
    if (!result.success) return result;

    const mentions = result.value.tweets.slice(0, max).map(
      (tweet): Mention => ({
        id: tweet.id,
        text: tweet.text,
        authorId: tweet.author_id ?? "",
        createdAt: tweet.created_at ?? "",
        conversationId: tweet.conversation_id,
      })
    );

    logger.info({ count: mentions.length, sinceId }, "Fetched mentions");
    return ok(mentions);
  }

  async getTimeline(max: number): Promise<PlatformResult<TimelineTweet[]>> {
    const result = await this.call("getTimeline", () =>
      this.client.v2.homeTimeline({
        max_results: clamp(max, TIMELINE_PAGE),
        expansions: ["author_id"],
        "tweet.fields": ["created_at", "author_id"],
        "user.fields": ["username"],
      })
    );
    if (!result.success) return result;

    const handles = new Map(
      result.value.includes.users.map((user) => [user.id, user.username])
    );

    const tweets = result.value.tweets.slice(0, max).map((tweet): TimelineTweet => {
      const authorId = tweet.author_id ?? "";
      return {
        id: tweet.id,
        text: tweet.text,
        authorId,
        authorHandle: handles.get(authorId) ?? "",
        createdAt: tweet.created_at ?? "",
      };
    });

    logger.info({ count: tweets.length }, "Fetched home timeline");
    return ok(tweets);
  }

  private async call<T>(
    operation: string,
    fn: () => Promise<T>
  ): Promise<PlatformResult<T>> {
    const result = await attempt(fn);
    if (result.success) return result;

    logger.error({ operation, error: formatError(result.error) }, "Twitter request failed");
    return fail(
      new ProviderError("twitter", `${operation} failed: ${result.error.message}`, {
        cause: result.error,
      })
    );
  }
}

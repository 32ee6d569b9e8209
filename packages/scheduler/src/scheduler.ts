import {
  attempt,
  createChildLogger,
  formatError,
  type PostingSettings,
  type ReplySettings,
} from "@echopost/core";
import type { ContentGenerator } from "@echopost/content-pipeline";
import type {
  PlatformClient,
  PlatformResult,
  PostedTweet,
} from "@echopost/publishing";
import { SystemClock, repeating, type Clock, type TimerHandle } from "./clock.js";
import {
  computePostingInterval,
  drawIntervalMinutes,
  minutesToMs,
} from "./intervals.js";
import { SerialQueue } from "./serial-queue.js";

const logger = createChildLogger({ module: "scheduler" });

export type ContentSource = Pick<
  ContentGenerator,
  "generateTweet" | "generateReply" | "generateTweetIdeas" | "shouldReplyToTweet"
>;

export interface SchedulerSettings {
  posting: PostingSettings;
  replies: ReplySettings;
}

export interface SchedulerOptions {
  clock?: Clock;
  random?: () => number;
}

export type SchedulerState = "stopped" | "running";

export interface SchedulerStatus {
  state: SchedulerState;
  postsToday: number;
  lastMentionId?: string;
}

const IDEAS_PER_POST = 3;

/** Snowflake ids grow in length before they grow lexically. */
function isNewer(id: string, than: string): boolean {
  return id.length !== than.length ? id.length > than.length : id > than;
}

/**
 * Posts on a jittered cadence inside the posting window, resets the daily
 * quota at midnight and answers mentions and timeline posts. Every job
 * body runs through one serial queue, so counters never interleave.
 */
export class PostingScheduler {
  private state: SchedulerState = "stopped";
  private timers: TimerHandle[] = [];
  private postsToday = 0;
  private lastMentionId: string | undefined;
  private readonly queue = new SerialQueue();
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    private readonly generator: ContentSource,
    private readonly platform: PlatformClient,
    private readonly settings: SchedulerSettings,
    options: SchedulerOptions = {}
  ) {
    this.clock = options.clock ?? new SystemClock();
    this.random = options.random ?? Math.random;
  }

  get status(): SchedulerStatus {
    return {
      state: this.state,
      postsToday: this.postsToday,
      lastMentionId: this.lastMentionId,
    };
  }

  start(): void {
    if (this.state === "running") {
      logger.warn("Scheduler already running");
      return;
    }
    this.state = "running";

    const { posting, replies } = this.settings;

    if (posting.enabled) {
      this.schedulePostJob();
    }

    this.timers.push(
      this.clock.dailyAt(0, 0, () =>
        this.enqueue("daily-reset", async () => this.resetDailyCount())
      )
    );

    if (replies.enabled) {
      const intervalMs = minutesToMs(replies.checkIntervalMinutes);
      this.timers.push(
        repeating(
          this.clock,
          () => intervalMs,
          () => this.enqueue("reply-monitor", () => this.runReplyMonitor())
        )
      );
      logger.info(
        { everyMinutes: replies.checkIntervalMinutes },
        "Reply monitor scheduled"
      );
    }

    logger.info("Scheduler started");
  }

  stop(): void {
    for (const timer of this.timers) timer.cancel();
    this.timers = [];

    if (this.state === "running") logger.info("Scheduler stopped");
    this.state = "stopped";
  }

  /** Resolves once every job queued so far has finished. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /**
   * Post immediately, outside the cadence. Ignores posting hours and the
   * daily quota but still counts toward it.
   */
  postNow(topic?: string): Promise<PlatformResult<PostedTweet>> {
    return this.queue.run(async () => {
      let chosen = topic;
      if (!chosen) {
        const ideas = await this.generator.generateTweetIdeas(IDEAS_PER_POST);
        chosen = ideas.length > 0 ? ideas[0] : undefined;
      }

      const text = await this.generator.generateTweet(chosen);
      const result = await this.platform.postText(text);

      if (result.success) {
        this.postsToday += 1;
        logger.info(
          { tweetId: result.value.id, postsToday: this.postsToday },
          "Manual post published"
        );
      } else {
        logger.error({ error: result.error.message }, "Manual post failed");
      }
      return result;
    });
  }

  private schedulePostJob(): void {
    const interval = computePostingInterval(this.settings.posting);
    if (!interval) {
      logger.warn(
        { postingHours: this.settings.posting.postingHours },
        "Posting window is empty, post job not scheduled"
      );
      return;
    }

    this.timers.push(
      repeating(
        this.clock,
        () => minutesToMs(drawIntervalMinutes(interval, this.random)),
        () => {
          const firedAt = this.clock.now();
          this.enqueue("post", () => this.runPostJob(firedAt));
        }
      )
    );

    logger.info(
      { minMinutes: interval.minMinutes, maxMinutes: interval.maxMinutes },
      "Post job scheduled"
    );
  }

  private enqueue(job: string, body: () => Promise<void>): void {
    this.queue.run(body).catch((err: unknown) => {
      logger.error({ job, error: formatError(err) }, "Scheduled job failed");
    });
  }

  private resetDailyCount(): void {
    logger.info({ postsYesterday: this.postsToday }, "Resetting daily post count");
    this.postsToday = 0;
  }

  private async runPostJob(firedAt: Date): Promise<void> {
    const { postingHours, maxPostsPerDay } = this.settings.posting;
    const hour = firedAt.getHours();

    if (hour < postingHours.start || hour >= postingHours.end) {
      logger.debug({ hour }, "Outside posting hours, skipping");
      return;
    }
    if (this.postsToday >= maxPostsPerDay) {
      logger.info({ postsToday: this.postsToday }, "Daily post limit reached, skipping");
      return;
    }

    const ideas = await this.generator.generateTweetIdeas(IDEAS_PER_POST);
    const topic = ideas.length > 0 ? this.pick(ideas) : undefined;
    const text = await this.generator.generateTweet(topic);

    const result = await this.platform.postText(text);
    if (!result.success) {
      logger.error({ error: result.error.message }, "Scheduled post failed");
      return;
    }

    this.postsToday += 1;
    logger.info(
      { tweetId: result.value.id, topic, postsToday: this.postsToday },
      "Scheduled post published"
    );
  }

  private async runReplyMonitor(): Promise<void> {
    await this.replyToMentions();
    await this.replyToTimeline();
  }

  private async replyToMentions(): Promise<void> {
    const mentions = await this.platform.getMentions(
      this.lastMentionId,
      this.settings.replies.maxMentionsPerCheck
    );
    if (!mentions.success) {
      logger.error({ error: mentions.error.message }, "Failed to fetch mentions");
      return;
    }

    for (const mention of mentions.value) {
      if (!this.lastMentionId || isNewer(mention.id, this.lastMentionId)) {
        this.lastMentionId = mention.id;
      }
    }

    for (const mention of mentions.value) {
      await this.reply(mention.id, mention.text);
    }
  }

  private async replyToTimeline(): Promise<void> {
    const { maxRepliesPerCheck, timelineFetchSize } = this.settings.replies;

    const account = await this.platform.getAccount();
    if (!account.success) {
      logger.error({ error: account.error.message }, "Failed to look up account");
      return;
    }

    const timeline = await this.platform.getTimeline(timelineFetchSize);
    if (!timeline.success) {
      logger.error({ error: timeline.error.message }, "Failed to fetch timeline");
      return;
    }

    let replied = 0;
    for (const tweet of timeline.value) {
      if (replied >= maxRepliesPerCheck) break;
      if (tweet.authorId === account.value.id) continue;
      if (!this.generator.shouldReplyToTweet(tweet)) continue;

      if (await this.reply(tweet.id, tweet.text, tweet.authorHandle || undefined)) {
        replied += 1;
      }
    }

    logger.info({ replied }, "Timeline check complete");
  }

  /** One reply in its own failure boundary. True when it was posted. */
  private async reply(tweetId: string, text: string, author?: string): Promise<boolean> {
    const outcome = await attempt(async () => {
      const reply = await this.generator.generateReply(text, author);
      return this.platform.replyTo(tweetId, reply);
    });

    if (!outcome.success) {
      logger.error({ tweetId, error: formatError(outcome.error) }, "Reply failed");
      return false;
    }
    if (!outcome.value.success) {
      logger.error({ tweetId, error: outcome.value.error.message }, "Reply rejected");
      return false;
    }

    logger.info({ tweetId, replyId: outcome.value.value.id }, "Replied");
    return true;
  }

  private pick(items: string[]): string {
    return items[Math.min(Math.floor(this.random() * items.length), items.length - 1)];
  }
}

import { describe, it, expect, vi } from "vitest";
import { ProviderError, defaultSettings, fail, ok } from "@echopost/core";
import type { ReplyCandidate } from "@echopost/content-pipeline";
import type {
  Mention,
  PlatformAccount,
  PlatformResult,
  PostedReply,
  PostedTweet,
  TimelineTweet,
} from "@echopost/publishing";
import { ManualClock } from "../manual-clock.js";
import { PostingScheduler, type SchedulerSettings } from "../scheduler.js";

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

function fakeGenerator() {
  return {
    generateTweetIdeas: vi.fn(async (_count?: number) => ["idea A", "idea B", "idea C"]),
    generateTweet: vi.fn(async (topic?: string) => `post about ${topic ?? "nothing"}`),
    generateReply: vi.fn(async (text: string, _author?: string) => `re: ${text}`),
    shouldReplyToTweet: vi.fn((_candidate: ReplyCandidate) => true),
  };
}

function fakePlatform() {
  let nextId = 1000;
  return {
    getAccount: vi.fn(
      async (): Promise<PlatformResult<PlatformAccount>> => ok({ id: "me", handle: "echo" })
    ),
    postText: vi.fn(
      async (text: string): Promise<PlatformResult<PostedTweet>> =>
        ok({ id: String(nextId++), text, createdAt: "2024-01-15T10:00:00.000Z" })
    ),
    replyTo: vi.fn(
      async (tweetId: string, text: string): Promise<PlatformResult<PostedReply>> =>
        ok({ id: String(nextId++), text, createdAt: "2024-01-15T10:00:00.000Z", replyTo: tweetId })
    ),
    getMentions: vi.fn(
      async (_sinceId: string | undefined, _max: number): Promise<PlatformResult<Mention[]>> =>
        ok([])
    ),
    getTimeline: vi.fn(
      async (_max: number): Promise<PlatformResult<TimelineTweet[]>> => ok([])
    ),
  };
}

function mention(id: string, text: string): Mention {
  return { id, text, authorId: `author-${id}`, createdAt: "2024-01-15T09:00:00.000Z" };
}

function timelineTweet(id: string, authorId: string, text = `tweet ${id}`): TimelineTweet {
  return {
    id,
    text,
    authorId,
    authorHandle: `${authorId}-handle`,
    createdAt: "2024-01-15T09:00:00.000Z",
  };
}

function setup(options: {
  start: Date;
  configure?: (settings: SchedulerSettings) => void;
}) {
  const settings = defaultSettings();
  options.configure?.(settings);

  const clock = new ManualClock(options.start);
  const generator = fakeGenerator();
  const platform = fakePlatform();
  const scheduler = new PostingScheduler(generator, platform, settings, {
    clock,
    random: () => 0,
  });

  return { clock, generator, platform, scheduler };
}

const postingOnly = (s: SchedulerSettings) => {
  s.replies.enabled = false;
};

const repliesOnly = (s: SchedulerSettings) => {
  s.posting.enabled = false;
};

describe("PostingScheduler lifecycle", () => {
  it("arms the post job, daily reset and reply monitor", () => {
    const { clock, scheduler } = setup({ start: new Date(2024, 0, 15, 10, 0) });

    scheduler.start();

    expect(scheduler.status.state).toBe("running");
    expect(clock.pendingTimers).toBe(3);
  });

  it("cancels every timer on stop", async () => {
    const { clock, generator, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
    });

    scheduler.start();
    scheduler.stop();
    clock.advance(24 * HOUR);
    await scheduler.idle();

    expect(scheduler.status.state).toBe("stopped");
    expect(clock.pendingTimers).toBe(0);
    expect(generator.generateTweetIdeas).not.toHaveBeenCalled();
    expect(platform.getMentions).not.toHaveBeenCalled();
  });

  it("does not schedule posts when the posting window is empty", async () => {
    const { clock, generator, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
      configure: (s) => {
        postingOnly(s);
        s.posting.postingHours = { start: 21, end: 9 };
      },
    });

    scheduler.start();
    expect(clock.pendingTimers).toBe(1);

    clock.advance(24 * HOUR);
    await scheduler.idle();

    expect(generator.generateTweetIdeas).not.toHaveBeenCalled();
  });
});

describe("PostingScheduler post job", () => {
  it("posts only inside the posting hours", async () => {
    const { clock, generator, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 8, 0),
      configure: postingOnly,
    });
    scheduler.start();

    // 08:48, before the window opens
    clock.advance(48 * MINUTE);
    await scheduler.idle();
    expect(platform.postText).not.toHaveBeenCalled();

    // 09:36
    clock.advance(48 * MINUTE);
    await scheduler.idle();

    expect(generator.generateTweetIdeas).toHaveBeenCalledWith(3);
    expect(generator.generateTweet).toHaveBeenCalledWith("idea A");
    expect(platform.postText).toHaveBeenCalledWith("post about idea A");
    expect(scheduler.status.postsToday).toBe(1);
  });

  it("treats the end hour as outside the window", async () => {
    const { clock, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 20, 0),
      configure: postingOnly,
    });
    scheduler.start();

    // 20:48, then 21:36
    clock.advance(48 * MINUTE);
    await scheduler.idle();
    clock.advance(48 * MINUTE);
    await scheduler.idle();

    expect(platform.postText).toHaveBeenCalledTimes(1);
  });

  it("skips once the daily quota is used", async () => {
    const { clock, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 9, 0),
      configure: (s) => {
        postingOnly(s);
        s.posting.maxPostsPerDay = 1;
      },
    });
    scheduler.start();
    await scheduler.postNow("warm-up");

    // 576 minutes later: 18:36
    clock.advance(576 * MINUTE);
    await scheduler.idle();

    expect(platform.postText).toHaveBeenCalledTimes(1);
    expect(scheduler.status.postsToday).toBe(1);
  });

  it("posts without a topic when no ideas come back", async () => {
    const { clock, generator, scheduler } = setup({
      start: new Date(2024, 0, 15, 9, 0),
      configure: postingOnly,
    });
    generator.generateTweetIdeas.mockResolvedValueOnce([]);
    scheduler.start();

    clock.advance(48 * MINUTE);
    await scheduler.idle();

    expect(generator.generateTweet).toHaveBeenCalledWith(undefined);
  });

  it("does not count a failed post and keeps the cadence", async () => {
    const { clock, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 9, 0),
      configure: postingOnly,
    });
    platform.postText.mockResolvedValueOnce(fail(new ProviderError("twitter", "down")));
    scheduler.start();

    clock.advance(48 * MINUTE);
    await scheduler.idle();
    expect(scheduler.status.postsToday).toBe(0);

    clock.advance(48 * MINUTE);
    await scheduler.idle();
    expect(platform.postText).toHaveBeenCalledTimes(2);
    expect(scheduler.status.postsToday).toBe(1);
  });

  it("survives a generator that throws", async () => {
    const { clock, generator, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 9, 0),
      configure: postingOnly,
    });
    generator.generateTweetIdeas.mockRejectedValueOnce(new Error("unexpected"));
    scheduler.start();

    clock.advance(48 * MINUTE);
    await scheduler.idle();
    clock.advance(48 * MINUTE);
    await scheduler.idle();

    expect(platform.postText).toHaveBeenCalledTimes(1);
  });
});

describe("PostingScheduler daily reset", () => {
  it("zeroes the post count at local midnight", async () => {
    const { clock, scheduler } = setup({
      start: new Date(2024, 0, 15, 22, 0),
      configure: (s) => {
        repliesOnly(s);
        s.replies.enabled = false;
      },
    });
    scheduler.start();
    await scheduler.postNow("a");
    await scheduler.postNow("b");

    clock.advance(2 * HOUR - MINUTE);
    await scheduler.idle();
    expect(scheduler.status.postsToday).toBe(2);

    clock.advance(MINUTE);
    await scheduler.idle();
    expect(scheduler.status.postsToday).toBe(0);
    expect(clock.pendingTimers).toBe(1);
  });
});

describe("PostingScheduler reply monitor", () => {
  it("replies to new mentions and advances the cursor", async () => {
    const { clock, generator, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
      configure: repliesOnly,
    });
    platform.getMentions.mockResolvedValueOnce(
      ok([mention("105", "@echo two"), mention("103", "@echo one")])
    );
    scheduler.start();

    clock.advance(30 * MINUTE);
    await scheduler.idle();

    expect(platform.getMentions).toHaveBeenCalledWith(undefined, 10);
    expect(generator.generateReply).toHaveBeenCalledWith("@echo two", undefined);
    expect(platform.replyTo.mock.calls.map(([id, text]) => [id, text])).toEqual([
      ["105", "re: @echo two"],
      ["103", "re: @echo one"],
    ]);
    expect(scheduler.status.lastMentionId).toBe("105");

    clock.advance(30 * MINUTE);
    await scheduler.idle();

    expect(platform.getMentions).toHaveBeenLastCalledWith("105", 10);
  });

  it("compares mention ids numerically when moving the cursor", async () => {
    const { clock, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
      configure: repliesOnly,
    });
    platform.getMentions.mockResolvedValueOnce(ok([mention("99", "a"), mention("100", "b")]));
    scheduler.start();

    clock.advance(30 * MINUTE);
    await scheduler.idle();

    expect(scheduler.status.lastMentionId).toBe("100");
  });

  it("isolates each mention reply", async () => {
    const { clock, generator, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
      configure: repliesOnly,
    });
    platform.getMentions.mockResolvedValueOnce(
      ok([mention("3", "third"), mention("2", "second"), mention("1", "first")])
    );
    generator.generateReply.mockRejectedValueOnce(new Error("boom"));
    platform.replyTo.mockResolvedValueOnce(fail(new ProviderError("twitter", "duplicate")));
    scheduler.start();

    clock.advance(30 * MINUTE);
    await scheduler.idle();

    expect(generator.generateReply).toHaveBeenCalledTimes(3);
    expect(platform.replyTo.mock.calls.map(([id]) => id)).toEqual(["2", "1"]);
    expect(scheduler.status.lastMentionId).toBe("3");
  });

  it("keeps the cursor when fetching mentions fails", async () => {
    const { clock, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
      configure: repliesOnly,
    });
    platform.getMentions.mockResolvedValueOnce(fail(new ProviderError("twitter", "503")));
    scheduler.start();

    clock.advance(30 * MINUTE);
    await scheduler.idle();

    expect(scheduler.status.lastMentionId).toBeUndefined();
    expect(platform.getTimeline).toHaveBeenCalledWith(20);
  });

  it("replies to eligible timeline posts up to the cap", async () => {
    const { clock, generator, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
      configure: (s) => {
        repliesOnly(s);
        s.replies.maxRepliesPerCheck = 2;
      },
    });
    platform.getTimeline.mockResolvedValueOnce(
      ok([
        timelineTweet("t0", "me"),
        timelineTweet("t1", "alice"),
        timelineTweet("t2", "bob", "skip me"),
        timelineTweet("t3", "carol"),
        timelineTweet("t4", "dave"),
        timelineTweet("t5", "erin"),
      ])
    );
    generator.shouldReplyToTweet.mockImplementation((candidate) => candidate.text !== "skip me");
    platform.replyTo.mockResolvedValueOnce(fail(new ProviderError("twitter", "blocked")));
    scheduler.start();

    clock.advance(30 * MINUTE);
    await scheduler.idle();

    expect(generator.shouldReplyToTweet).toHaveBeenCalledTimes(4);
    expect(generator.generateReply).toHaveBeenCalledWith("tweet t1", "alice-handle");
    expect(platform.replyTo.mock.calls.map(([id]) => id)).toEqual(["t1", "t3", "t4"]);
  });

  it("skips the timeline when the account lookup fails", async () => {
    const { clock, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 10, 0),
      configure: repliesOnly,
    });
    platform.getAccount.mockResolvedValueOnce(fail(new ProviderError("twitter", "401")));
    scheduler.start();

    clock.advance(30 * MINUTE);
    await scheduler.idle();

    expect(platform.getTimeline).not.toHaveBeenCalled();
  });
});

describe("PostingScheduler.postNow", () => {
  it("posts the first generated idea outside posting hours", async () => {
    const { generator, platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 3, 0),
    });

    const result = await scheduler.postNow();

    expect(generator.generateTweetIdeas).toHaveBeenCalledWith(3);
    expect(generator.generateTweet).toHaveBeenCalledWith("idea A");
    expect(result).toEqual({
      success: true,
      value: { id: "1000", text: "post about idea A", createdAt: "2024-01-15T10:00:00.000Z" },
    });
    expect(platform.postText).toHaveBeenCalledTimes(1);
    expect(scheduler.status.postsToday).toBe(1);
  });

  it("uses the given topic without asking for ideas", async () => {
    const { generator, scheduler } = setup({ start: new Date(2024, 0, 15, 3, 0) });

    await scheduler.postNow("release notes");

    expect(generator.generateTweetIdeas).not.toHaveBeenCalled();
    expect(generator.generateTweet).toHaveBeenCalledWith("release notes");
  });

  it("ignores the daily quota", async () => {
    const { platform, scheduler } = setup({
      start: new Date(2024, 0, 15, 12, 0),
      configure: (s) => {
        s.posting.maxPostsPerDay = 1;
      },
    });

    await scheduler.postNow("one");
    await scheduler.postNow("two");

    expect(platform.postText).toHaveBeenCalledTimes(2);
    expect(scheduler.status.postsToday).toBe(2);
  });

  it("returns the platform failure without counting it", async () => {
    const { platform, scheduler } = setup({ start: new Date(2024, 0, 15, 12, 0) });
    platform.postText.mockResolvedValueOnce(fail(new ProviderError("twitter", "down")));

    const result = await scheduler.postNow("topic");

    expect(result.success).toBe(false);
    expect(scheduler.status.postsToday).toBe(0);
  });
});

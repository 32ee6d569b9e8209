import type { PostingSettings } from "@echopost/core";

const MINUTE_MS = 60_000;

export interface PostingInterval {
  baseMinutes: number;
  minMinutes: number;
  maxMinutes: number;
}

/**
 * Spread the daily quota over the posting window. Null when the window
 * is empty.
 */
export function computePostingInterval(
  posting: Pick<PostingSettings, "postingHours" | "maxPostsPerDay" | "intervalJitter">
): PostingInterval | null {
  const { start, end } = posting.postingHours;
  if (end <= start) return null;

  const baseMinutes = Math.floor(((end - start) * 60) / posting.maxPostsPerDay);
  return {
    baseMinutes,
    minMinutes: Math.max(1, Math.floor(baseMinutes * (1 - posting.intervalJitter))),
    maxMinutes: Math.max(1, Math.floor(baseMinutes * (1 + posting.intervalJitter))),
  };
}

/** Whole minutes drawn uniformly from [minMinutes, maxMinutes]. */
export function drawIntervalMinutes(
  interval: PostingInterval,
  random: () => number
): number {
  const span = interval.maxMinutes - interval.minMinutes + 1;
  return Math.min(
    interval.minMinutes + Math.floor(random() * span),
    interval.maxMinutes
  );
}

export function minutesToMs(minutes: number): number {
  return minutes * MINUTE_MS;
}

/** Milliseconds until the next local hour:minute strictly after now. */
export function msUntilNextDaily(now: Date, hour: number, minute: number): number {
  const next = new Date(now);
  next.setHours(hour, minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next.getTime() - now.getTime();
}

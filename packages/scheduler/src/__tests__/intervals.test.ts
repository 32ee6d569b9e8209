import { describe, it, expect } from "vitest";
import {
  computePostingInterval,
  drawIntervalMinutes,
  msUntilNextDaily,
} from "../intervals.js";

const posting = (start: number, end: number, maxPostsPerDay = 12, intervalJitter = 0.2) => ({
  postingHours: { start, end },
  maxPostsPerDay,
  intervalJitter,
});

describe("computePostingInterval", () => {
  it("spreads the quota over the window with ±20% jitter", () => {
    expect(computePostingInterval(posting(9, 21))).toEqual({
      baseMinutes: 60,
      minMinutes: 48,
      maxMinutes: 72,
    });
  });

  it("floors each bound", () => {
    expect(computePostingInterval(posting(9, 21, 7))).toEqual({
      baseMinutes: 102,
      minMinutes: 81,
      maxMinutes: 122,
    });
  });

  it("returns null for an empty or inverted window", () => {
    expect(computePostingInterval(posting(9, 9))).toBeNull();
    expect(computePostingInterval(posting(21, 9))).toBeNull();
  });

  it("never produces a zero-minute interval", () => {
    expect(computePostingInterval(posting(9, 10, 1000))).toEqual({
      baseMinutes: 0,
      minMinutes: 1,
      maxMinutes: 1,
    });
  });
});

describe("drawIntervalMinutes", () => {
  const interval = { baseMinutes: 60, minMinutes: 48, maxMinutes: 72 };

  it("draws whole minutes across the inclusive range", () => {
    expect(drawIntervalMinutes(interval, () => 0)).toBe(48);
    expect(drawIntervalMinutes(interval, () => 0.5)).toBe(60);
    expect(drawIntervalMinutes(interval, () => 0.999)).toBe(72);
  });
});

describe("msUntilNextDaily", () => {
  it("counts to later today", () => {
    const now = new Date(2024, 0, 15, 23, 30);
    expect(msUntilNextDaily(now, 23, 45)).toBe(15 * 60_000);
  });

  it("rolls to tomorrow once the time has passed", () => {
    const now = new Date(2024, 0, 15, 23, 30);
    expect(msUntilNextDaily(now, 0, 0)).toBe(30 * 60_000);
  });

  it("treats the exact moment as already passed", () => {
    const now = new Date(2024, 0, 15, 0, 0);
    expect(msUntilNextDaily(now, 0, 0)).toBe(24 * 60 * 60_000);
  });
});

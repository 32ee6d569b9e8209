import { describe, it, expect } from "vitest";
import { MAX_POST_LENGTH, truncatePost } from "../text.js";

describe("truncatePost", () => {
  it("leaves text at the limit untouched", () => {
    const text = "a".repeat(MAX_POST_LENGTH);
    expect(truncatePost(text)).toBe(text);
  });

  it("cuts longer text to 277 characters plus an ellipsis", () => {
    const result = truncatePost("b".repeat(300));
    expect(result).toBe("b".repeat(277) + "...");
    expect(result).toHaveLength(280);
  });

  it("counts emoji as single characters", () => {
    const text = "😀".repeat(280);
    expect(truncatePost(text)).toBe(text);
    expect(truncatePost("😀".repeat(281))).toBe("😀".repeat(277) + "...");
  });
});

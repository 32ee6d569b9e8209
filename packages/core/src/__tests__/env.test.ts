import { describe, it, expect } from "vitest";
import { validateEnv } from "../env.js";

const TWITTER = {
  TWITTER_API_KEY: "test-key",
  TWITTER_API_SECRET: "test-secret",
  TWITTER_ACCESS_TOKEN: "test-token",
  TWITTER_ACCESS_SECRET: "test-token-secret",
};

describe("validateEnv", () => {
  it("reports nothing when everything is set", () => {
    expect(
      validateEnv({ ...TWITTER, ANTHROPIC_API_KEY: "test-anthropic" })
    ).toEqual([]);
  });

  it("lists every missing twitter variable and the default provider key", () => {
    expect(validateEnv({})).toEqual([
      "TWITTER_API_KEY",
      "TWITTER_API_SECRET",
      "TWITTER_ACCESS_TOKEN",
      "TWITTER_ACCESS_SECRET",
      "ANTHROPIC_API_KEY",
    ]);
  });

  it("asks for the OpenAI key when that provider is selected", () => {
    expect(
      validateEnv({
        ...TWITTER,
        AI_PROVIDER: "openai",
        ANTHROPIC_API_KEY: "test-anthropic",
      })
    ).toEqual(["OPENAI_API_KEY"]);
  });
});

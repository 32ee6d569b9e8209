import { config } from "dotenv";
import { resolve } from "node:path";
import { ConfigurationError } from "./errors.js";

// Load .env from project root
config({ path: resolve(process.cwd(), ".env") });

export type AiProvider = "anthropic" | "openai";

export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new ConfigurationError(
      `Required environment variable ${key} is not set`,
      [key]
    );
  }
  return value;
}

export function optionalEnv(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

export const env = {
  get aiProvider(): AiProvider {
    const value = optionalEnv("AI_PROVIDER", "anthropic").toLowerCase();
    if (value !== "anthropic" && value !== "openai") {
      throw new ConfigurationError(`Unsupported AI provider: ${value}`, [
        "AI_PROVIDER",
      ]);
    }
    return value;
  },
  get anthropicApiKey() {
    return process.env.ANTHROPIC_API_KEY;
  },
  get anthropicModel() {
    return optionalEnv("ANTHROPIC_MODEL", "claude-sonnet-4-5-20250929");
  },
  get openaiApiKey() {
    return process.env.OPENAI_API_KEY;
  },
  get openaiModel() {
    return optionalEnv("OPENAI_MODEL", "gpt-4o");
  },
  get twitterApiKey() {
    return process.env.TWITTER_API_KEY;
  },
  get twitterApiSecret() {
    return process.env.TWITTER_API_SECRET;
  },
  get twitterAccessToken() {
    return process.env.TWITTER_ACCESS_TOKEN;
  },
  get twitterAccessSecret() {
    return process.env.TWITTER_ACCESS_SECRET;
  },
  get settingsPath() {
    return resolve(optionalEnv("ECHOPOST_SETTINGS", "config/settings.yml"));
  },
  get dataDir() {
    return resolve(optionalEnv("ECHOPOST_DATA_DIR", "data"));
  },
};

const TWITTER_VARS = [
  "TWITTER_API_KEY",
  "TWITTER_API_SECRET",
  "TWITTER_ACCESS_TOKEN",
  "TWITTER_ACCESS_SECRET",
] as const;

/**
 * List every required variable that is unset for the selected AI provider.
 */
export function validateEnv(
  vars: NodeJS.ProcessEnv = process.env
): string[] {
  const missing: string[] = TWITTER_VARS.filter((key) => !vars[key]);

  const provider = (vars.AI_PROVIDER || "anthropic").toLowerCase();
  if (provider === "openai") {
    if (!vars.OPENAI_API_KEY) missing.push("OPENAI_API_KEY");
  } else if (!vars.ANTHROPIC_API_KEY) {
    missing.push("ANTHROPIC_API_KEY");
  }

  return missing;
}

export interface Credentials {
  twitter: {
    apiKey: string;
    apiSecret: string;
    accessToken: string;
    accessSecret: string;
  };
  llm: {
    provider: AiProvider;
    apiKey: string;
    model: string;
  };
}

/**
 * Collect credentials for the platform and the language model, or throw
 * a ConfigurationError naming everything that is missing.
 */
export function requireCredentials(): Credentials {
  const missing = validateEnv();
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required configuration: ${missing.join(", ")}`,
      missing
    );
  }

  const provider = env.aiProvider;
  return {
    twitter: {
      apiKey: requireEnv("TWITTER_API_KEY"),
      apiSecret: requireEnv("TWITTER_API_SECRET"),
      accessToken: requireEnv("TWITTER_ACCESS_TOKEN"),
      accessSecret: requireEnv("TWITTER_ACCESS_SECRET"),
    },
    llm:
      provider === "openai"
        ? {
            provider,
            apiKey: requireEnv("OPENAI_API_KEY"),
            model: env.openaiModel,
          }
        : {
            provider,
            apiKey: requireEnv("ANTHROPIC_API_KEY"),
            model: env.anthropicModel,
          },
  };
}

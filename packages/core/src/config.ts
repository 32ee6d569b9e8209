import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { SettingsSchema, type Settings } from "./schemas/settings.js";
import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Validate an already-parsed settings document, filling in defaults.
 */
export function parseSettings(parsed: unknown, source = "settings"): Settings {
  const result = SettingsSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const errors = result.error.issues.map(
      (i) => `  ${i.path.join(".")}: ${i.message}`
    );
    throw new ConfigurationError(
      `Invalid settings in ${source}:\n${errors.join("\n")}`
    );
  }

  return result.data;
}

export async function loadSettings(settingsPath: string): Promise<Settings> {
  logger.debug({ settingsPath }, "Loading settings");

  let raw: string;
  try {
    raw = await readFile(settingsPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.warn({ settingsPath }, "Settings file not found, using defaults");
      return defaultSettings();
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Could not parse ${settingsPath}: ${err instanceof Error ? err.message : err}`
    );
  }

  return parseSettings(parsed, settingsPath);
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}

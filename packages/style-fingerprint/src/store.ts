import {
  loadTrainingData,
  saveTrainingData,
  ParseError,
  createChildLogger,
} from "@echopost/core";
import type { StyleProfile } from "./types.js";
import { StyleProfileSchema } from "./schema.js";

const logger = createChildLogger({ module: "style-fingerprint:store" });

export const STYLE_PROFILE_FILE = "style_profile.json";

export async function saveStyleProfile(
  dir: string,
  profile: StyleProfile
): Promise<string> {
  return saveTrainingData(dir, STYLE_PROFILE_FILE, profile);
}

/**
 * Load the stored profile, or null when none has been saved.
 * A file that does not describe a complete profile is a ParseError.
 */
export async function loadStyleProfile(
  dir: string
): Promise<StyleProfile | null> {
  const data = await loadTrainingData(dir, STYLE_PROFILE_FILE);
  if (data === null) return null;

  const result = StyleProfileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    logger.error({ issues }, "Stored style profile is invalid");
    throw new ParseError(
      `Invalid ${STYLE_PROFILE_FILE}: ${issues.join("; ")}`,
      JSON.stringify(data)
    );
  }

  logger.info({ analyzedAt: result.data.analyzedAt }, "Loaded style profile");
  return result.data;
}

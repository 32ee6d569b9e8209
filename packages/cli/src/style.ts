import { createChildLogger } from "@echopost/core";
import {
  loadSamples,
  loadStyleProfile,
  saveStyleProfile,
  type StyleAnalyzer,
  type StyleProfile,
} from "@echopost/style-fingerprint";
import type { DataPaths } from "./app.js";

const logger = createChildLogger({ module: "cli:style" });

export type ProfileSource = "loaded" | "trained";

/**
 * Analyze every writing sample and persist the profile. Null when there
 * are no samples to learn from.
 */
export async function trainStyle(
  analyzer: StyleAnalyzer,
  paths: DataPaths
): Promise<StyleProfile | null> {
  const samples = await loadSamples(paths.samplesDir);
  if (samples.length === 0) {
    logger.warn({ samplesDir: paths.samplesDir }, "No writing samples found");
    return null;
  }

  const profile = await analyzer.analyzeSamples(samples);
  if (!profile) return null;

  const path = await saveStyleProfile(paths.trainingDir, profile);
  logger.info({ path, sampleCount: profile.sampleCount }, "Style profile saved");
  return profile;
}

/**
 * Install the stored profile, training a new one when none is saved.
 */
export async function ensureProfile(
  analyzer: StyleAnalyzer,
  paths: DataPaths
): Promise<{ profile: StyleProfile; source: ProfileSource } | null> {
  const current = analyzer.getProfile();
  if (current) return { profile: current, source: "loaded" };

  const stored = await loadStyleProfile(paths.trainingDir);
  if (stored) {
    analyzer.setProfile(stored);
    return { profile: stored, source: "loaded" };
  }

  logger.info("No saved style profile, training a new one");
  const trained = await trainStyle(analyzer, paths);
  return trained ? { profile: trained, source: "trained" } : null;
}

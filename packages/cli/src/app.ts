import {
  env,
  loadSettings,
  requireCredentials,
  samplesDir,
  trainingDataDir,
  type Settings,
} from "@echopost/core";
import { ContentGenerator, createLlmClient, type LlmClient } from "@echopost/content-pipeline";
import { TwitterPlatform } from "@echopost/publishing";
import { PostingScheduler } from "@echopost/scheduler";
import { StyleAnalyzer } from "@echopost/style-fingerprint";

export interface DataPaths {
  trainingDir: string;
  samplesDir: string;
}

export function dataPaths(dataDir = env.dataDir): DataPaths {
  return {
    trainingDir: trainingDataDir(dataDir),
    samplesDir: samplesDir(dataDir),
  };
}

export interface App {
  settings: Settings;
  paths: DataPaths;
  llm: LlmClient;
  analyzer: StyleAnalyzer;
  generator: ContentGenerator;
  platform: TwitterPlatform;
  scheduler: PostingScheduler;
}

/**
 * Wire every component from the environment and the settings file.
 * Throws ConfigurationError when credentials or settings are unusable.
 */
export async function createApp(): Promise<App> {
  const credentials = requireCredentials();
  const settings = await loadSettings(env.settingsPath);

  const llm = createLlmClient(credentials.llm);
  const analyzer = new StyleAnalyzer(llm, settings.style);
  const generator = new ContentGenerator(llm, analyzer, settings);
  const platform = new TwitterPlatform(credentials.twitter);
  const scheduler = new PostingScheduler(generator, platform, settings);

  return {
    settings,
    paths: dataPaths(),
    llm,
    analyzer,
    generator,
    platform,
    scheduler,
  };
}

import { access, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { env, validateEnv } from "@echopost/core";
import chalk from "chalk";
import { dataPaths } from "../app.js";
import { reportFailure } from "../report.js";

export const SETTINGS_TEMPLATE = `# echopost settings. Every key is optional; missing keys use these defaults.

posting:
  enabled: true
  maxPostsPerDay: 10
  postingHours:
    start: 9   # local hour, inclusive
    end: 21    # local hour, exclusive
  intervalJitter: 0.2

replies:
  enabled: true
  checkIntervalMinutes: 30
  replyProbability: 0.3
  keywordsToMonitor: []
  maxRepliesPerCheck: 5
  maxMentionsPerCheck: 10
  timelineFetchSize: 20

contentGeneration:
  temperature: 0.8
  maxTokens: 100
  includeHashtags: false
  maxHashtags: 3
  includeEmojis: false

style:
  maxSamples: 10
  maxPromptChars: 8000
  emojiThreshold: 0.5
  hashtagThreshold: 0.2
`;

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

export async function initCommand(): Promise<void> {
  console.log(chalk.blue("\nInitializing echopost\n"));

  try {
    const paths = dataPaths();
    await mkdir(paths.samplesDir, { recursive: true });
    await mkdir(paths.trainingDir, { recursive: true });

    const settingsPath = env.settingsPath;
    if (await exists(settingsPath)) {
      console.log(chalk.gray(`  Keeping existing ${settingsPath}`));
    } else {
      await mkdir(dirname(settingsPath), { recursive: true });
      await writeFile(settingsPath, SETTINGS_TEMPLATE, "utf-8");
      console.log(chalk.green("  Created:"));
      console.log(`    ${settingsPath}`);
    }

    const missing = validateEnv();
    if (missing.length > 0) {
      console.log(chalk.red("\n  [FAIL] Missing environment variables:"));
      for (const key of missing) {
        console.log(`    ${key}`);
      }
      process.exitCode = 1;
    } else {
      console.log(chalk.green("\n  [PASS] Credentials found"));
    }

    console.log();
    console.log(chalk.yellow("  Next steps:"));
    console.log(`    1. Add writing samples (.txt, .md) to ${paths.samplesDir}`);
    console.log("    2. Run: echopost train");
    console.log("    3. Run: echopost post --topic \"something\" to try it out");
    console.log("    4. Run: echopost start");
    console.log();
  } catch (err) {
    reportFailure(err);
  }
}

import { env, loadSettings } from "@echopost/core";
import {
  formatStylePrompt,
  formatStyleProfile,
  loadStyleProfile,
} from "@echopost/style-fingerprint";
import chalk from "chalk";
import { dataPaths } from "../app.js";
import { reportFailure } from "../report.js";

interface ProfileOptions {
  json: boolean;
}

export async function profileCommand(options: ProfileOptions): Promise<void> {
  try {
    const { trainingDir } = dataPaths();
    const profile = await loadStyleProfile(trainingDir);

    if (!profile) {
      console.log(chalk.yellow("\n  No style profile yet. Run: echopost train\n"));
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(profile, null, 2));
      return;
    }

    const settings = await loadSettings(env.settingsPath);

    console.log();
    console.log(formatStyleProfile(profile, "detailed", settings.style));
    console.log(chalk.blue("\n─── Style directive ───\n"));
    console.log(`  ${formatStylePrompt(profile, settings.style)}\n`);
  } catch (err) {
    reportFailure(err);
  }
}

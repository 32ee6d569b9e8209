import { formatStylePrompt } from "@echopost/style-fingerprint";
import chalk from "chalk";
import ora from "ora";
import { createApp } from "../app.js";
import { reportFailure } from "../report.js";
import { trainStyle } from "../style.js";

export async function trainCommand(): Promise<void> {
  const spinner = ora();

  try {
    spinner.start("Loading configuration...");
    const app = await createApp();
    spinner.succeed("Configuration loaded");

    spinner.start("Analyzing writing samples...");
    const profile = await trainStyle(app.analyzer, app.paths);
    if (!profile) {
      spinner.fail(`No writing samples found in ${app.paths.samplesDir}`);
      process.exitCode = 1;
      return;
    }
    spinner.succeed(`Style learned from ${profile.sampleCount} sample(s)`);

    console.log(chalk.blue("\n─── Style directive ───\n"));
    console.log(`  ${formatStylePrompt(profile, app.analyzer.thresholds)}\n`);
  } catch (err) {
    reportFailure(err, spinner);
  }
}

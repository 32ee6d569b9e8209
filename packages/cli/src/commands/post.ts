import chalk from "chalk";
import ora from "ora";
import { createApp } from "../app.js";
import { reportFailure } from "../report.js";
import { ensureProfile } from "../style.js";

interface PostOptions {
  topic?: string;
}

export async function postCommand(options: PostOptions): Promise<void> {
  const spinner = ora();

  try {
    spinner.start("Loading configuration...");
    const app = await createApp();
    spinner.succeed("Configuration loaded");

    spinner.start("Loading style profile...");
    const style = await ensureProfile(app.analyzer, app.paths);
    if (!style) {
      spinner.fail(
        `No style profile and no writing samples in ${app.paths.samplesDir}`
      );
      process.exitCode = 1;
      return;
    }
    spinner.succeed("Style profile ready");

    spinner.start(options.topic ? `Writing about "${options.topic}"...` : "Writing a post...");
    const result = await app.scheduler.postNow(options.topic);
    if (!result.success) {
      throw result.error;
    }
    spinner.succeed(`Posted ${chalk.gray(`(id ${result.value.id})`)}`);

    console.log(`\n  ${result.value.text}\n`);
  } catch (err) {
    reportFailure(err, spinner);
  }
}

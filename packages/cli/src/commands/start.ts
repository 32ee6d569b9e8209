import chalk from "chalk";
import ora from "ora";
import { createApp } from "../app.js";
import { reportFailure } from "../report.js";
import { ensureProfile } from "../style.js";

function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once("SIGINT", resolve);
    process.once("SIGTERM", resolve);
  });
}

export async function startCommand(): Promise<void> {
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
    spinner.succeed(
      style.source === "trained" ? "Style profile trained" : "Style profile loaded"
    );

    const account = await app.platform.getAccount();
    if (!account.success) {
      throw account.error;
    }

    app.scheduler.start();
    console.log(
      chalk.green(`\n  Posting as @${account.value.handle}. Press Ctrl+C to stop.\n`)
    );

    const signal = await waitForShutdown();
    console.log(chalk.yellow(`\n  Received ${signal}, stopping...`));

    app.scheduler.stop();
    await app.scheduler.idle();
    console.log(chalk.green("  Stopped.\n"));
  } catch (err) {
    reportFailure(err, spinner);
  }
}

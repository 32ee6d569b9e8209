import chalk from "chalk";
import ora from "ora";
import { createApp } from "../app.js";
import { reportFailure } from "../report.js";
import { ensureProfile } from "../style.js";

interface IdeasOptions {
  count: string;
}

export async function ideasCommand(options: IdeasOptions): Promise<void> {
  const spinner = ora();

  try {
    const count = Number.parseInt(options.count, 10);
    if (!Number.isInteger(count) || count < 1) {
      throw new Error(`--count must be a positive integer, got "${options.count}"`);
    }

    spinner.start("Loading configuration...");
    const app = await createApp();
    await ensureProfile(app.analyzer, app.paths);
    spinner.succeed("Configuration loaded");

    spinner.start(`Generating ${count} idea(s)...`);
    const ideas = await app.generator.generateTweetIdeas(count);
    if (ideas.length === 0) {
      spinner.fail("The model returned no ideas");
      process.exitCode = 1;
      return;
    }
    spinner.succeed(`Generated ${ideas.length} idea(s)`);

    console.log();
    ideas.forEach((idea, i) => {
      console.log(`  ${chalk.gray(`${i + 1}.`)} ${idea}`);
    });
    console.log();
  } catch (err) {
    reportFailure(err, spinner);
  }
}

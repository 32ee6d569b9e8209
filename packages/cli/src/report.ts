import { ConfigurationError, formatError } from "@echopost/core";
import chalk from "chalk";
import type { Ora } from "ora";

/**
 * Print a command failure and mark the process as failed.
 */
export function reportFailure(err: unknown, spinner?: Ora): void {
  const message = formatError(err);

  if (spinner?.isSpinning) {
    spinner.fail(chalk.red(message));
  } else {
    console.error(chalk.red(`\n  Error: ${message}`));
  }

  if (err instanceof ConfigurationError && err.missing.length > 0) {
    console.error(chalk.yellow("\n  Set these in your environment or .env file:"));
    for (const key of err.missing) {
      console.error(`    ${key}`);
    }
  }

  process.exitCode = 1;
}

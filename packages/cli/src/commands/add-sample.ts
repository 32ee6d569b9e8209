import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { addSample } from "@echopost/style-fingerprint";
import chalk from "chalk";
import { dataPaths } from "../app.js";
import { reportFailure } from "../report.js";

interface AddSampleOptions {
  file: string;
}

export async function addSampleCommand(options: AddSampleOptions): Promise<void> {
  try {
    const source = resolve(options.file);
    const content = await readFile(source, "utf-8");

    const saved = await addSample(dataPaths().samplesDir, content, basename(source));

    console.log(chalk.green(`\n  Added sample: ${saved}`));
    console.log(chalk.yellow("  Run: echopost train to update the style profile\n"));
  } catch (err) {
    reportFailure(err);
  }
}

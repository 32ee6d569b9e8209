#!/usr/bin/env node

import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { trainCommand } from "./commands/train.js";
import { startCommand } from "./commands/start.js";
import { postCommand } from "./commands/post.js";
import { addSampleCommand } from "./commands/add-sample.js";
import { profileCommand } from "./commands/profile.js";
import { ideasCommand } from "./commands/ideas.js";

const program = new Command();

program
  .name("echopost")
  .description("Learn your writing style and post to X/Twitter on a schedule")
  .version("0.1.0");

program
  .command("init")
  .description("Create the settings file and data directories, check credentials")
  .action(initCommand);

program
  .command("train")
  .description("Learn the writing style from the samples directory")
  .action(trainCommand);

program
  .command("start")
  .description("Run scheduled posting and replies until interrupted")
  .action(startCommand);

program
  .command("post")
  .description("Write and publish one post now")
  .option("-t, --topic <topic>", "Topic to write about")
  .action(postCommand);

program
  .command("add-sample")
  .description("Copy a file into the writing samples directory")
  .requiredOption("-f, --file <path>", "Sample file to add")
  .action(addSampleCommand);

program
  .command("profile")
  .description("Show the stored style profile")
  .option("--json", "Print the raw profile", false)
  .action(profileCommand);

program
  .command("ideas")
  .description("Suggest post topics in the learned style")
  .option("-n, --count <number>", "Number of ideas", "5")
  .action(ideasCommand);

await program.parseAsync();

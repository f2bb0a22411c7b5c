#!/usr/bin/env node

import { Command } from "commander";
import { runNewCommand } from "./commands/new";
import { runFinalizeCommand } from "./commands/finalize";
import {
  runDeployCommand,
  runPreviewCommand,
  runRefreshCommand,
  runStartCommand,
  type StartOptions,
} from "./commands/site";
import { runInitCommand } from "./commands/init";
import { globalOptions } from "./commands/shared";

const program = new Command();

program
  .name("postguide")
  .description("Draft, finalize and publish posts for a generator-rendered blog.")
  .option("-c, --config <path>", "config file (default: ./postguide.config.json)")
  .helpOption("-h, --help", "display help information");

program
  .command("new")
  .description("Create a draft per title and move it into the draft folder")
  .argument("<titles...>", "post titles; quote titles that contain spaces")
  .action((titles: string[], _options: unknown, command: Command) =>
    runNewCommand(titles, globalOptions(command))
  );

program
  .command("finalize")
  .description("Publish every draft into the posts folder, rewriting its content")
  .action((_options: unknown, command: Command) => runFinalizeCommand(globalOptions(command)));

program
  .command("refresh")
  .description("Regenerate the site (generator clean, then generate)")
  .action((_options: unknown, command: Command) => runRefreshCommand(globalOptions(command)));

program
  .command("start")
  .description("Start the generator's local server")
  .option("-r, --refresh", "regenerate the site first")
  .option("-p, --preview", "open the site in a browser before starting")
  .action((_options: unknown, command: Command) =>
    runStartCommand(command.optsWithGlobals<StartOptions>())
  );

program
  .command("preview")
  .description("Open the local site in a browser")
  .action((_options: unknown, command: Command) => runPreviewCommand(globalOptions(command)));

program
  .command("deploy")
  .description("Deploy the site with the generator")
  .action((_options: unknown, command: Command) => runDeployCommand(globalOptions(command)));

program
  .command("init")
  .description("Create postguide.config.json from the default config")
  .option("-f, --force", "overwrite an existing postguide.config.json")
  .action((options: { force?: boolean }) => runInitCommand(options));

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

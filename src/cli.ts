#!/usr/bin/env node
/**
 * itemflow CLI entry point.
 *
 * A file-backed workspace of items with cached, provenance-tracked actions.
 */

import { Command } from "commander";
import { archiveCommand, unarchiveCommand } from "./commands/archive.js";
import { importCommand } from "./commands/import.js";
import { initCommand } from "./commands/init.js";
import { listCommand } from "./commands/list.js";
import { paramCommand } from "./commands/param.js";
import { runCommand } from "./commands/run.js";
import { selectCommand } from "./commands/select.js";
import { showCommand } from "./commands/show.js";
import { errorMessage } from "./lib/errors.js";
import { setLogLevel } from "./lib/logging.js";
import { ExitCodes } from "./lib/models.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("itemflow")
  .description("A file-backed workspace of items with cached, provenance-tracked actions")
  .version(VERSION, "-V, --version", "output the version number")
  .option("--workspace <path>", "path to the workspace directory")
  .option("--root <path>", "root directory for workspace discovery")
  .option("--json", "output in JSON format")
  .option("-q, --quiet", "suppress non-essential output")
  .option("-v, --verbose", "show detailed output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.quiet && opts.verbose) {
      console.error("Error: --quiet and --verbose are mutually exclusive");
      process.exit(ExitCodes.USAGE_ERROR);
    }
    if (opts.verbose) setLogLevel("info");
    else if (opts.quiet) setLogLevel("warning");
  });

program.addCommand(initCommand);
program.addCommand(listCommand);
program.addCommand(showCommand);
program.addCommand(importCommand);
program.addCommand(archiveCommand);
program.addCommand(unarchiveCommand);
program.addCommand(selectCommand);
program.addCommand(runCommand);
program.addCommand(paramCommand);

// Handle unknown commands
program.on("command:*", () => {
  console.error(`Error: Unknown command '${program.args[0]}'`);
  console.error('Run "itemflow --help" for available commands.');
  process.exit(ExitCodes.USAGE_ERROR);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  if (process.env.DEBUG) {
    console.error(err);
  } else {
    console.error(`Error: ${errorMessage(err)}`);
  }
  process.exit(ExitCodes.FAILURE);
});

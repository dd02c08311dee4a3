/**
 * itemflow init - Initialize a workspace.
 */

import { Command } from "commander";
import * as path from "node:path";
import { ExitCodes } from "../lib/models.js";
import { discoverWorkspace, initWorkspace } from "../lib/storage.js";
import { globalOptions, reportError } from "./common.js";

export const initCommand = new Command("init")
  .description("Create a new workspace")
  .action((_options: Record<string, never>, command: Command) => {
    const globalOpts = globalOptions(command);
    const rootPath = globalOpts.root ? path.resolve(globalOpts.root) : process.cwd();

    const existing = discoverWorkspace(rootPath);
    if (existing) {
      if (globalOpts.json) {
        console.log(JSON.stringify({ status: "exists", root: existing }));
      } else if (!globalOpts.quiet) {
        console.log(`Workspace already exists at ${existing}`);
      }
      process.exit(ExitCodes.SUCCESS);
    }

    try {
      const dirs = initWorkspace(rootPath);
      if (globalOpts.json) {
        console.log(JSON.stringify({ status: "created", root: dirs.root }));
      } else if (!globalOpts.quiet) {
        console.log(`Initialized workspace at ${dirs.root}`);
      }
      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      reportError(err, globalOpts);
    }
  });

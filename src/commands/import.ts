/**
 * itemflow import - Bring URLs and files into the workspace.
 */

import { Command } from "commander";
import { InvalidInput } from "../lib/errors.js";
import { isItemType } from "../lib/models.js";
import type { ImportOptions } from "../lib/file-store.js";
import { printPaths, withWorkspace } from "./common.js";

interface ImportCommandOptions {
  type?: string;
  reimport?: boolean;
}

export const importCommand = new Command("import")
  .description("Import URLs or files as items and select them")
  .argument("<locators...>", "URLs or file paths")
  .option("-t, --type <type>", "item type for files without one in their name", "resource")
  .option("--reimport", "read and save again files already in the workspace")
  .action((locators: string[], options: ImportCommandOptions, command: Command) =>
    withWorkspace(command, (workspace, globalOpts) => {
      const importOptions: ImportOptions = { reimport: options.reimport === true };
      if (options.type) {
        if (!isItemType(options.type)) {
          throw new InvalidInput(`Unknown item type: ${options.type}`);
        }
        importOptions.asType = options.type;
      }

      const paths = workspace.store.importItems(locators, importOptions);
      workspace.store.selections.push({ paths });
      printPaths(paths, globalOpts);
    }),
  );

/**
 * itemflow archive / unarchive - Move items in and out of the archive.
 */

import { Command } from "commander";
import { printPaths, withWorkspace } from "./common.js";

interface ArchiveCommandOptions {
  transients?: boolean;
}

export const archiveCommand = new Command("archive")
  .description("Move items to the archive (the current selection if no paths are given)")
  .argument("[paths...]", "store paths")
  .option("--transients", "archive every item left in the transient state")
  .action((paths: string[], options: ArchiveCommandOptions, command: Command) =>
    withWorkspace(command, (workspace, globalOpts) => {
      const store = workspace.store;
      if (options.transients) {
        printPaths(store.archiveTransients(), globalOpts, "archived");
        return;
      }
      const targets = paths.length > 0 ? paths : store.selections.current.paths;
      const archived = targets.map((target) => {
        const storePath = store.resolvePath(target) ?? target;
        return store.archive(storePath);
      });
      printPaths(archived, globalOpts, "archived");
    }),
  );

export const unarchiveCommand = new Command("unarchive")
  .description("Restore archived items to their original location")
  .argument("<paths...>", "archived paths, with or without the archive prefix")
  .action((paths: string[], _options: Record<string, never>, command: Command) =>
    withWorkspace(command, (workspace, globalOpts) => {
      const restored = paths.map((p) => workspace.store.unarchive(p));
      workspace.store.selections.push({ paths: restored });
      printPaths(restored, globalOpts, "restored");
    }),
  );

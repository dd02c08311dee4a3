/**
 * itemflow select - Show or change the current selection.
 */

import { Command } from "commander";
import { FileNotFound, InvalidInput } from "../lib/errors.js";
import type { Selection } from "../lib/selections.js";
import type { GlobalOptions } from "./common.js";
import { printPaths, withWorkspace } from "./common.js";

interface SelectOptions {
  previous?: boolean;
  next?: boolean;
  pop?: boolean;
  history?: boolean;
}

function printHistory(selections: Selection[], currentIndex: number, globalOpts: GlobalOptions): void {
  if (globalOpts.json) {
    console.log(JSON.stringify({ current_index: currentIndex, history: selections }, null, 2));
    return;
  }
  if (selections.length === 0) {
    if (!globalOpts.quiet) console.log("No selection history.");
    return;
  }
  selections.forEach((selection, i) => {
    const marker = i === currentIndex ? "*" : " ";
    console.log(`${marker} ${i}: ${selection.paths.join(", ")}`);
  });
}

export const selectCommand = new Command("select")
  .description("Select items, or show and navigate the selection history")
  .argument("[paths...]", "store paths to select")
  .option("--previous", "move back to the previous selection")
  .option("--next", "move forward to the next selection")
  .option("--pop", "remove the current selection")
  .option("--history", "show the whole selection history")
  .action((paths: string[], options: SelectOptions, command: Command) =>
    withWorkspace(command, (workspace, globalOpts) => {
      const store = workspace.store;
      const history = store.selections;
      const flags = [options.previous, options.next, options.pop, options.history].filter(Boolean);
      if (flags.length > 1 || (flags.length === 1 && paths.length > 0)) {
        throw new InvalidInput("Give paths or one of --previous, --next, --pop, --history");
      }

      if (options.history) {
        printHistory(history.selections, history.currentIndex, globalOpts);
        return;
      }
      if (options.previous) history.previous();
      else if (options.next) history.next();
      else if (options.pop) history.pop();
      else if (paths.length > 0) {
        const storePaths = paths.map((p) => {
          const storePath = store.resolvePath(p);
          if (!storePath || !store.exists(storePath)) {
            throw new FileNotFound(`Item not found: ${p}`);
          }
          return storePath;
        });
        history.push({ paths: storePaths });
      }

      const current = history.current.paths;
      if (globalOpts.json) {
        printPaths(current, globalOpts);
      } else {
        for (const storePath of current) console.log(store.describe(storePath));
      }
    }),
  );

/**
 * itemflow list - List items in the workspace.
 */

import { Command } from "commander";
import { errorMessage } from "../lib/errors.js";
import { abbrevTitle } from "../lib/items.js";
import { getLogger } from "../lib/logging.js";
import { withWorkspace } from "./common.js";

const log = getLogger("list");

interface ListOptions {
  type?: string;
}

export const listCommand = new Command("list")
  .description("List items")
  .argument("[folder]", "only list items under this folder")
  .option("-t, --type <type>", "filter by item type")
  .action((folder: string | undefined, options: ListOptions, command: Command) =>
    withWorkspace(command, (workspace, globalOpts) => {
      const rows: { path: string; type: string; title: string; state: string }[] = [];
      for (const storePath of workspace.store.walkItems(folder)) {
        try {
          const item = workspace.store.load(storePath);
          if (options.type && item.type !== options.type) continue;
          rows.push({ path: storePath, type: item.type, title: abbrevTitle(item), state: item.state });
        } catch (err) {
          log.info(`Skipping ${storePath}: ${errorMessage(err)}`);
        }
      }

      if (globalOpts.json) {
        console.log(JSON.stringify(rows, null, 2));
      } else if (rows.length === 0) {
        if (!globalOpts.quiet) console.log("No items found.");
      } else {
        for (const row of rows) {
          const state = row.state === "transient" ? " (transient)" : "";
          console.log(`${row.path}\t${row.title}${state}`);
        }
      }
    }),
  );

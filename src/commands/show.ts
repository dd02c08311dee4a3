/**
 * itemflow show - Display an item.
 */

import { Command } from "commander";
import { InvalidInput } from "../lib/errors.js";
import { itemToMetadata } from "../lib/item-metadata.js";
import { abbrevTitle } from "../lib/items.js";
import { formatSource } from "../lib/operations.js";
import { withWorkspace } from "./common.js";

interface ShowOptions {
  metadata?: boolean;
}

export const showCommand = new Command("show")
  .description("Display an item (the current selection if no path is given)")
  .argument("[path]", "store path of the item")
  .option("--metadata", "show metadata only")
  .action((target: string | undefined, options: ShowOptions, command: Command) =>
    withWorkspace(command, (workspace, globalOpts) => {
      const storePath = target ?? workspace.store.selections.current.paths[0];
      if (!storePath) {
        throw new InvalidInput("No path given and nothing selected");
      }
      const item = workspace.store.load(storePath);

      if (globalOpts.json) {
        const output: Record<string, unknown> = {
          path: storePath,
          ...itemToMetadata(item),
        };
        if (!options.metadata && item.body !== undefined) output.body = item.body;
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      console.log(`# ${abbrevTitle(item)}`);
      console.log();
      console.log(`Path: ${storePath}`);
      console.log(`Type: ${item.type}`);
      if (item.format) console.log(`Format: ${item.format}`);
      if (item.url) console.log(`URL: ${item.url}`);
      if (item.description) console.log(`Description: ${item.description}`);
      console.log(`Created: ${item.createdAt.toISOString()}`);
      if (item.state !== "normal") console.log(`State: ${item.state}`);
      if (item.relations.derivedFrom?.length) {
        console.log(`Derived from: ${item.relations.derivedFrom.join(", ")}`);
      }
      if (item.history.length > 0) {
        console.log("History:");
        for (const source of item.history) {
          console.log(`  - ${formatSource(source)}`);
        }
      }

      if (!options.metadata && item.body) {
        console.log();
        console.log("---");
        console.log();
        console.log(item.body);
      }
    }),
  );

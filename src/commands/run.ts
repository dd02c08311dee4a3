/**
 * itemflow run - Run an action on items or the current selection.
 */

import { Command } from "commander";
import { InvalidInput } from "../lib/errors.js";
import { formatExpectedArgs } from "../actions/model.js";
import { printPaths, withWorkspace } from "./common.js";

interface RunCommandOptions {
  rerun?: boolean;
  list?: boolean;
}

export const runCommand = new Command("run")
  .description("Run an action on the given items (the current selection if none)")
  .argument("[action]", "action name")
  .argument("[args...]", "store paths, file paths or URLs")
  .option("--rerun", "run even if all outputs already exist")
  .option("--list", "list available actions")
  .action(
    (actionName: string | undefined, args: string[], options: RunCommandOptions, command: Command) =>
      withWorkspace(command, async (workspace, globalOpts) => {
        if (options.list) {
          const actions = workspace.actions.list();
          if (globalOpts.json) {
            const rows = actions.map((action) => ({
              name: action.name,
              description: action.description,
              args: formatExpectedArgs(action.expectedArgs),
              params: action.params.map((p) => p.name),
            }));
            console.log(JSON.stringify(rows, null, 2));
          } else {
            for (const action of actions) {
              console.log(`${action.name} (${formatExpectedArgs(action.expectedArgs)} args)`);
              console.log(`  ${action.description}`);
            }
          }
          return;
        }

        if (!actionName) {
          throw new InvalidInput('No action given. Use "itemflow run --list" to see actions.');
        }
        const result = await workspace.runner.run(actionName, args, {
          rerun: options.rerun === true,
        });
        const outputs = result.items
          .map((item) => item.storePath)
          .filter((p): p is string => p !== undefined);
        if (globalOpts.json) {
          console.log(
            JSON.stringify(
              { status: "ok", cached: result.cached, outputs, archived: result.archivedPaths },
              null,
              2,
            ),
          );
        } else {
          printPaths(outputs, globalOpts);
        }
      }),
  );

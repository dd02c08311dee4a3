/**
 * itemflow param - Show or set workspace action parameters.
 */

import { Command } from "commander";
import { withWorkspace } from "./common.js";

interface ParamOptions {
  unset?: boolean;
}

export const paramCommand = new Command("param")
  .description("Show all action parameters, or set or unset one")
  .argument("[name]", "parameter name")
  .argument("[value]", "new value")
  .option("--unset", "remove the parameter")
  .action(
    (name: string | undefined, value: string | undefined, options: ParamOptions, command: Command) =>
      withWorkspace(command, (workspace, globalOpts) => {
        const params = workspace.store.params;
        if (name && options.unset) {
          params.unset(name);
        } else if (name && value !== undefined) {
          params.set(name, value);
        }

        const shown = name ? { [name]: params.get(name) } : params.all();
        if (globalOpts.json) {
          console.log(JSON.stringify(shown, null, 2));
          return;
        }
        for (const [key, val] of Object.entries(shown)) {
          console.log(val === undefined ? `${key} (not set)` : `${key} = ${JSON.stringify(val)}`);
        }
      }),
  );

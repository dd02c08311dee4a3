/**
 * Helpers shared by the CLI commands: typed global options, opening the
 * workspace and reporting errors in text or JSON.
 */

import type { Command } from "commander";
import { errorMessage, exitCodeFor } from "../lib/errors.js";
import { ExitCodes } from "../lib/models.js";
import { openWorkspace, type Workspace } from "../lib/workspace.js";

export interface GlobalOptions {
  workspace?: string;
  root?: string;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function globalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  const result: GlobalOptions = {
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
  };
  const workspace = stringOption(opts.workspace);
  if (workspace) result.workspace = workspace;
  const root = stringOption(opts.root);
  if (root) result.root = root;
  return result;
}

export function reportError(err: unknown, globalOpts: GlobalOptions): never {
  const message = errorMessage(err);
  if (globalOpts.json) {
    console.log(JSON.stringify({ status: "error", error: message }));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(exitCodeFor(err));
}

/**
 * Open the workspace, run `fn`, and exit with the matching code.
 */
export async function withWorkspace(
  command: Command,
  fn: (workspace: Workspace, globalOpts: GlobalOptions) => void | Promise<void>,
): Promise<void> {
  const globalOpts = globalOptions(command);
  try {
    const workspace = openWorkspace(globalOpts, { warmCache: false });
    await fn(workspace, globalOpts);
  } catch (err) {
    reportError(err, globalOpts);
  }
  process.exit(ExitCodes.SUCCESS);
}

export function printPaths(paths: readonly string[], globalOpts: GlobalOptions, key = "paths"): void {
  if (globalOpts.json) {
    console.log(JSON.stringify({ status: "ok", [key]: paths }, null, 2));
  } else {
    for (const p of paths) console.log(p);
  }
}

/**
 * An open workspace: configuration, item store, action registry and
 * runner, passed explicitly to whatever needs them.
 */

import { createDefaultRegistry } from "../actions/builtins.js";
import type { ActionRegistry } from "../actions/registry.js";
import { ActionRunner } from "../actions/runner.js";
import { warmFileStore } from "./cache-warmer.js";
import { InvalidState, errorMessage } from "./errors.js";
import { FileStore } from "./file-store.js";
import { getLogger } from "./logging.js";
import type { WorkspaceConfig } from "./models.js";
import { loadConfig, resolveWorkspace } from "./storage.js";

const log = getLogger("workspace");

export interface OpenOptions {
  registry?: ActionRegistry;
  /** Overrides the warm_cache setting */
  warmCache?: boolean;
}

export class Workspace {
  /** Settles when background cache warm-up finishes (immediately if disabled) */
  readonly warmed: Promise<void>;

  private constructor(
    readonly root: string,
    readonly config: WorkspaceConfig,
    readonly store: FileStore,
    readonly actions: ActionRegistry,
    readonly runner: ActionRunner,
    warmCache: boolean,
  ) {
    this.warmed = warmCache
      ? warmFileStore(store).then(
          () => undefined,
          (err: unknown) => log.info(`Cache warm-up stopped: ${errorMessage(err)}`),
        )
      : Promise.resolve();
  }

  /**
   * Open (initializing if needed) the workspace at `root`.
   */
  static open(root: string, options: OpenOptions = {}): Workspace {
    const config = loadConfig(root);
    const store = new FileStore(root, { maxSelectionHistory: config.selection_history_max });
    const actions = options.registry ?? createDefaultRegistry();
    const runner = new ActionRunner(store, actions);
    return new Workspace(
      store.baseDir,
      config,
      store,
      actions,
      runner,
      options.warmCache ?? config.warm_cache,
    );
  }

  reload(): void {
    this.store.reload();
  }
}

/**
 * Find and open the workspace for command options (see resolveWorkspace).
 */
export function openWorkspace(
  location: { workspace?: string; root?: string },
  options: OpenOptions = {},
): Workspace {
  const root = resolveWorkspace(location);
  if (!root) {
    throw new InvalidState('No workspace found. Run "itemflow init" first.');
  }
  return Workspace.open(root, options);
}

/**
 * Composite actions built from other registered actions.
 *
 * A sequence feeds each step's outputs to the next step. A combo runs
 * several actions on the same inputs and merges their outputs. In both,
 * intermediate outputs are saved as transient items and archived once the
 * composite succeeds; after a failure they stay in place for inspection
 * (see FileStore.archiveTransients).
 */

import { InvalidInput } from "../lib/errors.js";
import { getLogger } from "../lib/logging.js";
import type { Item } from "../lib/models.js";
import type { StorePath } from "../lib/store-paths.js";
import { combineAsParagraphs, type Combiner } from "./combiners.js";
import { ANY_ARGS, BaseAction, type ActionContext, type ActionResult, type ExpectedArgs } from "./model.js";
import type { Precondition } from "./preconditions.js";

const log = getLogger("compound");

export interface CompoundOptions {
  description?: string;
  precondition?: Precondition;
  expectedArgs?: ExpectedArgs;
}

function pathsOf(items: readonly Item[]): StorePath[] {
  return items.map((item) => item.storePath).filter((p): p is StorePath => p !== undefined);
}

/** Outputs saved as transient by this run; cached outputs keep their state. */
function transientPathsOf(items: readonly Item[]): StorePath[] {
  return pathsOf(items.filter((item) => item.state === "transient"));
}

abstract class CompoundAction extends BaseAction {
  readonly name: string;
  readonly description: string;
  override readonly expectedArgs: ExpectedArgs;
  declare readonly precondition?: Precondition;

  constructor(
    kind: string,
    name: string,
    readonly actionNames: readonly string[],
    options: CompoundOptions,
  ) {
    super();
    if (actionNames.length < 2) {
      throw new InvalidInput(`${kind} action \`${name}\` needs at least two sub-actions`);
    }
    this.name = name;
    this.description = options.description ?? `${kind} of ${actionNames.join(", ")}`;
    this.expectedArgs = options.expectedArgs ?? ANY_ARGS;
    if (options.precondition) this.precondition = options.precondition;
  }

  protected checkSubActions(ctx: ActionContext): void {
    for (const actionName of this.actionNames) {
      ctx.runner.registry.lookup(actionName);
    }
  }

  protected archiveTransients(ctx: ActionContext, paths: StorePath[], keep: StorePath[]): void {
    for (const storePath of new Set(paths)) {
      if (!keep.includes(storePath)) {
        ctx.store.archive(storePath, { missingOk: true, quiet: true });
      }
    }
  }
}

export class SequenceAction extends CompoundAction {
  constructor(name: string, actionNames: readonly string[], options: CompoundOptions = {}) {
    super("Sequence", name, actionNames, options);
  }

  async run(items: Item[], ctx: ActionContext): Promise<ActionResult> {
    this.checkSubActions(ctx);
    const originalPaths = pathsOf(items);
    const transients: StorePath[] = [];
    let lookAt = originalPaths;
    let outputs: Item[] = [];

    for (const [i, actionName] of this.actionNames.entries()) {
      const isLast = i === this.actionNames.length - 1;
      log.message(`Sequence \`${this.name}\` step ${i + 1} of ${this.actionNames.length}: \`${actionName}\``);
      const result = await ctx.runner.run(actionName, lookAt, {
        internalCall: true,
        ...(isLast ? {} : { overrideState: "transient" as const }),
      });
      outputs = result.items;
      lookAt = pathsOf(outputs);
      if (!isLast) transients.push(...transientPathsOf(outputs));
    }

    for (const item of outputs) {
      item.relations = { ...item.relations, derivedFrom: [...originalPaths] };
    }
    this.archiveTransients(ctx, transients, [...pathsOf(outputs), ...originalPaths]);
    return { items: outputs };
  }
}

export class ComboAction extends CompoundAction {
  private readonly combiner: Combiner;

  constructor(
    name: string,
    actionNames: readonly string[],
    options: CompoundOptions & { combiner?: Combiner } = {},
  ) {
    super("Combo", name, actionNames, options);
    this.combiner = options.combiner ?? combineAsParagraphs;
  }

  async run(items: Item[], ctx: ActionContext): Promise<ActionResult> {
    this.checkSubActions(ctx);
    const inputPaths = pathsOf(items);
    const results: Item[][] = [];

    for (const actionName of this.actionNames) {
      log.message(`Combo \`${this.name}\` running \`${actionName}\``);
      const result = await ctx.runner.run(actionName, inputPaths, {
        internalCall: true,
        overrideState: "transient",
      });
      results.push(result.items);
    }

    const combined = this.combiner(this, items, results);
    this.archiveTransients(ctx, transientPathsOf(results.flat()), inputPaths);
    return { items: [combined] };
  }
}

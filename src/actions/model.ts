/**
 * Actions: named transformations from input items to output items.
 */

import { InvalidInput } from "../lib/errors.js";
import type { FileStore } from "../lib/file-store.js";
import type { Item } from "../lib/models.js";
import type { Operation } from "../lib/operations.js";
import type { StorePath } from "../lib/store-paths.js";
import type { Precondition } from "./preconditions.js";
import type { ActionRunner } from "./runner.js";

export interface ExpectedArgs {
  min: number;
  /** Unbounded when absent */
  max?: number;
}

export const NO_ARGS: ExpectedArgs = { min: 0, max: 0 };
export const ONE_ARG: ExpectedArgs = { min: 1, max: 1 };
export const TWO_ARGS: ExpectedArgs = { min: 2, max: 2 };
export const ANY_ARGS: ExpectedArgs = { min: 0 };
export const ONE_OR_MORE_ARGS: ExpectedArgs = { min: 1 };

export interface PathOp {
  storePath: StorePath;
  op: "archive" | "select";
}

export interface ActionResult {
  items: Item[];
  /** Archive inputs once the outputs are saved */
  replacesInput?: boolean;
  /** Don't save outputs that already exist under the same identity */
  skipDuplicates?: boolean;
  /** Explicit archive/select instructions, replacing the default selection */
  pathOps?: PathOp[];
}

export interface ActionParam {
  name: string;
  description: string;
  default?: string;
}

export interface ActionContext {
  store: FileStore;
  runner: ActionRunner;
  operation: Operation;
  /** Values of the action's declared params, from the workspace */
  params: Record<string, string>;
}

export interface Action {
  readonly name: string;
  readonly description: string;
  readonly expectedArgs: ExpectedArgs;
  readonly precondition?: Precondition;
  readonly params: readonly ActionParam[];
  /** Runs on URL resources to fill in title and description */
  readonly fetchesMetadata: boolean;
  /** Outputs correspond one-to-one with inputs */
  readonly forEachItem: boolean;
  validateArgs(args: readonly string[]): void;
  validatePrecondition(items: readonly Item[]): void;
  run(items: Item[], ctx: ActionContext): Promise<ActionResult>;
  /**
   * Predict the outputs without running, so a previous run's results can be
   * found by identity. Only the fields that determine identity matter.
   */
  preassemble?(operation: Operation, items: readonly Item[]): Item[] | undefined;
}

export function formatExpectedArgs(expected: ExpectedArgs): string {
  if (expected.max === undefined) return `${expected.min} or more`;
  if (expected.min === expected.max) return String(expected.min);
  return `${expected.min} to ${expected.max}`;
}

export abstract class BaseAction implements Action {
  abstract readonly name: string;
  abstract readonly description: string;
  readonly expectedArgs: ExpectedArgs = ONE_ARG;
  readonly precondition?: Precondition;
  readonly params: readonly ActionParam[] = [];
  readonly fetchesMetadata: boolean = false;
  readonly forEachItem: boolean = false;

  validateArgs(args: readonly string[]): void {
    const { min, max } = this.expectedArgs;
    const count = args.length;
    if (count !== 0 && max === 0) {
      throw new InvalidInput(`Action ${this.name} does not expect any arguments`);
    }
    if (count !== 1 && min === 1 && max === 1) {
      throw new InvalidInput(`Action ${this.name} expects exactly one argument`);
    }
    if (max !== undefined && count > max) {
      throw new InvalidInput(`Action ${this.name} expects at most ${max} arguments`);
    }
    if (count < min) {
      throw new InvalidInput(`Action ${this.name} expects at least ${min} arguments`);
    }
  }

  validatePrecondition(items: readonly Item[]): void {
    const precondition = this.precondition;
    if (!precondition) return;
    for (const item of items) {
      precondition.check(item, `action \`${this.name}\``);
    }
  }

  /** A declared param's value from the context, else its default. */
  protected param(ctx: ActionContext, name: string): string | undefined {
    return ctx.params[name] ?? this.params.find((p) => p.name === name)?.default;
  }

  abstract run(items: Item[], ctx: ActionContext): Promise<ActionResult>;
}

/**
 * An action applied to each input independently, producing one output per
 * input. Provenance is recorded per input.
 */
export abstract class PerItemAction extends BaseAction {
  override readonly forEachItem: boolean = true;

  abstract runItem(item: Item, ctx: ActionContext): Promise<Item>;

  async run(items: Item[], ctx: ActionContext): Promise<ActionResult> {
    const outputs: Item[] = [];
    for (const item of items) {
      outputs.push(await this.runItem(item, ctx));
    }
    return { items: outputs };
  }
}

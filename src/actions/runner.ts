/**
 * Runs actions against the store: resolves inputs, records provenance,
 * reuses earlier outputs when the same operation has already been run,
 * saves outputs and updates the selection history.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { FileNotFound } from "../lib/errors.js";
import type { FileStore } from "../lib/file-store.js";
import { readImportedTextItem } from "../lib/item-files.js";
import { addToHistory, createItem, isUrlResource } from "../lib/items.js";
import { getLogger } from "../lib/logging.js";
import type { Item, ItemState } from "../lib/models.js";
import {
  formatOperation,
  operationCommandLine,
  operationForInput,
  type Operation,
} from "../lib/operations.js";
import { fileExtIsText } from "../lib/formats.js";
import { parseItemFilename, type StorePath } from "../lib/store-paths.js";
import { canonicalizeUrl, isUrl } from "../lib/urls.js";
import type { Action, ActionContext, ActionResult } from "./model.js";
import type { ActionRegistry } from "./registry.js";

const log = getLogger("runner");

const SLOW_ACTION_MS = 1000;

export interface RunOptions {
  /** Called from another action: leave the selection alone */
  internalCall?: boolean;
  /** Force this state on every output, e.g. transient for composite steps */
  overrideState?: ItemState;
  /** Run even if all outputs are already present */
  rerun?: boolean;
}

export interface RunResult extends ActionResult {
  /** Outputs were found in the store and the action was not run */
  cached: boolean;
  archivedPaths: StorePath[];
}

interface ResolvedInput {
  locator: string;
  item: Item;
  storePath?: StorePath;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

export class ActionRunner {
  constructor(
    readonly store: FileStore,
    readonly registry: ActionRegistry,
  ) {}

  /**
   * Run an action on the given arguments (store paths, file paths or URLs),
   * or on the current selection if there are none.
   */
  async run(
    actionOrName: Action | string,
    providedArgs: readonly string[] = [],
    options: RunOptions = {},
  ): Promise<RunResult> {
    const start = Date.now();
    const action =
      typeof actionOrName === "string" ? this.registry.lookup(actionOrName) : actionOrName;
    const params = this.paramsFor(action);

    let args = [...providedArgs];
    let fromSelection = false;
    if (args.length === 0) {
      args = this.store.selections.current.paths;
      fromSelection = args.length > 0;
    }
    if (fromSelection && action.expectedArgs.max === 0) {
      args = [];
    }
    if (args.length > 0) {
      log.message(
        `Using ${fromSelection ? "selection" : "provided args"} as inputs to action \`${action.name}\`: ${args.join(", ")}`,
      );
    }

    action.validateArgs(args);

    // Nothing is written until the inputs pass the precondition.
    const resolved = args.map((arg) => this.resolveInput(arg));
    action.validatePrecondition(resolved.map((r) => r.item));
    let inputs = resolved.map((r) => this.persistInput(r));

    if (!action.fetchesMetadata) {
      inputs = await this.fetchUrlMetadata(inputs);
    }

    const operation: Operation = {
      actionName: action.name,
      arguments: inputs.map((item) => {
        const storePath = this.storePathOf(item);
        return { path: storePath, hash: this.store.hash(storePath) };
      }),
    };
    if (Object.keys(params).length > 0) {
      operation.options = params;
    }
    log.message(`Action: \`${operationCommandLine(operation)}\``);
    log.info(`Operation is: ${formatOperation(operation)}`);

    const ctx: ActionContext = { store: this.store, runner: this, operation, params };

    let result: ActionResult;
    let cached = false;
    const cachedItems = options.rerun ? undefined : this.findCachedOutputs(action, operation, inputs);
    if (cachedItems) {
      result = { items: cachedItems };
      cached = true;
      log.message(
        `Action skipped: \`${action.name}\` completed with ${plural(cachedItems.length, "item")} (all outputs already exist; rerun to force)`,
      );
    } else {
      result = await action.run(inputs, ctx);
      this.stampSources(action, operation, result.items);
      if (options.overrideState) {
        for (const item of result.items) {
          item.state = options.overrideState;
        }
      }
      this.saveOutputs(result);
      log.message(
        `Action done: \`${action.name}\` completed with ${plural(result.items.length, "item")}`,
      );
    }

    const outputPaths = result.items
      .map((item) => item.storePath)
      .filter((p): p is StorePath => p !== undefined);

    const archivedPaths: StorePath[] = [];
    if (!cached && result.replacesInput) {
      const oldInputs = unique(inputs.map((item) => this.storePathOf(item)))
        .filter((p) => !outputPaths.includes(p))
        .sort();
      for (const storePath of oldInputs) {
        this.store.archive(storePath, { missingOk: true });
        archivedPaths.push(storePath);
      }
    }

    this.applySelection(result, outputPaths, archivedPaths, options);

    const elapsed = Date.now() - start;
    if (elapsed > SLOW_ACTION_MS) {
      log.message(`Action \`${action.name}\` took ${(elapsed / 1000).toFixed(1)}s`);
    }

    return { ...result, cached, archivedPaths };
  }

  private paramsFor(action: Action): Record<string, string> {
    const values: Record<string, string> = {};
    for (const param of action.params) {
      const value = this.store.params.get(param.name);
      if (value !== undefined) values[param.name] = value;
    }
    return values;
  }

  private storePathOf(item: Item): StorePath {
    if (!item.storePath) {
      throw new FileNotFound(`Input item has not been saved: ${item.title ?? item.url ?? "untitled"}`);
    }
    return item.storePath;
  }

  /**
   * Turn an argument into an in-memory item without writing anything.
   */
  private resolveInput(locator: string): ResolvedInput {
    if (isUrl(locator)) {
      const item = createItem({ type: "resource", url: canonicalizeUrl(locator), format: "url" });
      const existing = this.store.findById(item);
      return existing
        ? { locator, item: this.store.load(existing), storePath: existing }
        : { locator, item };
    }

    const storePath = this.store.resolvePath(locator);
    if (storePath && this.store.exists(storePath)) {
      return { locator, item: this.store.load(storePath), storePath };
    }

    const fullPath = path.resolve(locator);
    if (!fs.existsSync(fullPath)) {
      throw new FileNotFound(`Input not found: ${locator}`);
    }
    const parsed = parseItemFilename(fullPath);
    const type = parsed.itemType ?? "resource";
    const item = fileExtIsText(parsed.fileExt)
      ? readImportedTextItem(fullPath, type)
      : createItem({
          type,
          title: parsed.name,
          format: parsed.format ?? "binary",
          fileExt: parsed.fileExt,
          isBinary: true,
          externalPath: fullPath,
        });
    return { locator, item };
  }

  private persistInput(input: ResolvedInput): Item {
    if (input.storePath) return input.item;
    const storePath = isUrl(input.locator)
      ? this.store.save(input.item)
      : this.store.importItem(input.locator);
    return this.store.load(storePath);
  }

  /**
   * URL resources without a title or description get one from the
   * registered metadata action, if there is one.
   */
  private async fetchUrlMetadata(items: Item[]): Promise<Item[]> {
    const fetcher = this.registry.metadataFetcher();
    const enriched: Item[] = [];
    for (const item of items) {
      if (isUrlResource(item) && (!item.title || !item.description)) {
        if (!fetcher) {
          log.info(`No metadata action registered, leaving URL as is: ${item.url ?? ""}`);
          enriched.push(item);
          continue;
        }
        const fetched = await this.run(fetcher, [this.storePathOf(item)], { internalCall: true });
        enriched.push(fetched.items[0] ?? item);
      } else {
        enriched.push(item);
      }
    }
    return enriched;
  }

  /**
   * Record provenance on outputs. Per-item actions are recorded as if run
   * on each input alone.
   */
  private stampSources(action: Action, operation: Operation, items: Item[]): void {
    items.forEach((item, i) => {
      const source = action.forEachItem
        ? { operation: operationForInput(operation, i), outputNum: 0 }
        : { operation, outputNum: i };
      addToHistory(item, source);
    });
  }

  /**
   * Previous outputs of the same operation, if every predicted output is
   * already in the store.
   */
  private findCachedOutputs(
    action: Action,
    operation: Operation,
    inputs: Item[],
  ): Item[] | undefined {
    const predicted = action.preassemble?.(operation, inputs);
    if (!predicted || predicted.length === 0) {
      log.info(`Rerun check: will run since \`${action.name}\` has no preassembled outputs`);
      return undefined;
    }
    this.stampSources(action, operation, predicted);
    const present = predicted
      .map((item) => this.store.findById(item))
      .filter((p): p is StorePath => p !== undefined);
    log.info(
      `Rerun check: ${present.length} of ${predicted.length} outputs already present${present.length ? `: ${present.join(", ")}` : ""}`,
    );
    if (present.length !== predicted.length) return undefined;
    return present.map((storePath) => this.store.load(storePath));
  }

  /**
   * Save outputs in order. A failure leaves earlier outputs saved, but a
   * later run still won't treat the operation as complete since not all
   * of its outputs exist.
   */
  private saveOutputs(result: ActionResult): void {
    const skipped: StorePath[] = [];
    for (const item of result.items) {
      if (result.skipDuplicates) {
        const existing = this.store.findById(item);
        if (existing) {
          item.storePath = existing;
          skipped.push(existing);
          continue;
        }
      }
      this.store.save(item);
    }
    if (skipped.length > 0) {
      log.message(`Skipped saving ${plural(skipped.length, "item")} already saved: ${skipped.join(", ")}`);
    }
  }

  private applySelection(
    result: ActionResult,
    outputPaths: StorePath[],
    archivedPaths: StorePath[],
    options: RunOptions,
  ): void {
    const toSelect: StorePath[] = [];
    if (result.pathOps && result.pathOps.length > 0) {
      for (const pathOp of result.pathOps) {
        if (pathOp.op === "archive") {
          this.store.archive(pathOp.storePath, { missingOk: true });
          archivedPaths.push(pathOp.storePath);
        } else {
          toSelect.push(pathOp.storePath);
        }
      }
    } else {
      toSelect.push(...outputPaths);
    }

    if (options.internalCall) return;
    const paths = unique(toSelect).filter((p) => !archivedPaths.includes(p));
    if (paths.length > 0) {
      this.store.selections.push({ paths });
    }
  }
}

/**
 * Selection history: a bounded stack of selections with a cursor, so that
 * each action's outputs become the next action's default inputs and the
 * user can step back and forth between them.
 *
 * Every mutation is written to disk immediately.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { InvalidInput, InvalidOperation, errorMessage } from "./errors.js";
import { getLogger } from "./logging.js";
import { readYamlFile, writeYamlFile } from "./persisted-yaml.js";
import type { StorePath } from "./store-paths.js";

const log = getLogger("selections");

export const SELECTION_HISTORY_MAX = 50;

export interface Selection {
  paths: StorePath[];
}

const historyFileSchema = z.object({
  history: z.array(z.object({ paths: z.array(z.string()).default([]) })).default([]),
  current_index: z.number().int().min(0).default(0),
});

function sameSelection(a: Selection, b: Selection): boolean {
  return a.paths.length === b.paths.length && a.paths.every((p, i) => p === b.paths[i]);
}

function formatSelection(selection: Selection): string {
  return `Selection(${selection.paths.join(", ")})`;
}

export class SelectionHistory {
  private history: Selection[] = [];
  private index = 0;

  private constructor(
    private readonly savePath: string,
    private readonly maxHistory: number,
  ) {}

  /**
   * Load the history from `savePath`, or start empty. A corrupt file is
   * moved aside to `<savePath>.bak` and replaced.
   */
  static load(savePath: string, maxHistory = SELECTION_HISTORY_MAX): SelectionHistory {
    const instance = new SelectionHistory(savePath, maxHistory);
    if (!fs.existsSync(savePath)) return instance;

    try {
      const data = historyFileSchema.parse(readYamlFile(savePath) ?? {});
      instance.history = data.history.map((s) => ({ paths: [...s.paths] }));
      instance.index = Math.min(data.current_index, Math.max(0, instance.history.length - 1));
    } catch (err) {
      log.warn(
        `Selection history can't be loaded, so will discard it (moved to ${savePath}.bak): ${errorMessage(err)}`,
      );
      fs.renameSync(savePath, `${savePath}.bak`);
      instance.history = [];
      instance.index = 0;
      instance.save();
    }
    return instance;
  }

  private save(): void {
    writeYamlFile(this.savePath, {
      history: this.history.map((s) => ({ paths: [...s.paths] })),
      current_index: this.index,
    });
  }

  get length(): number {
    return this.history.length;
  }

  get currentIndex(): number {
    return this.index;
  }

  /** Copy of all selections, oldest first. */
  get selections(): Selection[] {
    return this.history.map((s) => ({ paths: [...s.paths] }));
  }

  /**
   * The current selection, or an empty one if there is no history.
   * An out-of-range cursor is repaired.
   */
  get current(): Selection {
    if (this.history.length === 0) {
      return { paths: [] };
    }
    const selection = this.history[this.index];
    if (!selection) {
      const fixed = Math.max(0, this.history.length - 1);
      log.warn(`Updating invalid selection index: ${this.index} -> ${fixed}`);
      this.index = fixed;
      this.save();
      return { paths: [] };
    }
    return { paths: [...selection.paths] };
  }

  clear(): void {
    this.history = [];
    this.index = 0;
    this.save();
  }

  clearFuture(): void {
    this.history.splice(this.index + 1);
    this.save();
  }

  private truncate(): void {
    if (this.maxHistory > 0 && this.history.length > this.maxHistory) {
      const excess = this.history.length - this.maxHistory;
      this.history.splice(0, excess);
      this.index = Math.max(0, this.index - excess);
    }
  }

  /**
   * Append a selection, discarding any history after the cursor. Empty
   * selections and repeats of the current one are ignored; an empty
   * selection at the end is replaced rather than kept.
   */
  push(selection: Selection): void {
    this.history.splice(this.index + 1);
    const last = this.history[this.history.length - 1];
    const pushed: Selection = { paths: [...selection.paths] };

    if (pushed.paths.length === 0) {
      log.info("Ignoring push of empty selection to history");
    } else if (last && sameSelection(last, pushed)) {
      log.info(`Ignoring push of duplicate selection to history: ${formatSelection(pushed)}`);
    } else {
      if (last && last.paths.length === 0) {
        this.history[this.history.length - 1] = pushed;
      } else {
        this.history.push(pushed);
      }
      this.index = this.history.length - 1;
      this.truncate();
    }
    this.save();
  }

  /** Remove the current selection and move the cursor back one. */
  pop(): Selection {
    const removed = this.history[this.index];
    if (!removed) {
      throw new InvalidOperation("No current selection");
    }
    this.history.splice(this.index, 1);
    this.index = Math.max(0, this.index - 1);
    this.save();
    return removed;
  }

  previous(): Selection {
    const selection = this.history[this.index - 1];
    if (this.index - 1 < 0 || !selection) {
      throw new InvalidOperation("No previous selection");
    }
    this.index -= 1;
    this.save();
    return { paths: [...selection.paths] };
  }

  next(): Selection {
    const selection = this.history[this.index + 1];
    if (!selection) {
      throw new InvalidOperation("No next selection");
    }
    this.index += 1;
    this.save();
    return { paths: [...selection.paths] };
  }

  /** Replace the current selection, or push one if there is no history. */
  setCurrent(paths: StorePath[]): void {
    if (this.history.length === 0) {
      this.push({ paths });
      return;
    }
    this.history[this.index] = { paths: [...paths] };
    this.save();
  }

  unselectCurrent(paths: StorePath[]): Selection {
    const selection = this.history[this.index];
    if (!selection) {
      throw new InvalidOperation("No current selection");
    }
    selection.paths = selection.paths.filter((p) => !paths.includes(p));
    this.save();
    return { paths: [...selection.paths] };
  }

  /**
   * Remove paths from every selection. Selections left empty are dropped
   * and the cursor moves so it still points at a valid entry.
   */
  removeValues(targets: StorePath[]): void {
    const drop = new Set(targets);
    let i = 0;
    while (i < this.history.length) {
      const selection = this.history[i];
      if (!selection) break;
      selection.paths = selection.paths.filter((p) => !drop.has(p));
      if (selection.paths.length === 0) {
        this.history.splice(i, 1);
        if (i <= this.index) {
          this.index = Math.max(0, this.index - 1);
        }
      } else {
        i++;
      }
    }
    this.index = Math.min(this.index, Math.max(0, this.history.length - 1));
    this.save();
  }

  replaceValues(replacements: [from: StorePath, to: StorePath][]): void {
    const mapping = new Map(replacements);
    for (const selection of this.history) {
      selection.paths = selection.paths.map((p) => mapping.get(p) ?? p);
    }
    this.save();
  }

  /**
   * The `n` selections ending at the cursor, oldest first. With
   * `expectedSize`, each must hold exactly that many paths.
   */
  previousN(n: number, expectedSize?: number): Selection[] {
    if (this.history.length < n) {
      throw new InvalidOperation(
        `Need ${n} selections in history but only have ${this.history.length}`,
      );
    }
    if (this.index + 1 < n) {
      throw new InvalidOperation(`Need ${n} selections before current position`);
    }
    const selections = this.history
      .slice(this.index - n + 1, this.index + 1)
      .map((s) => ({ paths: [...s.paths] }));
    if (expectedSize !== undefined) {
      selections.forEach((selection, idx) => {
        if (selection.paths.length !== expectedSize) {
          throw new InvalidInput(
            `Selection at position ${idx - n + 1} has ${selection.paths.length} paths; exactly ${expectedSize} required`,
          );
        }
      });
    }
    return selections;
  }
}

/**
 * Ways to merge the outputs of a combo action into one item.
 */

import { abbrevTitle, createItem } from "../lib/items.js";
import type { Item } from "../lib/models.js";
import { formatSource, type Source } from "../lib/operations.js";
import type { Action } from "./model.js";

/**
 * Merge the outputs of each sub-action (one list per sub-action, in order)
 * into a single item.
 */
export type Combiner = (action: Action, inputs: readonly Item[], results: readonly Item[][]) => Item;

function combinedTitle(action: Action, inputs: readonly Item[]): string {
  const first = inputs[0];
  const base = first ? abbrevTitle(first) : action.name;
  const others = inputs.length - 1;
  if (others <= 0) return base;
  return `${base} and ${others} ${others === 1 ? "other" : "others"}`;
}

/**
 * A doc holding `body`, titled after the first input, derived from all the
 * parts and carrying the union of their provenance.
 */
export function combineItems(
  action: Action,
  inputs: readonly Item[],
  parts: readonly Item[],
  body: string,
): Item {
  const seen = new Set<string>();
  const history: Source[] = [];
  for (const part of parts) {
    for (const source of part.history) {
      const key = formatSource(source);
      if (!seen.has(key)) {
        seen.add(key);
        history.push(source);
      }
    }
  }
  const derivedFrom = parts
    .map((part) => part.storePath)
    .filter((p): p is string => p !== undefined);

  return createItem({
    type: "doc",
    title: combinedTitle(action, inputs),
    format: parts[0]?.format ?? "markdown",
    body,
    relations: { derivedFrom },
    history,
  });
}

export function combineWithSeparator(separator: string): Combiner {
  return (action, inputs, results) => {
    const parts = results.flat();
    const body = parts
      .map((part) => (part.body ?? "").trim())
      .filter((text) => text.length > 0)
      .join(separator);
    return combineItems(action, inputs, parts, body);
  };
}

/** Bodies of all parts, in order, as paragraphs. */
export const combineAsParagraphs: Combiner = combineWithSeparator("\n\n");

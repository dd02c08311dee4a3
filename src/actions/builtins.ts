/**
 * Built-in actions that need nothing outside the workspace.
 */

import { derivedCopy, newCopyWith } from "../lib/items.js";
import type { Item } from "../lib/models.js";
import type { Operation } from "../lib/operations.js";
import {
  ANY_ARGS,
  BaseAction,
  ONE_OR_MORE_ARGS,
  PerItemAction,
  type ActionContext,
  type ActionParam,
  type ActionResult,
  type ExpectedArgs,
} from "./model.js";
import { hasTextBody } from "./preconditions.js";
import { ActionRegistry } from "./registry.js";

export class CopyItems extends PerItemAction {
  readonly name = "copy_items";
  readonly description =
    "Copy the input items with no changes. Useful as a step in combo actions.";
  override readonly expectedArgs: ExpectedArgs = ANY_ARGS;

  async runItem(item: Item): Promise<Item> {
    return newCopyWith(item);
  }

  preassemble(_operation: Operation, items: readonly Item[]): Item[] {
    return items.map((item) => newCopyWith(item));
  }
}

export class Concat extends BaseAction {
  readonly name = "concat";
  readonly description =
    "Concatenate the given text documents into a single document, with a title for each section.";
  override readonly expectedArgs: ExpectedArgs = ONE_OR_MORE_ARGS;
  override readonly precondition = hasTextBody;
  override readonly params: readonly ActionParam[] = [
    { name: "separator", description: "Separator string.", default: "\n\n" },
    { name: "section_template", description: "Section title template.", default: "## {title}" },
  ];

  async run(items: Item[], ctx: ActionContext): Promise<ActionResult> {
    const separator = this.param(ctx, "separator") ?? "\n\n";
    const template = this.param(ctx, "section_template") ?? "## {title}";

    const body = items
      .filter((item) => item.body)
      .map((item) => `${template.replace("{title}", item.title || "Untitled")}${separator}${item.body ?? ""}`)
      .join(separator);

    const [first] = items;
    if (!first) return { items: [] };
    const derivedFrom = items.map((item) => item.storePath).filter((p): p is string => p !== undefined);
    return { items: [derivedCopy(first, { type: "doc", body, relations: { derivedFrom } })] };
  }

  preassemble(_operation: Operation, items: readonly Item[]): Item[] | undefined {
    const [first] = items;
    if (!first?.storePath) return undefined;
    return [derivedCopy(first, { type: "doc", body: "" })];
  }
}

/** A registry with every built-in action. */
export function createDefaultRegistry(): ActionRegistry {
  return new ActionRegistry([new CopyItems(), new Concat()]);
}

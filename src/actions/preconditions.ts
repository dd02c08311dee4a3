/**
 * Named predicates over items, used to qualify action inputs. Combine with
 * `and`, `or` and `not`; `check` throws PreconditionFailure.
 */

import { PreconditionFailure } from "../lib/errors.js";
import { abbrevTitle, isTextItem, isUrlResource as itemIsUrlResource } from "../lib/items.js";
import type { Item } from "../lib/models.js";

export class Precondition {
  constructor(
    private readonly func: (item: Item) => boolean,
    readonly name: string,
  ) {}

  test(item: Item): boolean {
    try {
      return this.func(item);
    } catch (err) {
      if (err instanceof PreconditionFailure) return false;
      throw err;
    }
  }

  check(item: Item, info?: string): void {
    if (!this.test(item)) {
      const where = info ? ` for ${info}` : "";
      throw new PreconditionFailure(
        `Precondition not satisfied${where}: ${this} is false for ${item.storePath ?? abbrevTitle(item)}`,
      );
    }
  }

  and(other: Precondition): Precondition {
    return new Precondition((item) => this.test(item) && other.test(item), `${this.name} & ${other.name}`);
  }

  or(other: Precondition): Precondition {
    return new Precondition((item) => this.test(item) || other.test(item), `${this.name} | ${other.name}`);
  }

  not(): Precondition {
    return new Precondition((item) => !this.test(item), `~${this.name}`);
  }

  toString(): string {
    return `\`${this.name}\``;
  }

  static andAll(...preconditions: Precondition[]): Precondition {
    const [first, ...rest] = preconditions;
    if (!first) return new Precondition(() => true, "always");
    return rest.reduce((combined, p) => combined.and(p), first);
  }

  static orAll(...preconditions: Precondition[]): Precondition {
    const [first, ...rest] = preconditions;
    if (!first) return new Precondition(() => false, "never");
    return rest.reduce((combined, p) => combined.or(p), first);
  }
}

export const isUrlResource = new Precondition(itemIsUrlResource, "is_url_resource");

export const hasBody = new Precondition(
  (item) => item.body !== undefined && item.body.trim().length > 0,
  "has_body",
);

export const hasTextBody = new Precondition(
  (item) => isTextItem(item) && hasBody.test(item),
  "has_text_body",
);

export const hasHtmlBody = new Precondition(
  (item) => hasBody.test(item) && (item.format === "html" || item.format === "md_html"),
  "has_html_body",
);

export const isMarkdown = new Precondition(
  (item) => hasBody.test(item) && item.format === "markdown",
  "is_markdown",
);

export const isNote = new Precondition((item) => item.type === "note", "is_note");

export const isConfig = new Precondition((item) => item.type === "config", "is_config");

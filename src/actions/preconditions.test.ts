import { describe, it, expect } from "vitest";
import { InvalidInput, InvalidState, PreconditionFailure } from "../lib/errors.js";
import { createItem } from "../lib/items.js";
import type { Item } from "../lib/models.js";
import { CopyItems, Concat, createDefaultRegistry } from "./builtins.js";
import {
  ANY_ARGS,
  BaseAction,
  NO_ARGS,
  ONE_ARG,
  TWO_ARGS,
  formatExpectedArgs,
  type ActionResult,
  type ExpectedArgs,
} from "./model.js";
import {
  Precondition,
  hasBody,
  hasHtmlBody,
  hasTextBody,
  isMarkdown,
  isNote,
  isUrlResource,
} from "./preconditions.js";
import { ActionRegistry } from "./registry.js";

class Fixed extends BaseAction {
  readonly description = "test action";

  constructor(
    readonly name: string,
    override readonly expectedArgs: ExpectedArgs,
    override readonly fetchesMetadata = false,
  ) {
    super();
  }

  async run(items: Item[]): Promise<ActionResult> {
    return { items };
  }
}

describe("Precondition", () => {
  const markdownNote = createItem({ type: "note", title: "N", format: "markdown", body: "text" });
  const htmlDoc = createItem({ type: "doc", title: "D", format: "html", body: "<p>x</p>" });
  const url = createItem({ type: "resource", format: "url", url: "https://example.com" });

  it("should test the built-in predicates", () => {
    expect(isUrlResource.test(url)).toBe(true);
    expect(isUrlResource.test(markdownNote)).toBe(false);
    expect(hasBody.test(url)).toBe(false);
    expect(hasBody.test(createItem({ type: "note", body: "  \n" }))).toBe(false);
    expect(hasTextBody.test(markdownNote)).toBe(true);
    expect(hasHtmlBody.test(htmlDoc)).toBe(true);
    expect(isMarkdown.test(htmlDoc)).toBe(false);
    expect(isNote.test(markdownNote)).toBe(true);
  });

  it("should not count binary items as text", () => {
    const binary = createItem({ type: "resource", format: "binary", isBinary: true, body: "x" });
    expect(hasTextBody.test(binary)).toBe(false);
  });

  it("should combine and name predicates", () => {
    const both = isNote.and(hasBody);
    const either = isNote.or(isUrlResource);
    const neither = either.not();

    expect(both.name).toBe("is_note & has_body");
    expect(both.test(markdownNote)).toBe(true);
    expect(both.test(htmlDoc)).toBe(false);
    expect(either.test(url)).toBe(true);
    expect(neither.name).toBe("~is_note | is_url_resource");
    expect(neither.test(htmlDoc)).toBe(true);
  });

  it("should fold lists of predicates", () => {
    expect(Precondition.andAll().test(htmlDoc)).toBe(true);
    expect(Precondition.orAll().test(htmlDoc)).toBe(false);
    expect(Precondition.andAll(isNote, hasBody).name).toBe("is_note & has_body");
  });

  it("should report which predicate failed", () => {
    expect(() => isNote.and(hasBody).check(htmlDoc, "action `summarize`")).toThrow(
      "Precondition not satisfied for action `summarize`: `is_note & has_body` is false for D",
    );
    expect(() => isNote.check(htmlDoc)).toThrow(PreconditionFailure);
  });

  it("should treat a failure inside a predicate as false", () => {
    const strict = new Precondition(() => {
      throw new PreconditionFailure("missing field");
    }, "strict");
    expect(strict.test(htmlDoc)).toBe(false);
  });
});

describe("BaseAction.validateArgs", () => {
  it("should enforce argument counts", () => {
    expect(() => new Fixed("none", NO_ARGS).validateArgs(["a"])).toThrow(
      "Action none does not expect any arguments",
    );
    expect(() => new Fixed("one", ONE_ARG).validateArgs([])).toThrow(
      "Action one expects exactly one argument",
    );
    expect(() => new Fixed("two", TWO_ARGS).validateArgs(["a", "b", "c"])).toThrow(
      "Action two expects at most 2 arguments",
    );
    expect(() => new Fixed("two", TWO_ARGS).validateArgs(["a"])).toThrow(
      "Action two expects at least 2 arguments",
    );
    expect(() => new Fixed("any", ANY_ARGS).validateArgs([])).not.toThrow();
  });

  it("should describe expected counts", () => {
    expect(formatExpectedArgs(NO_ARGS)).toBe("0");
    expect(formatExpectedArgs(ANY_ARGS)).toBe("0 or more");
    expect(formatExpectedArgs({ min: 1, max: 3 })).toBe("1 to 3");
  });
});

describe("ActionRegistry", () => {
  it("should look up registered actions", () => {
    const registry = createDefaultRegistry();

    expect(registry.lookup("concat")).toBeInstanceOf(Concat);
    expect(registry.has("copy_items")).toBe(true);
    expect(registry.list().map((a) => a.name)).toEqual(["concat", "copy_items"]);
  });

  it("should reject unknown names", () => {
    expect(() => createDefaultRegistry().lookup("nope")).toThrow(InvalidInput);
    expect(() => createDefaultRegistry().lookup("nope")).toThrow("Action not found: nope");
  });

  it("should reject duplicate names", () => {
    expect(() => new ActionRegistry([new CopyItems(), new CopyItems()])).toThrow(InvalidState);
  });

  it("should find the metadata action by capability", () => {
    const registry = new ActionRegistry([new Fixed("plain", ONE_ARG)]);
    expect(registry.metadataFetcher()).toBeUndefined();

    registry.register(new Fixed("fetch_meta", ONE_ARG, true));

    expect(registry.metadataFetcher()?.name).toBe("fetch_meta");
  });
});

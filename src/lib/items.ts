/**
 * Item construction, copying, naming and identity.
 */

import { InvalidInput } from "./errors.js";
import { fileExtForFormat, formatHasBody, formatIsText, type Format } from "./formats.js";
import { sha1Hex, stableStringify } from "./hashing.js";
import { itemToMetadata } from "./item-metadata.js";
import type { Item, ItemFields, ItemType } from "./models.js";
import { formatSource, type Source } from "./operations.js";
import { folderForType, joinSuffix, slugify, type StorePath } from "./store-paths.js";
import { canonicalizeUrl } from "./urls.js";

export const MAX_TITLE_LENGTH = 64;

export function createItem(fields: ItemFields): Item {
  const now = new Date();
  return {
    ...fields,
    createdAt: fields.createdAt ?? now,
    modifiedAt: fields.modifiedAt ?? fields.createdAt ?? now,
    relations: { ...fields.relations },
    history: [...(fields.history ?? [])],
    state: fields.state ?? "normal",
  };
}

function cloneItem(item: Item): Item {
  return {
    ...item,
    relations: {
      ...(item.relations.derivedFrom ? { derivedFrom: [...item.relations.derivedFrom] } : {}),
      ...(item.relations.diffOf ? { diffOf: [...item.relations.diffOf] } : {}),
    },
    history: [...item.history],
    ...(item.extra ? { extra: { ...item.extra } } : {}),
  };
}

/**
 * A fresh, unsaved copy with the given fields replaced, new timestamps and
 * the normal state.
 */
export function newCopyWith(item: Item, overrides: Partial<Item> = {}): Item {
  const now = new Date();
  const copy: Item = {
    ...cloneItem(item),
    createdAt: now,
    modifiedAt: now,
    state: "normal",
    ...overrides,
  };
  if (!("storePath" in overrides)) delete copy.storePath;
  return copy;
}

/**
 * An unsaved copy recording that it was derived from `item`, which must
 * already be in the store.
 */
export function derivedCopy(item: Item, overrides: Partial<Item> = {}): Item {
  if (!item.storePath) {
    throw new InvalidInput(
      `Cannot derive from an unsaved item: ${abbrevTitle(item)}`,
    );
  }
  return newCopyWith(item, {
    relations: { derivedFrom: [item.storePath] },
    ...overrides,
  });
}

export function validateItem(item: Item): void {
  if (item.format && formatHasBody(item.format) && item.body === undefined && !item.externalPath) {
    throw new InvalidInput(
      `Item must have a body or an external path for format ${item.format}: ${abbrevTitle(item)}`,
    );
  }
}

export function isUrlResource(item: Item): boolean {
  return item.type === "resource" && item.format === "url" && Boolean(item.url);
}

export function isTextItem(item: Item): boolean {
  return !item.isBinary && (!item.format || formatIsText(item.format));
}

function abbreviate(text: string, max: number): string {
  const oneLine = text.replace(/\s+/g, " ").trim();
  return oneLine.length <= max ? oneLine : `${oneLine.slice(0, max - 1)}…`;
}

/**
 * A short human-readable title, falling back to the URL, description or
 * first body line.
 */
export function abbrevTitle(item: Item, max = MAX_TITLE_LENGTH): string {
  const firstLine = item.body
    ?.split("\n")
    .map((line) => line.replace(/^#+\s*/, "").trim())
    .find((line) => line.length > 0);
  const candidate = item.title || item.url || item.description || firstLine;
  return candidate ? abbreviate(candidate, max) : "Untitled";
}

export function titleSlug(item: Item): string {
  return slugify(abbrevTitle(item)) || "untitled";
}

/**
 * Suffix used in filenames, e.g. `note.md`. The format decides the
 * extension where it has one; extensions drop the type.
 */
export function fullSuffix(item: Item): string {
  const ext = (item.format ? fileExtForFormat(item.format) : undefined) ?? item.fileExt;
  if (!ext) {
    throw new InvalidInput(
      `Cannot determine file extension for item: ${abbrevTitle(item)}`,
    );
  }
  return item.type === "extension" ? ext : `${item.type}.${ext}`;
}

/** Where a new item of this kind goes, before uniquifying the name. */
export function defaultStorePath(item: Item): StorePath {
  return `${folderForType(item.type)}/${joinSuffix(titleSlug(item), fullSuffix(item))}`;
}

export function lastSource(item: Item): Source | undefined {
  return item.history[item.history.length - 1];
}

export function addToHistory(item: Item, source: Source): void {
  const key = formatSource(source);
  if (!item.history.some((s) => formatSource(s) === key)) {
    item.history.push(source);
  }
}

export interface ItemId {
  type: ItemType;
  format: Format | "";
  value: string;
}

export function canonicalConcept(title: string): string {
  return title.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Stable identity of an item, if it has one. Items with equal ids are the
 * same logical item and share a store path. In priority order: the
 * canonical URL of a URL resource, the normalized title of a concept, the
 * provenance source of an action output, or a hash of a note's text.
 */
export function itemId(item: Item): ItemId | undefined {
  const format = item.format ?? "";
  if (isUrlResource(item) && item.url) {
    return { type: item.type, format, value: `url:${canonicalizeUrl(item.url)}` };
  }
  if (item.type === "concept" && item.title) {
    return { type: item.type, format, value: `concept:${canonicalConcept(item.title)}` };
  }
  const source = lastSource(item);
  if (source) {
    return { type: item.type, format, value: `src:${formatSource(source)}` };
  }
  if (item.type === "note" && item.body !== undefined && item.body.trim().length > 0) {
    const digest = sha1Hex(`${item.title ?? ""}\0${item.body.trimEnd()}`);
    return { type: item.type, format, value: `hash:${digest}` };
  }
  return undefined;
}

export function formatItemId(id: ItemId): string {
  return `id:${id.type}:${id.format}:${id.value}`;
}

function comparableMetadata(item: Item): string {
  const { created_at: _created, modified_at: _modified, ...rest } = itemToMetadata(item);
  return stableStringify(rest);
}

/**
 * True when two items hold the same content: all persisted metadata except
 * timestamps, and bodies ignoring trailing whitespace.
 */
export function contentEquals(a: Item, b: Item): boolean {
  if (Boolean(a.isBinary) !== Boolean(b.isBinary)) return false;
  if (comparableMetadata(a) !== comparableMetadata(b)) return false;
  return (a.body ?? "").trimEnd() === (b.body ?? "").trimEnd();
}

/**
 * Store paths and file naming.
 *
 * Items live at `<folder>/<slug>.<type>.<ext>` relative to the workspace
 * root, e.g. `notes/meeting_notes.note.md` or `resources/example_com.resource.yml`.
 */

import * as path from "node:path";
import { InvalidFilename, InvalidInput } from "./errors.js";
import { isItemType, type ItemType } from "./models.js";
import { guessFormatForExt, parseFileExt, type FileExt, type Format } from "./formats.js";

/** A workspace-relative path with `/` separators. */
export type StorePath = string;

const TYPE_FOLDERS: Record<ItemType, string> = {
  note: "notes",
  resource: "resources",
  export: "exports",
  concept: "concepts",
  doc: "docs",
  config: "configs",
  question: "questions",
  answer: "answers",
  instruction: "instructions",
  extension: "extensions",
};

export const MAX_SLUG_LENGTH = 64;

export function folderForType(type: ItemType): string {
  return TYPE_FOLDERS[type];
}

/**
 * Validate and normalize a workspace-relative path.
 */
export function toStorePath(value: string): StorePath {
  const normalized = value.replace(/\\/g, "/").replace(/^\.\//, "");
  if (!normalized || normalized.includes("\0")) {
    throw new InvalidInput(`Invalid store path: ${JSON.stringify(value)}`);
  }
  if (path.posix.isAbsolute(normalized) || path.win32.isAbsolute(value)) {
    throw new InvalidInput(`Store path must be relative: ${value}`);
  }
  const cleaned = path.posix.normalize(normalized);
  if (cleaned === ".." || cleaned.startsWith("../")) {
    throw new InvalidInput(`Store path must stay inside the workspace: ${value}`);
  }
  return cleaned;
}

/**
 * Lower-case slug of a title: runs of other characters become `_`.
 */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/, "");
}

export function joinSuffix(slug: string, fullSuffix: string): string {
  return `${slug}.${fullSuffix.replace(/^\.+/, "")}`;
}

export interface FilenameParts {
  dirname: string;
  name: string;
  itemType: string;
  ext: string;
}

/**
 * Split a path from the right:
 * `folder/file.name.type.ext` → `{ dirname: "folder", name: "file.name", itemType: "type", ext: "ext" }`.
 * A single dot means no type part; no dot means no extension.
 */
export function splitFilename(filename: string): FilenameParts {
  const dirname = path.posix.dirname(filename.replace(/\\/g, "/"));
  const base = path.posix.basename(filename.replace(/\\/g, "/"));
  const parts = base.split(".");
  const dir = dirname === "." ? "" : dirname;
  if (parts.length >= 3) {
    const ext = parts[parts.length - 1] ?? "";
    const itemType = parts[parts.length - 2] ?? "";
    return { dirname: dir, name: parts.slice(0, -2).join("."), itemType, ext };
  }
  if (parts.length === 2) {
    return { dirname: dir, name: parts[0] ?? "", itemType: "", ext: parts[1] ?? "" };
  }
  return { dirname: dir, name: base, itemType: "", ext: "" };
}

export interface ItemFilename {
  name: string;
  itemType?: ItemType;
  format?: Format;
  fileExt: FileExt;
}

/**
 * Parse a store filename into name, type, format and extension. The type
 * and format are left unset when unrecognized; an unknown extension is an
 * InvalidFilename since every store file is expected to have one.
 */
export function parseItemFilename(filename: string): ItemFilename {
  const { name, itemType, ext } = splitFilename(filename);
  const fileExt = parseFileExt(ext);
  if (!fileExt) {
    throw new InvalidFilename(`Unknown extension for file: ${filename}`);
  }
  const result: ItemFilename = { name, fileExt };
  if (isItemType(itemType)) result.itemType = itemType;
  const format = guessFormatForExt(fileExt);
  if (format) result.format = format;
  return result;
}

/**
 * Hidden files, `__` names and `.partial.` downloads are never items.
 */
export function isSkippableName(filename: string): boolean {
  const base = path.posix.basename(filename.replace(/\\/g, "/"));
  return (
    base.startsWith(".") ||
    base.startsWith("__") ||
    /\.partial\.[^.]+$/.test(base)
  );
}

/** The `type.ext` suffix of a filename, or just `ext` if there is no type. */
export function fullSuffixOf(filename: string): string {
  const { itemType, ext } = splitFilename(filename);
  return itemType ? `${itemType}.${ext}` : ext;
}

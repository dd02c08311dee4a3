/**
 * Reading and writing item files, and the mtime-validated load cache.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import matter from "gray-matter";
import { writeFileAtomic } from "./atomic.js";
import { errorMessage, FileFormatError, InvalidInput, isSkippable } from "./errors.js";
import { fileExtIsText, formatHasBody, type FileExt, type Format } from "./formats.js";
import {
  readBodyFrom,
  parseYamlMetadata,
  readFrontmatterHeader,
  renderFrontmatter,
  styleForFormat,
  type FrontmatterHeader,
} from "./frontmatter.js";
import { itemFromMetadata, itemMetadataSchema, itemToMetadata } from "./item-metadata.js";
import { createItem } from "./items.js";
import { getLogger } from "./logging.js";
import type { Item, ItemType } from "./models.js";
import { parseItemFilename, type StorePath } from "./store-paths.js";

const log = getLogger("item-files");

/** Store path of `fullPath` if it lies inside `baseDir`. */
export function relativeStorePath(baseDir: string, fullPath: string): StorePath | undefined {
  const rel = path.relative(path.resolve(baseDir), path.resolve(fullPath));
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) return undefined;
  return rel.split(path.sep).join("/");
}

function locate(item: Item, baseDir: string, fullPath: string): void {
  const storePath = relativeStorePath(baseDir, fullPath);
  if (storePath) {
    item.storePath = storePath;
  } else {
    item.externalPath = fullPath;
  }
}

/**
 * Write a text item: metadata block, then the body verbatim.
 */
export function writeItem(item: Item, fullPath: string): void {
  if (item.isBinary) {
    throw new InvalidInput(`Cannot write a binary item as text: ${fullPath}`);
  }
  let body = item.body ?? "";
  if (item.format === "yaml") {
    body = body.replace(/^---\r?\n/, "");
  }
  const header = renderFrontmatter(styleForFormat(item.format), itemToMetadata(item));
  writeFileAtomic(fullPath, header + body);
}

/**
 * Read an item file. Binary files are described from their filename and
 * keep an external path to the data; their contents are never read.
 */
export function readItem(fullPath: string, baseDir: string): Item {
  const parsed = parseItemFilename(fullPath);
  const stat = fs.statSync(fullPath);

  if (!fileExtIsText(parsed.fileExt)) {
    const item = createItem({
      type: parsed.itemType ?? "resource",
      title: parsed.name,
      format: parsed.format ?? "binary",
      fileExt: parsed.fileExt,
      isBinary: true,
      externalPath: fullPath,
      createdAt: stat.mtime,
      modifiedAt: stat.mtime,
    });
    const storePath = relativeStorePath(baseDir, fullPath);
    if (storePath) item.storePath = storePath;
    return item;
  }

  const header = readFrontmatterHeader(fullPath);
  if (!header) {
    throw new FileFormatError(`No metadata found in file: ${fullPath}`);
  }
  const data = parseYamlMetadata(header.raw, fullPath);
  const body = readBodyFrom(fullPath, header.bodyOffset);
  const item = itemFromMetadata(data, {
    fileExt: parsed.fileExt,
    modifiedAt: stat.mtime,
  });
  if (body || !item.format || formatHasBody(item.format)) {
    item.body = body;
  }
  locate(item, baseDir, fullPath);
  return item;
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function readNativeHeader(
  fullPath: string,
): { header: FrontmatterHeader; data: Record<string, unknown> } | undefined {
  try {
    const header = readFrontmatterHeader(fullPath);
    if (!header) return undefined;
    return { header, data: parseYamlMetadata(header.raw, fullPath) };
  } catch (err) {
    if (!isSkippable(err)) throw err;
    log.debug(`Not in item format, reading leniently: ${fullPath}: ${errorMessage(err)}`);
    return undefined;
  }
}

function readNativeItem(fullPath: string, fileExt: FileExt): Item | undefined {
  const native = readNativeHeader(fullPath);
  if (!native || !itemMetadataSchema.safeParse(native.data).success) return undefined;
  return itemFromMetadata(native.data, {
    fileExt,
    body: readBodyFrom(fullPath, native.header.bodyOffset),
  });
}

/**
 * Read a text file from outside the store, with or without a metadata
 * block. Files in the store's own format load as-is; anything else is
 * parsed leniently (a `---` frontmatter block is optional) and titled
 * after the file.
 */
export function readImportedTextItem(fullPath: string, fallbackType: ItemType): Item {
  const parsed = parseItemFilename(fullPath);
  if (!fileExtIsText(parsed.fileExt)) {
    throw new InvalidInput(`Not a text file: ${fullPath}`);
  }
  const native = readNativeItem(fullPath, parsed.fileExt);
  if (native) return native;

  let file: matter.GrayMatterFile<string>;
  try {
    file = matter(fs.readFileSync(fullPath, "utf8"), {});
  } catch (err) {
    throw new FileFormatError(`Invalid frontmatter in ${fullPath}`, { cause: err });
  }
  const data: Record<string, unknown> = file.data;
  const format: Format = parsed.format ?? (parsed.fileExt === "yml" ? "yaml" : "plaintext");
  const stat = fs.statSync(fullPath);
  const item = createItem({
    type: parsed.itemType ?? fallbackType,
    title: stringField(data, "title") ?? parsed.name,
    format,
    fileExt: parsed.fileExt,
    body: file.content,
    createdAt: stat.mtime,
    modifiedAt: stat.mtime,
  });
  const description = stringField(data, "description");
  if (description) item.description = description;
  const url = stringField(data, "url");
  if (url) item.url = url;
  return item;
}

interface CacheEntry<T> {
  signature: string;
  value: T;
}

/**
 * Bounded LRU of loaded values keyed by resolved path. An entry is valid
 * only while the file's mtime and size are unchanged. Values are cloned on
 * the way in and out so callers may mutate what they get.
 */
export class FileMtimeCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly maxSize = 2000,
    private readonly clone: (value: T) => T = (value) => structuredClone(value),
  ) {}

  private static signature(fullPath: string): string | undefined {
    const stat = fs.statSync(fullPath, { throwIfNoEntry: false });
    return stat ? `${stat.mtimeMs}:${stat.size}` : undefined;
  }

  get(fullPath: string): T | undefined {
    const key = path.resolve(fullPath);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.signature !== FileMtimeCache.signature(key)) {
      this.entries.delete(key);
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return this.clone(entry.value);
  }

  set(fullPath: string, value: T): void {
    const key = path.resolve(fullPath);
    const signature = FileMtimeCache.signature(key);
    if (!signature) return;
    this.entries.delete(key);
    this.entries.set(key, { signature, value: this.clone(value) });
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(fullPath: string): void {
    this.entries.delete(path.resolve(fullPath));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

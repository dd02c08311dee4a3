/**
 * File-backed item store.
 *
 * Items are plain files under the workspace root. The store keeps two
 * in-memory indexes rebuilt from disk on load: a uniquifier of taken
 * filenames and a map from item identity to store path. Overwritten and
 * removed items go to the archive, never to deletion.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { copyFileAtomic, moveFile } from "./atomic.js";
import {
  FileExists,
  FileNotFound,
  InvalidState,
  PersistenceError,
  errorMessage,
  isSkippable,
} from "./errors.js";
import { fileExtIsText } from "./formats.js";
import { hashFile } from "./hashing.js";
import {
  FileMtimeCache,
  readImportedTextItem,
  readItem,
  relativeStorePath,
  writeItem,
} from "./item-files.js";
import {
  abbrevTitle,
  contentEquals,
  createItem,
  defaultStorePath,
  formatItemId,
  fullSuffix,
  itemId,
  titleSlug,
  validateItem,
} from "./items.js";
import { getLogger } from "./logging.js";
import type { Item, ItemType } from "./models.js";
import { ParamState } from "./params.js";
import { SelectionHistory, SELECTION_HISTORY_MAX } from "./selections.js";
import { ARCHIVE_DIR, DOT_DIR, initWorkspace, type MetadataDirs } from "./storage.js";
import {
  folderForType,
  fullSuffixOf,
  isSkippableName,
  joinSuffix,
  parseItemFilename,
  splitFilename,
  toStorePath,
  type StorePath,
} from "./store-paths.js";
import { Uniquifier } from "./uniquifier.js";
import { canonicalizeUrl, isUrl } from "./urls.js";

const log = getLogger("file-store");

export interface FoundPath {
  storePath: StorePath;
  /** The item already has this path, or an item with its identity does */
  found: boolean;
  /** Most recent earlier file with the same base name, if any */
  oldStorePath?: StorePath;
}

export interface FileStoreOptions {
  maxSelectionHistory?: number;
  cacheSize?: number;
}

export interface ArchiveOptions {
  /** Return quietly if the item is not there */
  missingOk?: boolean;
  quiet?: boolean;
}

export interface ImportOptions {
  asType?: ItemType;
  /** Read and save again even if the path is already in the store */
  reimport?: boolean;
}

export class FileStore {
  readonly baseDir: string;
  readonly dirs: MetadataDirs;
  readonly selections: SelectionHistory;
  readonly params: ParamState;
  /** Problems found during the last scan, such as duplicate identities */
  readonly warnings: string[] = [];

  private uniquifier = new Uniquifier();
  private readonly idMap = new Map<string, StorePath>();
  private readonly cache: FileMtimeCache<Item>;

  constructor(baseDir: string, options: FileStoreOptions = {}) {
    this.baseDir = path.resolve(baseDir);
    this.dirs = initWorkspace(this.baseDir);
    this.selections = SelectionHistory.load(
      this.dirs.selectionFile,
      options.maxSelectionHistory ?? SELECTION_HISTORY_MAX,
    );
    this.params = new ParamState(this.dirs.paramsFile);
    this.cache = new FileMtimeCache<Item>(options.cacheSize);
    this.reload();
  }

  /**
   * Rebuild the filename and identity indexes from a fresh scan.
   */
  reload(): void {
    const start = Date.now();
    this.uniquifier = new Uniquifier();
    this.idMap.clear();
    this.warnings.length = 0;
    this.cache.clear();

    let count = 0;
    for (const storePath of this.walkItems()) {
      try {
        parseItemFilename(storePath);
      } catch (err) {
        if (!isSkippable(err)) throw err;
        log.debug(`Skipping file with unrecognized name: ${storePath}`);
        continue;
      }
      this.addName(storePath);
      this.indexId(storePath);
      count++;
    }
    this.dropMissingFromSelections();
    log.info(`Loaded ${count} items from ${this.baseDir} in ${Date.now() - start}ms`);
  }

  fullPath(storePath: StorePath): string {
    return path.join(this.baseDir, toStorePath(storePath));
  }

  exists(storePath: StorePath): boolean {
    return fs.existsSync(this.fullPath(storePath));
  }

  /**
   * The store path for a path given on the command line or by an action:
   * a store-relative path that exists, or any path that lies inside the
   * workspace.
   */
  resolvePath(candidate: string): StorePath | undefined {
    if (!path.isAbsolute(candidate)) {
      const normalized = path.posix.normalize(candidate.replace(/\\/g, "/"));
      if (!normalized.startsWith("..") && this.exists(normalized)) {
        return toStorePath(normalized);
      }
    }
    const rel = relativeStorePath(this.baseDir, path.resolve(candidate));
    if (!rel || rel === DOT_DIR || rel.startsWith(`${DOT_DIR}/`)) return undefined;
    return rel;
  }

  private addName(storePath: StorePath): void {
    const { name } = splitFilename(storePath);
    this.uniquifier.add(name, fullSuffixOf(storePath));
  }

  private removeName(storePath: StorePath): void {
    const { name } = splitFilename(storePath);
    this.uniquifier.remove(name, fullSuffixOf(storePath));
  }

  private tryLoad(storePath: StorePath): Item | undefined {
    try {
      return this.load(storePath);
    } catch (err) {
      if (isSkippable(err) || err instanceof FileNotFound) {
        log.warn(`Could not read item ${storePath}: ${errorMessage(err)}`);
        return undefined;
      }
      throw err;
    }
  }

  private indexId(storePath: StorePath): void {
    let item: Item;
    try {
      item = this.load(storePath);
    } catch (err) {
      log.warn(`Skipping unreadable item ${storePath}: ${errorMessage(err)}`);
      return;
    }
    const id = itemId(item);
    if (!id) return;
    const key = formatItemId(id);
    const previous = this.idMap.get(key);
    if (previous && previous !== storePath && this.exists(previous)) {
      const warning = `Duplicate items (${key}): ${previous}, ${storePath}`;
      log.warn(warning);
      this.warnings.push(warning);
    }
    this.idMap.set(key, storePath);
  }

  private unindexId(storePath: StorePath): void {
    const item = this.tryLoad(storePath);
    const id = item ? itemId(item) : undefined;
    if (!id) return;
    const key = formatItemId(id);
    if (this.idMap.get(key) === storePath) {
      this.idMap.delete(key);
    }
  }

  private indexItem(storePath: StorePath): void {
    this.addName(storePath);
    this.indexId(storePath);
  }

  private dropMissingFromSelections(): void {
    const missing = new Set<StorePath>();
    for (const selection of this.selections.selections) {
      for (const p of selection.paths) {
        if (!this.exists(p)) missing.add(p);
      }
    }
    if (missing.size > 0) {
      log.info(`Removing ${missing.size} missing paths from selections`);
      this.selections.removeValues([...missing]);
    }
  }

  /**
   * Best-effort lookup of an item with the same identity already in the
   * store. Falls back to checking the item's default path on disk.
   */
  findById(item: Item): StorePath | undefined {
    const id = itemId(item);
    if (!id) return undefined;
    const key = formatItemId(id);

    const indexed = this.idMap.get(key);
    if (indexed && this.exists(indexed)) {
      log.debug(`Found item by id: ${key} -> ${indexed}`);
      return indexed;
    }

    const fallback = defaultStorePath(item);
    if (this.exists(fallback)) {
      const existing = this.tryLoad(fallback);
      const existingId = existing ? itemId(existing) : undefined;
      if (existingId && formatItemId(existingId) === key) {
        this.idMap.set(key, fallback);
        return fallback;
      }
    }
    return undefined;
  }

  /**
   * Where an item would be saved. Reuses the item's own path or the path of
   * an item with the same identity; otherwise picks a fresh unique name.
   * Picking a fresh name reserves it.
   */
  findPathFor(item: Item): FoundPath {
    if (item.storePath) {
      return { storePath: toStorePath(item.storePath), found: true };
    }
    const id = itemId(item);
    const indexed = id ? this.idMap.get(formatItemId(id)) : undefined;
    if (indexed) {
      log.info(`Found existing item with same id: ${indexed}`);
      return { storePath: indexed, found: true };
    }

    const folder = folderForType(item.type);
    const suffix = fullSuffix(item);
    const { name, oldNames } = this.uniquifier.uniquifyHistoric(titleSlug(item), suffix);
    const storePath = `${folder}/${joinSuffix(name, suffix)}`;

    const oldStorePath = [...oldNames]
      .reverse()
      .map((old) => `${folder}/${joinSuffix(old, suffix)}`)
      .find((candidate) => this.exists(candidate));

    return oldStorePath ? { storePath, found: false, oldStorePath } : { storePath, found: false };
  }

  /**
   * Save an item and set its `storePath`. An existing file at the target is
   * archived first, unless it already holds the same content, in which case
   * nothing is written. A new file identical to the previous file of the
   * same base name is discarded in favour of that file.
   */
  save(item: Item, options: { overwrite?: boolean } = {}): StorePath {
    const overwrite = options.overwrite ?? true;
    validateItem(item);

    if (item.externalPath && item.body === undefined) {
      const inside = this.resolvePath(item.externalPath);
      if (inside && path.isAbsolute(item.externalPath)) {
        log.info(`External file already in workspace: ${inside}`);
        item.storePath = inside;
        this.indexItem(inside);
        return inside;
      }
    }

    const { storePath, found, oldStorePath } = this.findPathFor(item);
    if (!overwrite && found) {
      log.info(`Skipping save of item already saved: ${storePath}`);
      item.storePath = storePath;
      return storePath;
    }

    const fullPath = this.fullPath(storePath);
    let archived: StorePath | undefined;
    if (fs.existsSync(fullPath)) {
      if (found && (item.body !== undefined || !item.externalPath)) {
        const existing = this.tryLoad(storePath);
        if (existing && contentEquals(existing, item)) {
          log.info(`Item unchanged, not saving: ${storePath}`);
          item.storePath = storePath;
          this.indexItem(storePath);
          return storePath;
        }
      }
      archived = this.moveToArchive(storePath);
    }

    try {
      if (item.externalPath && item.body === undefined) {
        copyFileAtomic(item.externalPath, fullPath);
      } else {
        writeItem(item, fullPath);
      }
      fs.utimesSync(fullPath, item.modifiedAt, item.modifiedAt);
    } catch (err) {
      log.error(`Error saving item: ${storePath}`, err);
      if (!found) this.removeName(storePath);
      if (archived) {
        try {
          this.unarchive(archived);
        } catch (restoreErr) {
          log.error(`Could not restore ${storePath} from ${archived}`, restoreErr);
        }
      }
      throw new PersistenceError(`Error saving item ${storePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.cache.delete(fullPath);

    let finalPath = storePath;
    if (oldStorePath) {
      const oldItem = this.tryLoad(oldStorePath);
      const newItem = this.tryLoad(storePath);
      if (oldItem && newItem && contentEquals(oldItem, newItem)) {
        log.message(`New item is identical to previous version, will keep old item: ${oldStorePath}`);
        fs.rmSync(fullPath);
        this.cache.delete(fullPath);
        this.removeName(storePath);
        finalPath = oldStorePath;
      }
    }

    item.storePath = finalPath;
    if (item.isBinary) {
      item.externalPath = this.fullPath(finalPath);
    } else {
      delete item.externalPath;
    }
    this.indexItem(finalPath);
    log.message(`Saved item: ${finalPath}`);
    return finalPath;
  }

  load(storePath: StorePath): Item {
    const fullPath = this.fullPath(storePath);
    const cached = this.cache.get(fullPath);
    if (cached) return cached;
    if (!fs.existsSync(fullPath)) {
      throw new FileNotFound(`Item not found: ${storePath}`);
    }
    const item = readItem(fullPath, this.baseDir);
    this.cache.set(fullPath, item);
    return item;
  }

  /** `sha1:<hex>` of the file's current bytes. */
  hash(storePath: StorePath): string {
    return hashFile(this.fullPath(storePath));
  }

  /**
   * Bring a URL or file into the store. URLs become URL resources; paths
   * already in the store are returned as they are; text files are read
   * (with or without a metadata block) and saved; other files are copied
   * under their own name.
   */
  importItem(locator: string, options: ImportOptions = {}): StorePath {
    const asType = options.asType ?? "resource";
    const reimport = options.reimport ?? false;

    if (isUrl(locator)) {
      const url = canonicalizeUrl(locator);
      if (url !== locator) {
        log.message(`Canonicalized URL: ${locator} -> ${url}`);
      }
      return this.save(createItem({ type: asType, url, format: "url" }));
    }

    const existing = this.resolvePath(locator);
    if (existing && this.exists(existing) && !reimport) {
      log.info(`Path already imported: ${existing}`);
      return existing;
    }

    const fullPath = existing ? this.fullPath(existing) : path.resolve(locator);
    if (!fs.existsSync(fullPath)) {
      throw new FileNotFound(`File not found: ${locator}`);
    }

    const parsed = parseItemFilename(fullPath);
    const type = parsed.itemType ?? asType;

    if (fileExtIsText(parsed.fileExt)) {
      log.message(`Importing text file: ${locator}`);
      const item = readImportedTextItem(fullPath, type);
      if (item.type !== type) {
        log.warn(`Reimporting as item type \`${type}\` instead of \`${item.type}\`: ${locator}`);
        item.type = type;
      }
      if (existing) item.storePath = existing;
      return this.save(item);
    }

    log.message(`Importing non-text file: ${locator}`);
    const item = createItem({
      type,
      title: parsed.name,
      format: parsed.format ?? "binary",
      fileExt: parsed.fileExt,
      isBinary: true,
      externalPath: fullPath,
    });
    const storePath = `${folderForType(type)}/${joinSuffix(parsed.name, fullSuffix(item))}`;
    if (this.exists(storePath)) {
      throw new FileExists(`Resource already in store: ${storePath}`);
    }
    copyFileAtomic(fullPath, this.fullPath(storePath));
    item.storePath = storePath;
    item.externalPath = this.fullPath(storePath);
    this.indexItem(storePath);
    log.message(`Imported resource: ${locator} -> ${storePath}`);
    return storePath;
  }

  importItems(locators: string[], options: ImportOptions = {}): StorePath[] {
    return locators.map((locator) => this.importItem(locator, options));
  }

  private uniqueArchiveAside(archiveFull: string): string {
    const dir = path.dirname(archiveFull);
    const { name } = splitFilename(archiveFull);
    const suffix = fullSuffixOf(archiveFull);
    for (let i = 1; ; i++) {
      const candidate = path.join(dir, joinSuffix(`${name}_${i}`, suffix));
      if (!fs.existsSync(candidate)) return candidate;
    }
  }

  /**
   * Move a live file into the archive, keeping the newest archived copy at
   * the mirrored path. Returns the archived path (store-relative). The name
   * stays taken until the next scan.
   */
  private moveToArchive(storePath: StorePath): StorePath {
    const fullPath = this.fullPath(storePath);
    this.unindexId(storePath);

    const archiveFull = path.join(this.dirs.archiveDir, toStorePath(storePath));
    if (fs.existsSync(archiveFull)) {
      moveFile(archiveFull, this.uniqueArchiveAside(archiveFull));
    }
    moveFile(fullPath, archiveFull);
    this.cache.delete(fullPath);
    return `${ARCHIVE_DIR}/${toStorePath(storePath)}`;
  }

  /**
   * Move an item to the archive and drop it from every selection.
   */
  archive(storePath: StorePath, options: ArchiveOptions = {}): StorePath {
    if (!this.exists(storePath)) {
      if (options.missingOk) {
        log.info(`Item to archive not found, skipping: ${storePath}`);
        return storePath;
      }
      throw new FileNotFound(`Item not found: ${storePath}`);
    }
    const archived = this.moveToArchive(storePath);
    this.selections.removeValues([toStorePath(storePath)]);
    if (!options.quiet) {
      log.message(`Archived: ${storePath} -> ${archived}`);
    }
    return archived;
  }

  /**
   * Restore an archived item to its original location. Accepts the path
   * with or without the archive prefix.
   */
  unarchive(storePath: StorePath): StorePath {
    let rel = toStorePath(storePath);
    if (rel.startsWith(`${ARCHIVE_DIR}/`)) {
      rel = rel.slice(ARCHIVE_DIR.length + 1);
    }
    const archiveFull = path.join(this.dirs.archiveDir, rel);
    if (!fs.existsSync(archiveFull)) {
      throw new FileNotFound(`Archived item not found: ${rel}`);
    }
    if (this.exists(rel)) {
      throw new InvalidState(`Cannot unarchive, an item already exists at: ${rel}`);
    }
    moveFile(archiveFull, this.fullPath(rel));
    this.indexItem(rel);
    log.message(`Unarchived: ${rel}`);
    return rel;
  }

  /**
   * Move a live item to a new path and update every selection.
   */
  rename(from: StorePath, to: StorePath): StorePath {
    const source = toStorePath(from);
    const target = toStorePath(to);
    if (!this.exists(source)) {
      throw new FileNotFound(`Item not found: ${source}`);
    }
    if (this.exists(target)) {
      throw new FileExists(`Target already exists: ${target}`);
    }
    parseItemFilename(target);
    this.unindexId(source);
    this.removeName(source);
    moveFile(this.fullPath(source), this.fullPath(target));
    this.cache.delete(this.fullPath(source));
    this.selections.replaceValues([[source, target]]);
    this.indexItem(target);
    log.message(`Renamed: ${source} -> ${target}`);
    return target;
  }

  /**
   * Archive every live item left in the transient state, such as the
   * intermediate outputs of a composite action that failed partway.
   */
  archiveTransients(): StorePath[] {
    const archived: StorePath[] = [];
    for (const storePath of [...this.walkItems()]) {
      const item = this.tryLoadQuietly(storePath);
      if (item?.state === "transient") {
        this.archive(storePath, { quiet: true });
        archived.push(storePath);
      }
    }
    if (archived.length > 0) {
      log.message(`Archived ${archived.length} transient items`);
    }
    return archived;
  }

  private tryLoadQuietly(storePath: StorePath): Item | undefined {
    try {
      return this.load(storePath);
    } catch (err) {
      log.debug(`Not an item: ${storePath}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  /**
   * Store paths of every non-hidden file, in sorted order, optionally
   * under one folder. Lazy, so callers may stop early.
   */
  *walkItems(folder?: StorePath): Generator<StorePath> {
    const start = folder ? this.fullPath(folder) : this.baseDir;
    if (folder && !fs.existsSync(start)) {
      throw new FileNotFound(`Folder not found: ${folder}`);
    }
    yield* this.walkDir(start);
  }

  private *walkDir(dir: string): Generator<StorePath> {
    const entries = fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      if (isSkippableName(entry.name)) continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        yield* this.walkDir(fullPath);
      } else if (entry.isFile()) {
        const rel = relativeStorePath(this.baseDir, fullPath);
        if (rel) yield rel;
      }
    }
  }

  describe(storePath: StorePath): string {
    const item = this.tryLoadQuietly(storePath);
    return item ? `${storePath}: ${abbrevTitle(item)}` : storePath;
  }
}

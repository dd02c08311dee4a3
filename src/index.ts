/**
 * itemflow - a file-backed workspace of items with cached,
 * provenance-tracked actions.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

export * from "./lib/models.js";
export * from "./lib/errors.js";
export * from "./lib/formats.js";
export * from "./lib/operations.js";

export {
  createItem,
  newCopyWith,
  derivedCopy,
  validateItem,
  abbrevTitle,
  titleSlug,
  fullSuffix,
  defaultStorePath,
  itemId,
  formatItemId,
  contentEquals,
  addToHistory,
  lastSource,
} from "./lib/items.js";
export type { ItemId } from "./lib/items.js";

export { itemToMetadata, itemFromMetadata } from "./lib/item-metadata.js";
export { readItem, writeItem } from "./lib/item-files.js";
export {
  toStorePath,
  folderForType,
  parseItemFilename,
  isSkippableName,
  type StorePath,
} from "./lib/store-paths.js";
export { Uniquifier } from "./lib/uniquifier.js";

export {
  DOT_DIR,
  CONFIG_FILE,
  ARCHIVE_DIR,
  metadataDirs,
  discoverWorkspace,
  resolveWorkspace,
  initWorkspace,
  loadConfig,
} from "./lib/storage.js";
export type { MetadataDirs } from "./lib/storage.js";

export { FileStore } from "./lib/file-store.js";
export type { FoundPath, FileStoreOptions, ArchiveOptions, ImportOptions } from "./lib/file-store.js";
export { SelectionHistory, SELECTION_HISTORY_MAX } from "./lib/selections.js";
export type { Selection } from "./lib/selections.js";
export { ParamState } from "./lib/params.js";
export { warmFileStore } from "./lib/cache-warmer.js";
export { Workspace, openWorkspace } from "./lib/workspace.js";
export type { OpenOptions } from "./lib/workspace.js";
export { getLogger, setLogLevel, getLogLevel } from "./lib/logging.js";
export type { LogLevel, Logger } from "./lib/logging.js";

export * from "./actions/model.js";
export * from "./actions/preconditions.js";
export { ActionRegistry } from "./actions/registry.js";
export { ActionRunner } from "./actions/runner.js";
export type { RunOptions, RunResult } from "./actions/runner.js";
export { SequenceAction, ComboAction } from "./actions/compound.js";
export type { CompoundOptions } from "./actions/compound.js";
export {
  combineItems,
  combineWithSeparator,
  combineAsParagraphs,
} from "./actions/combiners.js";
export type { Combiner } from "./actions/combiners.js";
export { CopyItems, Concat, createDefaultRegistry } from "./actions/builtins.js";

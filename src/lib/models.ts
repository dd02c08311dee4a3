/**
 * Core data models for the item workspace.
 *
 * An item is a typed document (note, resource, concept, ...) persisted as a
 * file with a metadata block followed by its body. Items saved by an action
 * carry provenance in `history`, which is what makes action outputs
 * addressable before they are computed.
 */

import type { Format, FileExt } from "./formats.js";
import type { Source } from "./operations.js";

export const ITEM_TYPES = [
  "note",
  "resource",
  "export",
  "concept",
  "doc",
  "config",
  "question",
  "answer",
  "instruction",
  "extension",
] as const;

export type ItemType = (typeof ITEM_TYPES)[number];

export function isItemType(value: string): value is ItemType {
  return ITEM_TYPES.some((t) => t === value);
}

/**
 * Lifecycle state:
 * - normal: a regular item
 * - transient: an intermediate output of a composite action, archived once
 *   the composite completes
 */
export type ItemState = "normal" | "transient";

export interface ItemRelations {
  /** Store paths this item was derived from */
  derivedFrom?: string[];
  /** Store paths this item is a diff of */
  diffOf?: string[];
}

export interface Item {
  type: ItemType;
  title?: string;
  url?: string;
  description?: string;
  format?: Format;
  fileExt?: FileExt;
  body?: string;
  /** File outside the store (or a binary file whose body is not loaded) */
  externalPath?: string;
  isBinary?: boolean;
  createdAt: Date;
  modifiedAt: Date;
  relations: ItemRelations;
  history: Source[];
  state: ItemState;
  /** Set once the item has been saved or loaded */
  storePath?: string;
  thumbnailUrl?: string;
  extra?: Record<string, unknown>;
}

/** Fields accepted when creating an item; the rest are defaulted. */
export type ItemFields = Pick<Item, "type"> & Partial<Omit<Item, "type">>;

/**
 * Workspace configuration (.itemflow/config.toml).
 */
export interface WorkspaceConfig {
  format_version: number;
  store_version: string;
  selection_history_max: number;
  warm_cache: boolean;
}

export const DEFAULT_CONFIG: WorkspaceConfig = {
  format_version: 1,
  store_version: "sv1",
  selection_history_max: 50,
  warm_cache: true,
};

/**
 * Exit codes for CLI commands.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

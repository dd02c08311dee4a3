/**
 * Workspace layout, discovery, initialization and configuration.
 *
 * A workspace is a directory of item folders (notes/, resources/, ...)
 * plus a reserved .itemflow/ directory for everything that is not an item:
 *
 *   .itemflow/config.toml
 *   .itemflow/archive/          mirrors the live layout
 *   .itemflow/settings/selection.yml
 *   .itemflow/settings/params.yml
 *   .itemflow/cache/
 *   .itemflow/tmp/
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as toml from "toml";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { getLogger } from "./logging.js";
import { DEFAULT_CONFIG, type WorkspaceConfig } from "./models.js";

const log = getLogger("storage");

/** Reserved directory name inside every workspace */
export const DOT_DIR = ".itemflow";

export const CONFIG_FILE = "config.toml";

export const ARCHIVE_DIR = `${DOT_DIR}/archive`;

/**
 * Absolute paths of the reserved directories and files of a workspace.
 */
export interface MetadataDirs {
  root: string;
  dotDir: string;
  configFile: string;
  archiveDir: string;
  settingsDir: string;
  selectionFile: string;
  paramsFile: string;
  cacheDir: string;
  tmpDir: string;
}

export function metadataDirs(root: string): MetadataDirs {
  const base = path.resolve(root);
  const dotDir = path.join(base, DOT_DIR);
  const settingsDir = path.join(dotDir, "settings");
  return {
    root: base,
    dotDir,
    configFile: path.join(dotDir, CONFIG_FILE),
    archiveDir: path.join(dotDir, "archive"),
    settingsDir,
    selectionFile: path.join(settingsDir, "selection.yml"),
    paramsFile: path.join(settingsDir, "params.yml"),
    cacheDir: path.join(dotDir, "cache"),
    tmpDir: path.join(dotDir, "tmp"),
  };
}

function isDirectory(candidate: string): boolean {
  return fs.statSync(candidate, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Walk up from the given directory looking for a .itemflow/ directory.
 * Returns the workspace root, or null if none is found.
 */
export function discoverWorkspace(startDir: string): string | null {
  let current = path.resolve(startDir);

  for (;;) {
    if (isDirectory(path.join(current, DOT_DIR))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Resolve the workspace root from command options.
 *
 * 1. If --workspace is given, resolve it relative to --root (or cwd); it
 *    must already be initialized.
 * 2. Otherwise walk up from --root/cwd looking for .itemflow/.
 */
export function resolveWorkspace(options: {
  workspace?: string;
  root?: string;
}): string | null {
  const rootDir = options.root ? path.resolve(options.root) : process.cwd();

  if (options.workspace) {
    const candidate = path.resolve(rootDir, options.workspace);
    return isDirectory(path.join(candidate, DOT_DIR)) ? candidate : null;
  }

  return discoverWorkspace(rootDir);
}

/**
 * Create the workspace layout. Safe to run on an existing workspace.
 */
export function initWorkspace(root: string): MetadataDirs {
  const dirs = metadataDirs(root);

  for (const dir of [dirs.dotDir, dirs.archiveDir, dirs.settingsDir, dirs.cacheDir, dirs.tmpDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (!fs.existsSync(dirs.configFile)) {
    const config = DEFAULT_CONFIG;
    const configContent = `# Workspace configuration
format_version = ${config.format_version}
store_version = "${config.store_version}"
selection_history_max = ${config.selection_history_max}
warm_cache = ${config.warm_cache}
`;
    fs.writeFileSync(dirs.configFile, configContent);
  }

  const cacheGitignore = path.join(dirs.cacheDir, ".gitignore");
  if (!fs.existsSync(cacheGitignore)) {
    fs.writeFileSync(cacheGitignore, "*\n!.gitignore\n");
  }

  return dirs;
}

const configSchema = z
  .object({
    format_version: z.number().int().positive(),
    store_version: z.string().min(1),
    selection_history_max: z.number().int().positive(),
    warm_cache: z.boolean(),
  })
  .partial()
  .passthrough();

/**
 * Load workspace configuration over the defaults. A missing file means
 * defaults; an unreadable or invalid one is reported and ignored.
 */
export function loadConfig(root: string): WorkspaceConfig {
  const configFile = metadataDirs(root).configFile;
  if (!fs.existsSync(configFile)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const raw: unknown = toml.parse(fs.readFileSync(configFile, "utf-8"));
    const parsed = configSchema.parse(raw);
    return {
      format_version: parsed.format_version ?? DEFAULT_CONFIG.format_version,
      store_version: parsed.store_version ?? DEFAULT_CONFIG.store_version,
      selection_history_max:
        parsed.selection_history_max ?? DEFAULT_CONFIG.selection_history_max,
      warm_cache: parsed.warm_cache ?? DEFAULT_CONFIG.warm_cache,
    };
  } catch (err) {
    log.warn(`Ignoring invalid config ${configFile}: ${errorMessage(err)}`);
    return { ...DEFAULT_CONFIG };
  }
}

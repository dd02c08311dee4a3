/**
 * Small YAML files under .itemflow/settings, written atomically.
 */

import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { writeFileAtomic } from "./atomic.js";
import { FileFormatError } from "./errors.js";

/** Parsed contents, or undefined if the file does not exist. */
export function readYamlFile(fullPath: string): unknown {
  if (!fs.existsSync(fullPath)) return undefined;
  try {
    return yaml.load(fs.readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new FileFormatError(`Invalid YAML in ${fullPath}`, { cause: err });
  }
}

export function writeYamlFile(fullPath: string, data: unknown): void {
  writeFileAtomic(fullPath, yaml.dump(data, { lineWidth: -1, noRefs: true }));
}

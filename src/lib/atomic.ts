/**
 * File writes that never leave a half-written target: content goes to a
 * hidden temp file beside the target, which is then renamed over it.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomBytes } from "node:crypto";

function tempPathFor(target: string): string {
  const random = randomBytes(4).toString("hex");
  return path.join(path.dirname(target), `.tmp-${path.basename(target)}-${random}`);
}

function removeQuietly(tempPath: string): void {
  fs.rmSync(tempPath, { force: true });
}

export function writeFileAtomic(target: string, content: string | Buffer): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tempPath = tempPathFor(target);
  try {
    fs.writeFileSync(tempPath, content);
    fs.renameSync(tempPath, target);
  } catch (err) {
    removeQuietly(tempPath);
    throw err;
  }
}

export function copyFileAtomic(source: string, target: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tempPath = tempPathFor(target);
  try {
    fs.copyFileSync(source, tempPath);
    fs.renameSync(tempPath, target);
  } catch (err) {
    removeQuietly(tempPath);
    throw err;
  }
}

/** Rename, creating the destination directory; falls back to copy across devices. */
export function moveFile(source: string, target: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  try {
    fs.renameSync(source, target);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EXDEV") {
      copyFileAtomic(source, target);
      fs.rmSync(source);
      return;
    }
    throw err;
  }
}

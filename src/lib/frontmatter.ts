/**
 * Metadata blocks at the top of item files.
 *
 * Three fence styles keep the block valid syntax for the body's format:
 *
 *   yaml:  ---      html:  <!---     hash:  #---
 *          key: v          key: v           # key: v
 *          ---             --->             #---
 *
 * Headers are read incrementally so listing a large store never loads
 * bodies; the byte offset of the body is returned for a later read.
 */

import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { FileFormatError } from "./errors.js";
import type { Format } from "./formats.js";

export type FenceStyle = "yaml" | "html" | "hash";

interface Fence {
  start: string;
  end: string;
  prefix: string;
}

const FENCES: Record<FenceStyle, Fence> = {
  yaml: { start: "---", end: "---", prefix: "" },
  html: { start: "<!---", end: "--->", prefix: "" },
  hash: { start: "#---", end: "#---", prefix: "# " },
};

const FENCE_STYLES: readonly FenceStyle[] = ["yaml", "html", "hash"];

const CHUNK_SIZE = 4096;

export function styleForFormat(format: Format | undefined): FenceStyle {
  if (format === "html") return "html";
  if (format === "python" || format === "csv") return "hash";
  return "yaml";
}

export interface FrontmatterHeader {
  style: FenceStyle;
  /** Metadata text with fences and line prefixes removed */
  raw: string;
  /** Byte offset where the body starts */
  bodyOffset: number;
}

/**
 * Reads lines from a file descriptor on demand, tracking byte offsets.
 */
class LineReader {
  private buf = Buffer.alloc(0);
  private bufStart = 0;
  private eof = false;

  constructor(private readonly fd: number) {}

  /** Next line without its terminator, and the offset just past it. */
  next(): { text: string; end: number } | undefined {
    for (;;) {
      const nl = this.buf.indexOf(0x0a);
      if (nl >= 0) {
        const text = this.buf.subarray(0, nl).toString("utf8").replace(/\r$/, "");
        this.buf = this.buf.subarray(nl + 1);
        this.bufStart += nl + 1;
        return { text, end: this.bufStart };
      }
      if (this.eof) {
        if (this.buf.length === 0) return undefined;
        const text = this.buf.toString("utf8").replace(/\r$/, "");
        this.bufStart += this.buf.length;
        this.buf = Buffer.alloc(0);
        return { text, end: this.bufStart };
      }
      const chunk = Buffer.alloc(CHUNK_SIZE);
      const read = fs.readSync(this.fd, chunk, 0, CHUNK_SIZE, this.bufStart + this.buf.length);
      if (read === 0) {
        this.eof = true;
      } else {
        this.buf = Buffer.concat([this.buf, chunk.subarray(0, read)]);
      }
    }
  }
}

function stripPrefix(line: string, style: FenceStyle): string {
  if (style !== "hash") return line;
  if (line.startsWith("# ")) return line.slice(2);
  if (line === "#") return "";
  return line;
}

/**
 * Read the metadata block of a file, stopping at the closing fence.
 * Returns undefined if the file does not start with a fence.
 */
export function readFrontmatterHeader(fullPath: string): FrontmatterHeader | undefined {
  const fd = fs.openSync(fullPath, "r");
  try {
    const reader = new LineReader(fd);
    const first = reader.next();
    if (!first) return undefined;
    const style = FENCE_STYLES.find((s) => first.text.trimEnd() === FENCES[s].start);
    if (!style) return undefined;

    const fence = FENCES[style];
    const lines: string[] = [];
    for (let line = reader.next(); line; line = reader.next()) {
      if (line.text.trimEnd() === fence.end) {
        return { style, raw: lines.join("\n"), bodyOffset: line.end };
      }
      lines.push(stripPrefix(line.text, style));
    }
    throw new FileFormatError(`Unterminated metadata block in ${fullPath}`);
  } finally {
    fs.closeSync(fd);
  }
}

/** Read everything from `offset` to the end of the file. */
export function readBodyFrom(fullPath: string, offset: number): string {
  const fd = fs.openSync(fullPath, "r");
  try {
    const size = fs.fstatSync(fd).size;
    const length = Math.max(0, size - offset);
    const buf = Buffer.alloc(length);
    let done = 0;
    while (done < length) {
      const read = fs.readSync(fd, buf, done, length - done, offset + done);
      if (read === 0) break;
      done += read;
    }
    return buf.subarray(0, done).toString("utf8");
  } finally {
    fs.closeSync(fd);
  }
}

export function parseYamlMetadata(raw: string, source = "metadata"): Record<string, unknown> {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new FileFormatError(`Invalid YAML in ${source}`, { cause: err });
  }
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new FileFormatError(`Metadata in ${source} is not a mapping`);
  }
  return Object.fromEntries(Object.entries(data));
}

export function dumpYaml(data: unknown): string {
  return yaml.dump(data, { lineWidth: -1, noRefs: true });
}

/** Fenced metadata block, ending with a newline, ready to prepend to a body. */
export function renderFrontmatter(style: FenceStyle, data: Record<string, unknown>): string {
  const fence = FENCES[style];
  const lines = dumpYaml(data).replace(/\n$/, "").split("\n");
  const body = fence.prefix
    ? lines.map((l) => (l ? `${fence.prefix}${l}` : fence.prefix.trimEnd()))
    : lines;
  return `${fence.start}\n${body.join("\n")}\n${fence.end}\n`;
}

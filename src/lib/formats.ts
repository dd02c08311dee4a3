/**
 * Body formats and file extensions, and the tables between them.
 */

export const FORMATS = [
  "url",
  "html",
  "markdown",
  "md_html",
  "plaintext",
  "yaml",
  "json",
  "python",
  "csv",
  "pdf",
  "binary",
] as const;

export type Format = (typeof FORMATS)[number];

export type FileExt =
  | "md"
  | "html"
  | "txt"
  | "yml"
  | "json"
  | "py"
  | "csv"
  | "pdf"
  | "png"
  | "jpg"
  | "mp3"
  | "mp4";

const FILE_EXTS: readonly FileExt[] = [
  "md",
  "html",
  "txt",
  "yml",
  "json",
  "py",
  "csv",
  "pdf",
  "png",
  "jpg",
  "mp3",
  "mp4",
];

const TEXT_EXTS: ReadonlySet<FileExt> = new Set<FileExt>([
  "md",
  "html",
  "txt",
  "yml",
  "json",
  "py",
  "csv",
]);

const EXT_ALIASES: Record<string, FileExt> = {
  htm: "html",
  yaml: "yml",
  markdown: "md",
  jpeg: "jpg",
};

const FORMAT_TO_EXT: Record<Format, FileExt | undefined> = {
  url: "yml",
  html: "html",
  markdown: "md",
  md_html: "md",
  plaintext: "txt",
  yaml: "yml",
  json: "json",
  python: "py",
  csv: "csv",
  pdf: "pdf",
  binary: undefined,
};

// yml is left out: a .yml file may hold a URL resource or a YAML body.
const EXT_TO_FORMAT: Partial<Record<FileExt, Format>> = {
  html: "html",
  md: "markdown",
  txt: "plaintext",
  json: "json",
  py: "python",
  csv: "csv",
  pdf: "pdf",
  png: "binary",
  jpg: "binary",
  mp3: "binary",
  mp4: "binary",
};

export function isFormat(value: string): value is Format {
  return FORMATS.some((f) => f === value);
}

/** Lower-case, strip a leading dot and resolve common aliases. */
export function canonicalizeFileExt(ext: string): string {
  const lowered = ext.toLowerCase().replace(/^\./, "");
  return EXT_ALIASES[lowered] ?? lowered;
}

export function parseFileExt(ext: string): FileExt | undefined {
  const canon = canonicalizeFileExt(ext);
  return FILE_EXTS.find((e) => e === canon);
}

export function fileExtIsText(ext: FileExt): boolean {
  return TEXT_EXTS.has(ext);
}

export function fileExtForFormat(format: Format): FileExt | undefined {
  return FORMAT_TO_EXT[format];
}

export function guessFormatForExt(ext: FileExt): Format | undefined {
  return EXT_TO_FORMAT[ext];
}

/** Formats whose items carry a body (a URL resource is all metadata). */
export function formatHasBody(format: Format): boolean {
  return format !== "url" && format !== "pdf" && format !== "binary";
}

export function formatIsText(format: Format): boolean {
  return format !== "pdf" && format !== "binary";
}

/**
 * Provenance records.
 *
 * An Operation names an action and the exact inputs (path plus content hash)
 * it ran on. A Source points at one output of an operation. Items keep their
 * Sources in `history`, oldest first.
 */

export interface Input {
  path: string;
  /** `sha1:<hex>` of the input file's bytes */
  hash?: string;
}

export interface Operation {
  actionName: string;
  arguments: Input[];
  /** Parameter values that affect the result */
  options?: Record<string, string>;
}

export interface Source {
  operation: Operation;
  outputNum: number;
}

/** On-disk shape of a Source. */
export interface SourceRecord {
  operation: {
    action_name: string;
    arguments: string[];
    options?: Record<string, string>;
  };
  output_num: number;
}

export function formatInput(input: Input): string {
  return input.hash ? `${input.path}@${input.hash}` : input.path;
}

/** Inverse of formatInput. Hashes never contain `@`, paths might. */
export function parseInput(value: string): Input {
  const at = value.lastIndexOf("@");
  if (at <= 0) return { path: value };
  return { path: value.slice(0, at), hash: value.slice(at + 1) };
}

export function formatOperation(op: Operation): string {
  const args = op.arguments.map(formatInput).join(", ");
  let result = `${op.actionName}(${args})`;
  const options = Object.entries(op.options ?? {}).sort(([a], [b]) =>
    a.localeCompare(b),
  );
  if (options.length > 0) {
    result += ` {${options.map(([k, v]) => `${k}=${v}`).join(", ")}}`;
  }
  return result;
}

export function formatSource(source: Source): string {
  return `${formatOperation(source.operation)}[${source.outputNum}]`;
}

/** Command line that would repeat the operation. */
export function operationCommandLine(op: Operation): string {
  return [op.actionName, ...op.arguments.map((a) => a.path)].join(" ");
}

/** The operation restricted to a single input, for per-item actions. */
export function operationForInput(op: Operation, index: number): Operation {
  const input = op.arguments[index];
  return {
    ...op,
    arguments: input ? [input] : [],
  };
}

export function sourceToRecord(source: Source): SourceRecord {
  const operation: SourceRecord["operation"] = {
    action_name: source.operation.actionName,
    arguments: source.operation.arguments.map(formatInput),
  };
  if (source.operation.options && Object.keys(source.operation.options).length > 0) {
    operation.options = { ...source.operation.options };
  }
  return { operation, output_num: source.outputNum };
}

export function sourceFromRecord(record: SourceRecord): Source {
  const operation: Operation = {
    actionName: record.operation.action_name,
    arguments: record.operation.arguments.map(parseInput),
  };
  if (record.operation.options) {
    operation.options = { ...record.operation.options };
  }
  return { operation, outputNum: record.output_num };
}

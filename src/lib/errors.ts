/**
 * Error taxonomy for the workspace and action engine.
 *
 * Every error carries a `kind` so callers can branch without instanceof
 * chains. Skippable errors are logged and skipped during scans; everything
 * else propagates.
 */

import { ExitCodes, type ExitCode } from "./models.js";

export type ErrorKind =
  | "invalid_input"
  | "precondition_failure"
  | "file_not_found"
  | "file_exists"
  | "invalid_state"
  | "invalid_operation"
  | "skippable"
  | "file_format"
  | "invalid_filename"
  | "persistence";

export abstract class ItemflowError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad arguments, wrong arity, unknown action names, missing files. */
export class InvalidInput extends ItemflowError {
  readonly kind: ErrorKind = "invalid_input";
}

export class PreconditionFailure extends InvalidInput {
  override readonly kind: ErrorKind = "precondition_failure";
}

export class FileNotFound extends InvalidInput {
  override readonly kind: ErrorKind = "file_not_found";
}

export class FileExists extends InvalidInput {
  override readonly kind: ErrorKind = "file_exists";
}

/** The store or history is not in a state that allows the operation. */
export class InvalidState extends ItemflowError {
  readonly kind: ErrorKind = "invalid_state";
}

/** Navigation past the ends of the selection history, popping an empty one. */
export class InvalidOperation extends InvalidState {
  override readonly kind: ErrorKind = "invalid_operation";
}

/** A single file could not be read as an item. Scans log these and move on. */
export class SkippableError extends ItemflowError {
  readonly kind: ErrorKind = "skippable";
}

export class FileFormatError extends SkippableError {
  override readonly kind: ErrorKind = "file_format";
}

export class InvalidFilename extends SkippableError {
  override readonly kind: ErrorKind = "invalid_filename";
}

/** A write failed; any overwritten file has been restored from the archive. */
export class PersistenceError extends ItemflowError {
  readonly kind: ErrorKind = "persistence";
}

export function isSkippable(err: unknown): err is SkippableError {
  return err instanceof SkippableError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map an error to a CLI exit code. */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof InvalidInput) return ExitCodes.USAGE_ERROR;
  if (err instanceof InvalidState || err instanceof SkippableError) {
    return ExitCodes.DATA_ERROR;
  }
  return ExitCodes.FAILURE;
}

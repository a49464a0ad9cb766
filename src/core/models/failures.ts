/**
 * Per-file failures collected during a run.
 *
 * @module
 */

import { FileReadError, ParsingError } from "../errors.js";

export type FailureKind = "syntax" | "io";

/**
 * A file that was skipped. Line and column are known only for syntax failures.
 */
export interface FileFailure {
  readonly kind: FailureKind;
  readonly filePath: string;
  readonly message: string;
  readonly line: number | null;
  readonly column: number | null;
}

export function failureFromError(error: ParsingError | FileReadError): FileFailure {
  if (error instanceof ParsingError) {
    return {
      kind: "syntax",
      filePath: error.filePath,
      message: error.message,
      line: error.line ?? null,
      column: error.column ?? null,
    };
  }
  return { kind: "io", filePath: error.filePath, message: error.message, line: null, column: null };
}

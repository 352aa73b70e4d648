/**
 * Search Errors
 *
 * Every failure the search pipeline can report:
 * - invalid-pattern: the pattern does not compile (before any line is read)
 * - line-read: the line source failed while producing a line
 * - write: the output sink rejected a formatted line
 *
 * The `kind` field lets callers tell them apart without instanceof chains.
 */

import { getErrorMessage } from "../utils/errors.js";

export type SearchErrorKind = "invalid-pattern" | "line-read" | "write";

/**
 * Base class for all search errors.
 */
export abstract class SearchError extends Error {
  abstract readonly kind: SearchErrorKind;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

/**
 * Error thrown when the pattern fails to compile.
 */
export class InvalidPatternError extends SearchError {
  readonly name = "InvalidPatternError";
  readonly kind = "invalid-pattern";

  constructor(
    public readonly pattern: string,
    cause: unknown,
  ) {
    super(`Failed to compile regex pattern: ${getErrorMessage(cause)}`, cause);
  }
}

/**
 * Error reported when the line source fails while reading a line.
 * `lineNumber` is the 1-based number the line would have had.
 */
export class LineReadError extends SearchError {
  readonly name = "LineReadError";
  readonly kind = "line-read";

  constructor(
    public readonly lineNumber: number,
    cause: unknown,
  ) {
    super(`Failed to read line ${lineNumber}: ${getErrorMessage(cause)}`, cause);
  }
}

/**
 * Error thrown when writing formatted output fails.
 */
export class WriteError extends SearchError {
  readonly name = "WriteError";
  readonly kind = "write";

  constructor(cause: unknown) {
    super(`Failed to write output: ${getErrorMessage(cause)}`, cause);
  }
}

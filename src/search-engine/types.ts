import type { Span } from "../regex/index.js";
import type { LineReadError } from "./errors.js";

/**
 * One input line that matched at least once.
 */
export interface SearchResult {
  /** 1-based number of the line in its source */
  lineNumber: number;
  /** Line text with trailing line terminators removed */
  line: string;
  /** Every match in the line, left to right, non-overlapping */
  matches: Span[];
}

/**
 * Element produced by a scan: a matched line, or the read failure that
 * ended the scan.
 */
export type SearchItem =
  | { ok: true; result: SearchResult }
  | { ok: false; error: LineReadError };

/**
 * Logger interface for search logging.
 * Implement this interface to receive search logs.
 */
export interface SearchLogger {
  /** Log informational messages (scan outcome, read failures) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (pattern compilation) */
  debug(message: string, data?: Record<string, unknown>): void;
}

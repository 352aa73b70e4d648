/**
 * Output formatting for search results
 */

import type { OutputMode } from "./options.js";
import type { SearchResult } from "./types.js";

/**
 * Get the text of every match in a result, in span order.
 */
export function matchTexts(result: SearchResult): string[] {
  return result.matches.map(([start, end]) => result.line.slice(start, end));
}

/**
 * Turn one result into the output lines for the given mode (without
 * trailing newlines).
 *
 * - count-only: nothing; the caller only counts the result
 * - match-only: one line per match
 * - line-numbered: "N: line"
 * - full-line: the line itself
 */
export function formatResult(result: SearchResult, mode: OutputMode): string[] {
  switch (mode) {
    case "count-only":
      return [];
    case "match-only":
      return matchTexts(result);
    case "line-numbered":
      return [`${result.lineNumber}: ${result.line}`];
    case "full-line":
      return [result.line];
  }
}

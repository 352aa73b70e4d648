/**
 * Search engine
 *
 * Provides core text searching functionality:
 * - Output mode resolution from option flags
 * - Lazy line-by-line matching with match spans
 * - Result formatting and a run loop that counts matched lines
 */

export {
  InvalidPatternError,
  LineReadError,
  SearchError,
  type SearchErrorKind,
  WriteError,
} from "./errors.js";
export { formatResult, matchTexts } from "./format.js";
export {
  type OutputMode,
  type ResolvedSearchOptions,
  resolveOutputMode,
  resolveSearchOptions,
  type SearchOptions,
} from "./options.js";
export {
  type LineSink,
  type RunOptions,
  type RunSummary,
  runSearch,
  runSearchAsync,
} from "./run.js";
export {
  AsyncSearchIterator,
  Searcher,
  type SearcherOptions,
  SearchIterator,
  trimLineTerminator,
} from "./searcher.js";
export type { SearchItem, SearchLogger, SearchResult } from "./types.js";

export { linegrepCommand, LINEGREP_VERSION } from "./commands/linegrep/linegrep.js";
export type { UserRegexOptions, Span } from "./regex/index.js";
export { createUserRegex, UserRegex } from "./regex/index.js";
export type {
  LineSink,
  OutputMode,
  ResolvedSearchOptions,
  RunOptions,
  RunSummary,
  SearcherOptions,
  SearchErrorKind,
  SearchItem,
  SearchLogger,
  SearchOptions,
  SearchResult,
} from "./search-engine/index.js";
export {
  AsyncSearchIterator,
  formatResult,
  InvalidPatternError,
  LineReadError,
  matchTexts,
  resolveOutputMode,
  resolveSearchOptions,
  runSearch,
  runSearchAsync,
  SearchError,
  Searcher,
  SearchIterator,
  trimLineTerminator,
  WriteError,
} from "./search-engine/index.js";
export type {
  Command,
  CommandContext,
  ExecResult,
  OutputWriter,
} from "./types.js";
export { readLines, splitLines } from "./utils/line-reader.js";
export { createStreamWriter } from "./utils/stream-writer.js";

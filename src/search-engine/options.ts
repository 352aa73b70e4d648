/**
 * Search options and output mode resolution
 */

export interface SearchOptions {
  /** Prefix each output line with its line number (-n) */
  showLineNumber?: boolean;
  /** Print only the number of matching lines (-c) */
  countOnly?: boolean;
  /** Match letters regardless of case (-i) */
  ignoreCase?: boolean;
  /** Print only the matched parts of each line, one per output line (-o) */
  matchOnly?: boolean;
}

/** SearchOptions with every flag filled in */
export type ResolvedSearchOptions = Readonly<Required<SearchOptions>>;

export type OutputMode =
  | "count-only"
  | "match-only"
  | "line-numbered"
  | "full-line";

/**
 * Flags that select an output mode, highest priority first.
 * The first flag that is set wins; when none is, output is the full line.
 */
const OUTPUT_MODE_TABLE: ReadonlyArray<
  readonly [flag: "countOnly" | "matchOnly" | "showLineNumber", OutputMode]
> = [
  ["countOnly", "count-only"],
  ["matchOnly", "match-only"],
  ["showLineNumber", "line-numbered"],
];

const DEFAULT_OUTPUT_MODE: OutputMode = "full-line";

/**
 * Pick the single output mode for a set of options.
 *
 * Combining flags is allowed: `countOnly` beats `matchOnly`, which beats
 * `showLineNumber`.
 */
export function resolveOutputMode(options: SearchOptions): OutputMode {
  for (const [flag, mode] of OUTPUT_MODE_TABLE) {
    if (options[flag]) return mode;
  }
  return DEFAULT_OUTPUT_MODE;
}

/**
 * Fill in defaults and freeze, so the caller's object can change later
 * without affecting a searcher built from it.
 */
export function resolveSearchOptions(
  options: SearchOptions = {},
): ResolvedSearchOptions {
  const {
    showLineNumber = false,
    countOnly = false,
    ignoreCase = false,
    matchOnly = false,
  } = options;
  return Object.freeze({ showLineNumber, countOnly, ignoreCase, matchOnly });
}

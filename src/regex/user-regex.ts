/**
 * UserRegex - Centralized regex handling for user-provided patterns
 *
 * Uses RE2JS for ReDoS protection via linear-time matching. Patterns are
 * written in the RE2 dialect: inline flags like (?i), Perl classes, Unicode
 * classes (\pL), named groups (?P<name>...). Look-around and
 * back-references are rejected at compile time.
 */

import { RE2JS, RE2JSSyntaxException } from "re2js";

/**
 * Half-open [start, end) range of one match, in UTF-16 code units of the
 * searched string (not bytes), so `input.slice(start, end)` is the match.
 */
export type Span = readonly [start: number, end: number];

export interface UserRegexOptions {
  /** Fold letter case across the whole pattern */
  ignoreCase?: boolean;
}

/** Inline directive that makes the rest of the expression case-insensitive */
const CASE_FOLD_DIRECTIVE = "(?i)";

/**
 * A wrapper around RE2JS for patterns supplied by the user.
 */
export class UserRegex {
  private readonly _re2: RE2JS;
  private readonly _pattern: string;
  private readonly _ignoreCase: boolean;

  constructor(pattern: string, options: UserRegexOptions = {}) {
    this._pattern = pattern;
    this._ignoreCase = options.ignoreCase ?? false;

    // Prefixing rather than wrapping in (?i:...) keeps unbalanced user
    // input unbalanced.
    const effective = this._ignoreCase
      ? CASE_FOLD_DIRECTIVE + pattern
      : pattern;

    try {
      this._re2 = RE2JS.compile(effective);
    } catch (e) {
      if (e instanceof RE2JSSyntaxException) {
        const msg = e.message || "";
        let explanation = "";

        if (
          pattern.includes("(?=") ||
          pattern.includes("(?!") ||
          pattern.includes("(?<=") ||
          pattern.includes("(?<!")
        ) {
          explanation =
            " Lookahead (?=, ?!) and lookbehind (?<=, ?<!) assertions are not supported because patterns are matched with RE2, which guarantees linear-time matching.";
        } else if (/\\[1-9]/.test(pattern)) {
          explanation =
            " Backreferences (\\1, \\2, etc.) are not supported because patterns are matched with RE2, which guarantees linear-time matching.";
        }

        throw new SyntaxError(
          `Invalid regular expression: /${pattern}/: ${msg}${explanation}`,
        );
      }
      throw e;
    }
  }

  /**
   * Test if the pattern matches anywhere in the input string.
   */
  test(input: string): boolean {
    return this._re2.matcher(input).find();
  }

  /**
   * Find the leftmost match starting at or after `from`.
   */
  find(input: string, from = 0): Span | null {
    if (from > input.length) return null;
    const matcher = this._re2.matcher(input);
    if (!matcher.find(from)) return null;
    return [matcher.start(0), matcher.end(0)];
  }

  /**
   * Iterate all non-overlapping matches, left to right.
   *
   * Each search resumes at the end of the previous match. An empty match
   * advances the cursor by one code point, and an empty match sitting
   * exactly where the previous match ended is skipped, so `a*` over
   * "baaab" gives [0,0], [1,4], [5,5].
   */
  *spans(input: string): Generator<Span, void, undefined> {
    const matcher = this._re2.matcher(input);
    let pos = 0;
    let lastEnd = -1;

    while (pos <= input.length && matcher.find(pos)) {
      const start = matcher.start(0);
      const end = matcher.end(0);

      if (start === end) {
        pos = end + codePointWidth(input, end);
        if (start === lastEnd) continue;
      } else {
        pos = end;
      }

      lastEnd = end;
      yield [start, end];
    }
  }

  /**
   * Get the pattern string as the user wrote it.
   */
  get source(): string {
    return this._pattern;
  }

  /**
   * Check if this is a case-insensitive regex.
   */
  get ignoreCase(): boolean {
    return this._ignoreCase;
  }
}

// Width in code units of the code point at `index`; 1 past the end.
function codePointWidth(input: string, index: number): number {
  const codePoint = input.codePointAt(index);
  return codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
}

/**
 * Create a UserRegex from a pattern string.
 * This is the primary entry point for user-provided regex patterns.
 *
 * @throws SyntaxError if the pattern is invalid
 */
export function createUserRegex(
  pattern: string,
  options: UserRegexOptions = {},
): UserRegex {
  return new UserRegex(pattern, options);
}

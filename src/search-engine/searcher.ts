/**
 * Line-by-line regex search
 *
 * A Searcher compiles its pattern once and can then scan any number of line
 * sources. Each scan is lazy: a line is pulled from the source only when the
 * consumer asks for the next result, and nothing but the current line is
 * held in memory.
 */

import { createUserRegex, type UserRegex } from "../regex/index.js";
import { InvalidPatternError, LineReadError } from "./errors.js";
import {
  type OutputMode,
  type ResolvedSearchOptions,
  resolveOutputMode,
  resolveSearchOptions,
  type SearchOptions,
} from "./options.js";
import type { SearchItem, SearchLogger, SearchResult } from "./types.js";

export interface SearcherOptions extends SearchOptions {
  /**
   * Optional logger for search tracing.
   * If provided, pattern compilation is logged at debug level.
   */
  logger?: SearchLogger;
}

const LINE_TERMINATOR = /\r?\n$/;

/**
 * Remove one trailing "\n" or "\r\n". Any other character, including an
 * extra "\r" before the terminator, stays part of the line.
 */
export function trimLineTerminator(line: string): string {
  return line.replace(LINE_TERMINATOR, "");
}

export class Searcher {
  readonly options: ResolvedSearchOptions;
  readonly outputMode: OutputMode;
  private readonly regex: UserRegex;

  /**
   * @throws InvalidPatternError if the pattern does not compile
   */
  constructor(pattern: string, options: SearcherOptions = {}) {
    this.options = resolveSearchOptions(options);

    try {
      this.regex = createUserRegex(pattern, {
        ignoreCase: this.options.ignoreCase,
      });
    } catch (e) {
      if (e instanceof SyntaxError) {
        throw new InvalidPatternError(pattern, e);
      }
      throw e;
    }

    this.outputMode = resolveOutputMode(this.options);
    options.logger?.debug("compiled", {
      pattern,
      ignoreCase: this.options.ignoreCase,
      outputMode: this.outputMode,
    });
  }

  /** The pattern as given to the constructor */
  get pattern(): string {
    return this.regex.source;
  }

  /**
   * Match a single line. Returns null when the pattern does not occur.
   */
  matchLine(lineNumber: number, rawLine: string): SearchResult | null {
    const line = trimLineTerminator(rawLine);
    const matches = Array.from(this.regex.spans(line));
    if (matches.length === 0) return null;
    return { lineNumber, line, matches };
  }

  /**
   * Scan a synchronous line source.
   *
   * If the source throws while producing a line, the scan yields one
   * `{ ok: false }` item for that line and stops.
   */
  search(lines: Iterable<string>): SearchIterator {
    return new SearchIterator(this.scan(lines));
  }

  /**
   * Scan an asynchronous line source, such as a decoded stdin stream.
   */
  searchAsync(lines: AsyncIterable<string>): AsyncSearchIterator {
    return new AsyncSearchIterator(this.scanAsync(lines));
  }

  private *scan(lines: Iterable<string>): Generator<SearchItem, void> {
    const source = lines[Symbol.iterator]();
    let lineNumber = 0;
    let closed = false;

    try {
      for (;;) {
        let step: IteratorResult<string>;
        try {
          step = source.next();
        } catch (error) {
          closed = true;
          yield { ok: false, error: new LineReadError(lineNumber + 1, error) };
          return;
        }
        if (step.done) {
          closed = true;
          return;
        }

        lineNumber++;
        const result = this.matchLine(lineNumber, step.value);
        if (result) yield { ok: true, result };
      }
    } finally {
      // Consumer stopped early: release the source.
      if (!closed) source.return?.();
    }
  }

  private async *scanAsync(
    lines: AsyncIterable<string>,
  ): AsyncGenerator<SearchItem, void> {
    const source = lines[Symbol.asyncIterator]();
    let lineNumber = 0;
    let closed = false;

    try {
      for (;;) {
        let step: IteratorResult<string>;
        try {
          step = await source.next();
        } catch (error) {
          closed = true;
          yield { ok: false, error: new LineReadError(lineNumber + 1, error) };
          return;
        }
        if (step.done) {
          closed = true;
          return;
        }

        lineNumber++;
        const result = this.matchLine(lineNumber, step.value);
        if (result) yield { ok: true, result };
      }
    } finally {
      if (!closed) await source.return?.();
    }
  }
}

const ALREADY_ITERATED = "search results can only be iterated once";

/**
 * Single-use iterator over the results of one scan.
 * Requesting a second iterator from it throws.
 */
export class SearchIterator implements IterableIterator<SearchItem> {
  private claimed = false;

  constructor(private readonly inner: Generator<SearchItem, void>) {}

  [Symbol.iterator](): this {
    if (this.claimed) throw new Error(ALREADY_ITERATED);
    this.claimed = true;
    return this;
  }

  next(): IteratorResult<SearchItem, void> {
    return this.inner.next();
  }

  return(): IteratorResult<SearchItem, void> {
    return this.inner.return(undefined);
  }
}

/**
 * Async counterpart of SearchIterator.
 */
export class AsyncSearchIterator implements AsyncIterableIterator<SearchItem> {
  private claimed = false;

  constructor(private readonly inner: AsyncGenerator<SearchItem, void>) {}

  [Symbol.asyncIterator](): this {
    if (this.claimed) throw new Error(ALREADY_ITERATED);
    this.claimed = true;
    return this;
  }

  next(): Promise<IteratorResult<SearchItem, void>> {
    return this.inner.next();
  }

  return(): Promise<IteratorResult<SearchItem, void>> {
    return this.inner.return(undefined);
  }
}

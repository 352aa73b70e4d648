/**
 * Drive a scan to completion: format each result, hand the output lines to
 * a sink and count matched lines.
 */

import { WriteError } from "./errors.js";
import { formatResult } from "./format.js";
import type { Searcher } from "./searcher.js";
import type { SearchItem, SearchLogger } from "./types.js";

/**
 * Receives one formatted output line (no trailing newline).
 */
export type LineSink = (line: string) => void | Promise<void>;

export interface RunSummary {
  /** Number of lines that matched at least once */
  matchedLines: number;
}

export interface RunOptions {
  logger?: SearchLogger;
}

/**
 * Search a synchronous line source.
 *
 * @throws LineReadError when the source fails (the scan stops there)
 * @throws WriteError when the sink throws or rejects
 */
export async function runSearch(
  searcher: Searcher,
  lines: Iterable<string>,
  sink: LineSink,
  options: RunOptions = {},
): Promise<RunSummary> {
  return consume(searcher, searcher.search(lines), sink, options.logger);
}

/**
 * Search an asynchronous line source.
 */
export async function runSearchAsync(
  searcher: Searcher,
  lines: AsyncIterable<string>,
  sink: LineSink,
  options: RunOptions = {},
): Promise<RunSummary> {
  return consume(searcher, searcher.searchAsync(lines), sink, options.logger);
}

async function consume(
  searcher: Searcher,
  items: Iterable<SearchItem> | AsyncIterable<SearchItem>,
  sink: LineSink,
  logger: SearchLogger | undefined,
): Promise<RunSummary> {
  let matchedLines = 0;

  for await (const item of items) {
    if (!item.ok) {
      logger?.info("line-read-failed", {
        lineNumber: item.error.lineNumber,
        error: item.error.message,
      });
      throw item.error;
    }

    matchedLines++;
    for (const line of formatResult(item.result, searcher.outputMode)) {
      try {
        await sink(line);
      } catch (error) {
        throw new WriteError(error);
      }
    }
  }

  logger?.info("finished", { matchedLines });
  return { matchedLines };
}

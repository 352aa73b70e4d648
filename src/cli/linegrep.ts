#!/usr/bin/env node
/**
 * linegrep CLI - print lines of standard input that match a pattern
 *
 * Usage:
 *   linegrep [options] PATTERN < input.txt
 *   some-command | linegrep -n 'error|warn'
 *
 * Options:
 *   -n, --line-number    Prefix each line with its line number
 *   -c, --count          Print only the number of matching lines
 *   -i, --ignore-case    Ignore case distinctions
 *   -o, --only-matching  Print only the matched parts, one per line
 *   --verbose            Trace the search on stderr
 *   -V, --version        Show version
 *   --help               Show this help message
 *
 * Exit status is 0 when the input was searched (even without matches),
 * 1 on an invalid pattern or an I/O failure, 2 on a usage error.
 */

import { linegrepCommand } from "../commands/linegrep/linegrep.js";
import type { SearchLogger } from "../search-engine/index.js";
import { getErrorMessage } from "../utils/errors.js";
import { createStreamWriter } from "../utils/stream-writer.js";

const stderrLogger: SearchLogger = {
  info(message, data) {
    console.error(`linegrep: [info] ${message}`, data ?? "");
  },
  debug(message, data) {
    console.error(`linegrep: [debug] ${message}`, data ?? "");
  },
};

try {
  process.exitCode = await linegrepCommand.execute(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: createStreamWriter(process.stdout),
    stderr: createStreamWriter(process.stderr),
    logger: stderrLogger,
  });
} catch (error) {
  console.error(`linegrep: ${getErrorMessage(error)}`);
  process.exitCode = 1;
}

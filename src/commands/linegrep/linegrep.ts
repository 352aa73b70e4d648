import {
  type LineSink,
  runSearchAsync,
  SearchError,
  Searcher,
  WriteError,
} from "../../search-engine/index.js";
import type { Command, CommandContext, ExecResult } from "../../types.js";
import { parseArgs } from "../../utils/args.js";
import { readLines } from "../../utils/line-reader.js";
import { type HelpInfo, hasHelpFlag, showHelp, usageError } from "../help.js";

export const LINEGREP_VERSION = "0.1.0";

const USAGE = "linegrep [OPTION]... PATTERN";

const linegrepHelp: HelpInfo = {
  name: "linegrep",
  summary: "print lines of standard input that match a pattern",
  usage: USAGE,
  description: [
    "Reads standard input line by line and prints the lines that match",
    "PATTERN, a regular expression in RE2 syntax.",
  ],
  options: [
    "-n, --line-number        print line number with output lines",
    "-c, --count              print only a count of matching lines",
    "-i, --ignore-case        ignore case distinctions",
    "-o, --only-matching      show only the matched parts of lines",
    "    --verbose            trace the search on standard error",
    "-V, --version            output version information and exit",
    "    --help               display this help and exit",
  ],
  notes: [
    "When several output flags are given, -c wins over -o, which wins over -n.",
    "The number of matching lines is always reported on standard error.",
    "Look-around assertions and back-references are not supported.",
  ],
};

const argDefs = {
  showLineNumber: { short: "n", long: "line-number" },
  countOnly: { short: "c", long: "count" },
  ignoreCase: { short: "i", long: "ignore-case" },
  matchOnly: { short: "o", long: "only-matching" },
  verbose: { long: "verbose" },
  version: { short: "V", long: "version" },
};

async function emit(ctx: CommandContext, result: ExecResult): Promise<number> {
  if (result.stdout) await ctx.stdout(result.stdout);
  if (result.stderr) await ctx.stderr(result.stderr);
  return result.exitCode;
}

export const linegrepCommand: Command = {
  name: "linegrep",

  async execute(args: string[], ctx: CommandContext): Promise<number> {
    if (hasHelpFlag(args)) {
      return emit(ctx, showHelp(linegrepHelp));
    }

    const parsed = parseArgs("linegrep", args, argDefs);
    if (!parsed.ok) {
      return emit(ctx, parsed.error);
    }
    const { flags, positional } = parsed.result;

    if (flags.version) {
      await ctx.stdout(`linegrep ${LINEGREP_VERSION}\n`);
      return 0;
    }
    if (positional.length === 0) {
      return emit(ctx, usageError("linegrep", USAGE, "missing PATTERN"));
    }
    if (positional.length > 1) {
      return emit(
        ctx,
        usageError("linegrep", USAGE, `unexpected operand '${positional[1]}'`),
      );
    }

    const logger = flags.verbose ? ctx.logger : undefined;
    const sink: LineSink = (line) => ctx.stdout(`${line}\n`);

    try {
      const searcher = new Searcher(positional[0], {
        showLineNumber: flags.showLineNumber,
        countOnly: flags.countOnly,
        ignoreCase: flags.ignoreCase,
        matchOnly: flags.matchOnly,
        logger,
      });

      const { matchedLines } = await runSearchAsync(
        searcher,
        readLines(ctx.stdin),
        sink,
        { logger },
      );

      if (searcher.outputMode === "count-only") {
        try {
          await sink(String(matchedLines));
        } catch (error) {
          throw new WriteError(error);
        }
      }

      await ctx.stderr(`Total matched lines: ${matchedLines}\n`);
      return 0;
    } catch (error) {
      if (error instanceof SearchError) {
        await ctx.stderr(`linegrep: ${error.message}\n`);
        return 1;
      }
      throw error;
    }
  },
};

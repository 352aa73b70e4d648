/**
 * Lightweight argument parser for command implementations.
 *
 * Handles common patterns:
 * - Boolean flags: -n, --line-number
 * - Combined short flags: -in (same as -i -n)
 * - "--" ends option parsing
 * - Positional arguments ("-" alone is positional)
 * - Unknown option detection
 */

import { unknownOption } from "../commands/help.js";
import type { ExecResult } from "../types.js";

export interface ArgDef {
  /** Short form without dash, e.g., "n" for -n */
  short?: string;
  /** Long form without dashes, e.g., "line-number" for --line-number */
  long?: string;
}

export interface ParsedArgs<T extends Record<string, ArgDef>> {
  /** Parsed flag values; every defined flag is present */
  flags: { [K in keyof T]: boolean };
  /** Positional arguments (non-flag arguments) */
  positional: string[];
}

export type ParseResult<T extends Record<string, ArgDef>> =
  | { ok: true; result: ParsedArgs<T> }
  | { ok: false; error: ExecResult };

/**
 * Parse command arguments according to the provided definitions.
 *
 * @param cmdName - Command name for error messages
 * @param args - Arguments to parse
 * @param defs - Flag definitions
 * @returns Parsed arguments or error result
 *
 * @example
 * const defs = {
 *   ignoreCase: { short: "i", long: "ignore-case" },
 *   count: { short: "c", long: "count" },
 * };
 * const result = parseArgs("linegrep", args, defs);
 * if (!result.ok) return result.error;
 * const { flags, positional } = result.result;
 */
export function parseArgs<T extends Record<string, ArgDef>>(
  cmdName: string,
  args: string[],
  defs: T,
): ParseResult<T> {
  // Build lookup maps: map short/long options to flag name
  const shortToName = new Map<string, string>();
  const longToName = new Map<string, string>();

  // Boolean flags default to false
  // Use null-prototype to prevent prototype pollution
  const flags: Record<string, boolean> = Object.create(null);
  for (const [name, def] of Object.entries(defs)) {
    if (def.short) shortToName.set(def.short, name);
    if (def.long) longToName.set(def.long, name);
    flags[name] = false;
  }

  const positional: string[] = [];
  let stopParsing = false;

  for (const arg of args) {
    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const name = longToName.get(arg.slice(2));
      if (name === undefined) {
        return { ok: false, error: unknownOption(cmdName, arg) };
      }
      flags[name] = true;
      continue;
    }

    // Short option(s)
    for (const c of arg.slice(1)) {
      const name = shortToName.get(c);
      if (name === undefined) {
        return { ok: false, error: unknownOption(cmdName, `-${c}`) };
      }
      flags[name] = true;
    }
  }

  return {
    ok: true,
    result: {
      flags: flags as ParsedArgs<T>["flags"],
      positional,
    },
  };
}

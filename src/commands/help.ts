import type { ExecResult } from "../types.js";

/** Exit code for command-line usage errors */
export const USAGE_EXIT_CODE = 2;

export interface HelpInfo {
  name: string;
  summary: string;
  usage: string;
  description?: string[];
  options?: string[];
  notes?: string[];
}

export function showHelp(info: HelpInfo): ExecResult {
  let output = `${info.name} - ${info.summary}\n\n`;
  output += `Usage: ${info.usage}\n`;
  if (info.description && info.description.length > 0) {
    output += "\nDescription:\n";
    for (const line of info.description) {
      output += line ? `  ${line}\n` : "\n";
    }
  }
  if (info.options && info.options.length > 0) {
    output += "\nOptions:\n";
    for (const opt of info.options) {
      output += `  ${opt}\n`;
    }
  }
  if (info.notes && info.notes.length > 0) {
    output += "\nNotes:\n";
    for (const note of info.notes) {
      output += `  ${note}\n`;
    }
  }
  return { stdout: output, stderr: "", exitCode: 0 };
}

export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help");
}

/**
 * Returns an error result for an unknown option
 */
export function unknownOption(cmdName: string, option: string): ExecResult {
  // For single-char options, use "invalid option -- 'x'" format
  // For long options, use "unrecognized option '--xxx'" format
  const msg = option.startsWith("--")
    ? `${cmdName}: unrecognized option '${option}'\n`
    : `${cmdName}: invalid option -- '${option.replace(/^-/, "")}'\n`;
  return {
    stdout: "",
    stderr: `${msg}Try '${cmdName} --help' for more information.\n`,
    exitCode: USAGE_EXIT_CODE,
  };
}

/**
 * Returns an error result for a missing or surplus operand
 */
export function usageError(
  cmdName: string,
  usage: string,
  message: string,
): ExecResult {
  return {
    stdout: "",
    stderr: `${cmdName}: ${message}\nUsage: ${usage}\nTry '${cmdName} --help' for more information.\n`,
    exitCode: USAGE_EXIT_CODE,
  };
}

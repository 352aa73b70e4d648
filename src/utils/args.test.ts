import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

const defs = {
  showLineNumber: { short: "n", long: "line-number" },
  ignoreCase: { short: "i", long: "ignore-case" },
  verbose: { long: "verbose" },
};

describe("parseArgs", () => {
  it("defaults every flag to false", () => {
    const result = parseArgs("cmd", ["pattern"], defs);
    expect(result).toEqual({
      ok: true,
      result: {
        flags: { showLineNumber: false, ignoreCase: false, verbose: false },
        positional: ["pattern"],
      },
    });
  });

  it("parses short, long and combined short flags", () => {
    const result = parseArgs("cmd", ["-in", "--verbose", "p"], defs);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.result.flags).toEqual({
        showLineNumber: true,
        ignoreCase: true,
        verbose: true,
      });
      expect(result.result.positional).toEqual(["p"]);
    }
  });

  it("accepts flags after positionals", () => {
    const result = parseArgs("cmd", ["p", "--line-number"], defs);
    expect(result.ok && result.result.flags.showLineNumber).toBe(true);
  });

  it("treats everything after -- as positional", () => {
    const result = parseArgs("cmd", ["--", "-n", "--verbose"], defs);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.result.flags.showLineNumber).toBe(false);
      expect(result.result.positional).toEqual(["-n", "--verbose"]);
    }
  });

  it("treats a lone dash as positional", () => {
    const result = parseArgs("cmd", ["-"], defs);
    expect(result.ok && result.result.positional).toEqual(["-"]);
  });

  it("rejects an unknown short flag", () => {
    const result = parseArgs("cmd", ["-nz"], defs);
    expect(result).toEqual({
      ok: false,
      error: {
        stdout: "",
        stderr:
          "cmd: invalid option -- 'z'\nTry 'cmd --help' for more information.\n",
        exitCode: 2,
      },
    });
  });

  it("rejects an unknown long flag", () => {
    const result = parseArgs("cmd", ["--bogus"], defs);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.stderr).toBe(
        "cmd: unrecognized option '--bogus'\nTry 'cmd --help' for more information.\n",
      );
    }
  });

  it("does not resolve inherited property names as flags", () => {
    const result = parseArgs("cmd", ["--constructor"], defs);
    expect(result.ok).toBe(false);
  });
});

import type { SearchLogger } from "./search-engine/types.js";

/**
 * Result of a command step whose output is small enough to buffer
 * (help text, usage errors).
 */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Receives one chunk of output. May return a promise when the underlying
 * stream needs to drain; a rejected promise or a throw is a write failure.
 */
export type OutputWriter = (chunk: string) => void | Promise<void>;

/**
 * Context provided to commands during execution.
 *
 * The command never touches process globals; the CLI entry point supplies
 * the real stdio, tests supply in-memory stand-ins.
 */
export interface CommandContext {
  /** Standard input as raw chunks (Buffers from a Readable, or strings) */
  stdin: AsyncIterable<Uint8Array | string>;
  /** Standard output */
  stdout: OutputWriter;
  /** Standard error */
  stderr: OutputWriter;
  /** Receives trace records when the user asks for verbose output */
  logger?: SearchLogger;
}

/** Command definition */
export interface Command {
  name: string;
  /** Runs the command and resolves to its exit code */
  execute(args: string[], ctx: CommandContext): Promise<number>;
}

/**
 * Adapt a Node.js Writable (process.stdout, process.stderr) to an
 * OutputWriter whose promise settles once the chunk has been handed off.
 */

import type { Writable } from "node:stream";
import type { OutputWriter } from "../types.js";

export function createStreamWriter(stream: Writable): OutputWriter {
  let streamError: Error | null = null;
  // Surfaced by the next write.
  stream.on("error", (error: Error) => {
    streamError = error;
  });

  return (chunk) =>
    new Promise<void>((resolve, reject) => {
      if (streamError) {
        reject(streamError);
        return;
      }
      stream.write(chunk, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
}

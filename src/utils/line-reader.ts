/**
 * Line sources for the search engine.
 *
 * Both producers are lazy and hand out lines with their terminator still
 * attached; the searcher strips it.
 */

const NEWLINE = 0x0a;

const textEncoder = new TextEncoder();

/**
 * Split an in-memory string into lines.
 * A trailing "\n" does not produce an empty final line.
 */
export function* splitLines(text: string): Generator<string, void> {
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf("\n", start);
    if (newline === -1) {
      yield text.slice(start);
      return;
    }
    yield text.slice(start, newline + 1);
    start = newline + 1;
  }
}

/**
 * Read lines from a chunked byte stream (e.g. process.stdin).
 *
 * Lines may span chunk boundaries, including in the middle of a multi-byte
 * character. The pieces of an unfinished line are kept as they arrived and
 * joined once, when its newline (or the end of the stream) shows up.
 *
 * Each line is decoded as strict UTF-8: invalid bytes make the generator
 * throw a TypeError when that line is requested. A U+FEFF at the start of a
 * line is line content and is kept.
 */
export async function* readLines(
  chunks: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<string, void> {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  let pending: Uint8Array[] = [];

  for await (const chunk of chunks) {
    const bytes = typeof chunk === "string" ? textEncoder.encode(chunk) : chunk;

    let start = 0;
    let newline = bytes.indexOf(NEWLINE, start);
    while (newline !== -1) {
      const tail = bytes.subarray(start, newline + 1);
      yield decoder.decode(
        pending.length > 0 ? concatBytes([...pending, tail]) : tail,
      );
      pending = [];
      start = newline + 1;
      newline = bytes.indexOf(NEWLINE, start);
    }
    if (start < bytes.length) {
      pending.push(bytes.subarray(start));
    }
  }

  if (pending.length > 0) {
    yield decoder.decode(concatBytes(pending));
  }
}

function concatBytes(parts: Uint8Array[]): Uint8Array {
  let length = 0;
  for (const part of parts) length += part.length;
  const result = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

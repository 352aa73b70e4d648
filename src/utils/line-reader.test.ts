import { describe, expect, it } from "vitest";
import { readLines, splitLines } from "./line-reader.js";

async function* chunksOf(
  ...chunks: (Uint8Array | string)[]
): AsyncGenerator<Uint8Array | string> {
  for (const chunk of chunks) yield chunk;
}

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of source) lines.push(line);
  return lines;
}

describe("splitLines", () => {
  it("keeps terminators on each line", () => {
    expect([...splitLines("a\nb\n")]).toEqual(["a\n", "b\n"]);
  });

  it("yields a final line without terminator", () => {
    expect([...splitLines("a\nb")]).toEqual(["a\n", "b"]);
  });

  it("yields empty lines in the middle", () => {
    expect([...splitLines("a\n\nb")]).toEqual(["a\n", "\n", "b"]);
  });

  it("yields nothing for empty input", () => {
    expect([...splitLines("")]).toEqual([]);
  });

  it("leaves carriage returns in place", () => {
    expect([...splitLines("a\r\nb\r\n")]).toEqual(["a\r\n", "b\r\n"]);
  });
});

describe("readLines", () => {
  it("splits string chunks into lines", async () => {
    expect(await collect(readLines(chunksOf("one\ntwo\n")))).toEqual([
      "one\n",
      "two\n",
    ]);
  });

  it("joins lines split across chunks", async () => {
    expect(await collect(readLines(chunksOf("on", "e\ntw", "o")))).toEqual([
      "one\n",
      "two",
    ]);
  });

  it("decodes a multi-byte character split across chunks", async () => {
    const lines = await collect(
      readLines(
        chunksOf(new Uint8Array([0x61, 0xc3]), new Uint8Array([0xa9, 0x0a])),
      ),
    );
    expect(lines).toEqual(["aé\n"]);
  });

  it("yields nothing for an empty stream", async () => {
    expect(await collect(readLines(chunksOf()))).toEqual([]);
  });

  it("keeps a byte order mark at the start of a later line", async () => {
    const lines = await collect(
      readLines(
        chunksOf(new Uint8Array([0x61, 0x0a, 0xef, 0xbb, 0xbf, 0x62, 0x0a])),
      ),
    );
    expect(lines).toEqual(["a\n", "\ufeffb\n"]);
  });

  it("keeps a byte order mark at the start of the input", async () => {
    const lines = await collect(
      readLines(chunksOf(new Uint8Array([0xef, 0xbb, 0xbf, 0x78, 0x0a]))),
    );
    expect(lines).toEqual(["\ufeffx\n"]);
  });

  it("assembles a long line from many chunks", async () => {
    const pieces = Array.from({ length: 2000 }, () => "ab");
    const lines = await collect(readLines(chunksOf(...pieces, "\nnext")));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(`${"ab".repeat(2000)}\n`);
    expect(lines[1]).toBe("next");
  });

  it("assembles an unterminated line from many chunks at end of stream", async () => {
    const pieces = Array.from({ length: 500 }, () => new Uint8Array([0x7a]));
    const lines = await collect(readLines(chunksOf(...pieces)));
    expect(lines).toEqual(["z".repeat(500)]);
  });

  it("throws on invalid UTF-8 when the bad line is reached", async () => {
    const source = readLines(
      chunksOf(new Uint8Array([0x6f, 0x6b, 0x0a, 0xff, 0xfe, 0x0a])),
    );
    await expect(source.next()).resolves.toEqual({
      done: false,
      value: "ok\n",
    });
    await expect(source.next()).rejects.toBeInstanceOf(TypeError);
  });
});

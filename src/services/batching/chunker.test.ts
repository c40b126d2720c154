import { describe, expect, it } from "vitest";
import type { FilePatch } from "../../types/patch.js";
import { chunkOverflow } from "./chunker.js";

function makePatch(filename: string, tokenCount: number): FilePatch {
  return { filename, content: "", language: "typescript", tokenCount };
}

function sizes(chunks: FilePatch[][]): number[][] {
  return chunks.map((chunk) => chunk.map((p) => p.tokenCount));
}

describe("chunkOverflow", () => {
  it("yields no chunks for empty input", () => {
    expect(chunkOverflow([], 1500)).toEqual([]);
  });

  it("closes a chunk before it would exceed the budget", () => {
    const files = [makePatch("a", 800), makePatch("b", 800), makePatch("c", 800)];

    // 800 + 800 = 1600 > 1500, so every file starts a new chunk
    expect(sizes(chunkOverflow(files, 1500))).toEqual([[800], [800], [800]]);
  });

  it("admits a file that lands exactly on the budget", () => {
    const files = [makePatch("a", 700), makePatch("b", 800), makePatch("c", 1)];

    expect(sizes(chunkOverflow(files, 1500))).toEqual([[700, 800], [1]]);
  });

  it("puts an over-budget file alone in its own chunk", () => {
    const files = [makePatch("a", 100), makePatch("huge", 2000), makePatch("b", 100)];

    expect(sizes(chunkOverflow(files, 1500))).toEqual([[100], [2000], [100]]);
  });

  it("does not drop an over-budget file that comes first", () => {
    const files = [makePatch("huge", 2000), makePatch("a", 100)];

    expect(sizes(chunkOverflow(files, 1500))).toEqual([[2000], [100]]);
  });

  it("keeps input order across chunks", () => {
    const files = Array.from({ length: 9 }, (_, i) => makePatch(`f${i}`, 400 + i * 10));

    const flattened = chunkOverflow(files, 1000)
      .flat()
      .map((p) => p.filename);

    expect(flattened).toEqual(files.map((p) => p.filename));
  });
});

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ReviewInputError } from "../types/review.js";
import { createTokenCounter } from "../utils/token-estimate.js";
import { createFileDiffSource, loadDiffEntriesFile, parseDiffEntries } from "./diff-entries.js";
import { buildChangeSet } from "./file-patch.js";

describe("parseDiffEntries", () => {
  it("accepts GitHub-shaped entries", () => {
    expect(
      parseDiffEntries(
        '[{"filename": "a.ts", "patch": "+1", "status": "added"}, {"filename": "b.md", "patch": null}]'
      )
    ).toEqual([
      { filename: "a.ts", patch: "+1", status: "added" },
      { filename: "b.md", patch: null },
    ]);
  });

  it("routes files GitHub reports as removed to the deleted list", () => {
    const entries = parseDiffEntries(
      JSON.stringify([
        { filename: "a.ts", patch: "+const a = 1;", status: "modified" },
        { filename: "old.py", patch: "@@ -1 +0,0 @@\n-x = 1", status: "removed" },
      ])
    );

    expect(entries.map((e) => e.status)).toEqual(["modified", "deleted"]);

    const changeSet = buildChangeSet(entries, createTokenCounter());
    expect(changeSet.files.map((p) => p.filename)).toEqual(["a.ts"]);
    expect(changeSet.deletedFiles).toEqual(["old.py"]);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseDiffEntries("[{")).toThrow(ReviewInputError);
  });

  it("rejects entries without a usable filename", () => {
    expect(() => parseDiffEntries('[{"filename": ""}]')).toThrow(/^Invalid diff entries: /);
    expect(() => parseDiffEntries('{"filename": "a.ts"}')).toThrow(ReviewInputError);
  });
});

describe("loadDiffEntriesFile", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "diffsift-entries-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads entries from a file", async () => {
    const path = join(dir, "entries.json");
    await writeFile(path, '[{"filename": "src/x.py", "patch": "+x = 1"}]');

    expect(await loadDiffEntriesFile(path)).toEqual([
      { filename: "src/x.py", patch: "+x = 1" },
    ]);
    expect(createFileDiffSource(path).reference).toBe(`file:${path}`);
  });

  it("reports a missing file", async () => {
    await expect(loadDiffEntriesFile(join(dir, "missing.json"))).rejects.toMatchObject({
      code: "INVALID_ENTRIES",
    });
  });
});

import { describe, expect, it } from "vitest";
import { splitUnifiedDiff } from "./diff-splitter.js";

const MODIFIED = `diff --git a/src/app.ts b/src/app.ts
index 1111111..2222222 100644
--- a/src/app.ts
+++ b/src/app.ts
@@ -1,3 +1,3 @@
 import { run } from "./run.js";
-run(1);
+run(2);
@@ -10,2 +10,3 @@ export function main() {
   return 0;
+  // done
 }`;

const ADDED = `diff --git a/docs/guide.md b/docs/guide.md
new file mode 100644
index 0000000..3333333
--- /dev/null
+++ b/docs/guide.md
@@ -0,0 +1,2 @@
+# Guide
+Hello`;

const DELETED = `diff --git a/old.py b/old.py
deleted file mode 100644
index 4444444..0000000
--- a/old.py
+++ /dev/null
@@ -1 +0,0 @@
-print("bye")`;

const RENAMED = `diff --git a/lib/util.js b/lib/helpers.js
similarity index 100%
rename from lib/util.js
rename to lib/helpers.js`;

const BINARY = `diff --git a/logo.png b/logo.png
index 5555555..6666666 100644
Binary files a/logo.png and b/logo.png differ`;

describe("splitUnifiedDiff", () => {
  it("returns nothing for an empty diff", () => {
    expect(splitUnifiedDiff("")).toEqual([]);
    expect(splitUnifiedDiff("  \n")).toEqual([]);
  });

  it("keeps every hunk of a modified file", () => {
    expect(splitUnifiedDiff(MODIFIED)).toEqual([
      {
        filename: "src/app.ts",
        status: "modified",
        patch: [
          "@@ -1,3 +1,3 @@",
          ' import { run } from "./run.js";',
          "-run(1);",
          "+run(2);",
          "@@ -10,2 +10,3 @@ export function main() {",
          "   return 0;",
          "+  // done",
          " }",
        ].join("\n"),
      },
    ]);
  });

  it("splits several files and detects their status", () => {
    const entries = splitUnifiedDiff(
      [MODIFIED, ADDED, DELETED, RENAMED, BINARY].join("\n") + "\n"
    );

    expect(entries.map((e) => [e.filename, e.status])).toEqual([
      ["src/app.ts", "modified"],
      ["docs/guide.md", "added"],
      ["old.py", "deleted"],
      ["lib/helpers.js", "renamed"],
      ["logo.png", "modified"],
    ]);
    expect(entries[1]?.patch).toBe("@@ -0,0 +1,2 @@\n+# Guide\n+Hello");
    expect(entries[2]?.patch).toBe('@@ -1 +0,0 @@\n-print("bye")');
  });

  it("leaves the patch out when a file has no hunks", () => {
    const entries = splitUnifiedDiff(`${RENAMED}\n${BINARY}\n`);

    expect(entries).toEqual([
      { filename: "lib/helpers.js", status: "renamed" },
      { filename: "logo.png", status: "modified" },
    ]);
  });
});

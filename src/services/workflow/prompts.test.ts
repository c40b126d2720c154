import { describe, expect, it } from "vitest";
import type { FilePatch } from "../../types/patch.js";
import {
  buildBatchReviewMessages,
  buildOverflowSummaryMessages,
  buildShortReviewMessages,
  buildSynthesisMessages,
  NO_OVERFLOW_SUMMARY,
  REVIEW_SYSTEM_PROMPT,
} from "./prompts.js";

const patch: FilePatch = {
  filename: "src/app.py",
  content: "+print('hi')",
  language: "python",
  tokenCount: 3,
};

describe("buildShortReviewMessages", () => {
  it("sends the system prompt, then files and deleted files", () => {
    const messages = buildShortReviewMessages([patch], ["old.py"]);

    expect(messages).toHaveLength(2);
    expect(messages[0]).toEqual({ role: "system", content: REVIEW_SYSTEM_PROMPT });
    expect(messages[1]?.role).toBe("user");
    expect(messages[1]?.content).toContain(
      "## Changed files\n\nFile: src/app.py (python)\n```python\n+print('hi')\n```\n\n## Deleted files\n\n- old.py\n\n---"
    );
  });

  it("says None when there are no files", () => {
    const content = buildShortReviewMessages([], [])[1]?.content ?? "";

    expect(content).toContain("## Changed files\n\nNone\n");
    expect(content).toContain("## Deleted files\n\nNone\n");
  });
});

describe("buildBatchReviewMessages", () => {
  it("numbers the batch and has no system prompt", () => {
    const messages = buildBatchReviewMessages([patch], 3);

    expect(messages).toHaveLength(1);
    expect(messages[0]?.role).toBe("user");
    expect(messages[0]?.content.startsWith("Review batch 3 of a larger pull request.")).toBe(true);
  });
});

describe("buildOverflowSummaryMessages", () => {
  it("includes every file of the chunk", () => {
    const other: FilePatch = { ...patch, filename: "README.md", language: "markdown", content: "+docs" };

    const content = buildOverflowSummaryMessages([patch, other])[0]?.content ?? "";

    expect(content).toContain(
      "```python\n+print('hi')\n```\n\nFile: README.md (markdown)\n```markdown\n+docs\n```"
    );
  });
});

describe("buildSynthesisMessages", () => {
  it("joins batch reviews with separators and summaries with blank lines", () => {
    const content = buildSynthesisMessages(["r1", "r2"], ["s1", "s2"], [])[1]?.content ?? "";

    expect(content).toContain("## Batch reviews\n\nr1\n\n---\n\nr2\n\n## Additional modified files");
    expect(content).toContain("## Additional modified files\n\ns1\n\ns2\n\n## Deleted files\n\nNone");
  });

  it("says None when every file overflowed and no batch was reviewed", () => {
    const content = buildSynthesisMessages([], ["s1"], [])[1]?.content ?? "";

    expect(content).toContain(
      "## Batch reviews\n\nNone\n\n## Additional modified files\n\ns1\n\n## Deleted files"
    );
  });

  it("notes when no overflow summaries exist", () => {
    const content = buildSynthesisMessages(["r1"], [], ["gone.ts"])[1]?.content ?? "";

    expect(content).toContain(`## Additional modified files\n\n${NO_OVERFLOW_SUMMARY}`);
    expect(content).toContain("## Deleted files\n\n- gone.ts");
  });
});

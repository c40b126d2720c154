import { describe, expect, it } from "vitest";
import type { ReviewPlan } from "../services/batching/index.js";
import type { ReviewOutcome } from "../services/review-service.js";
import type { FilePatch } from "../types/patch.js";
import { buildJsonPlan, buildJsonReport, formatPlan, formatReviewSummary } from "./output.js";

const outcome: ReviewOutcome = {
  taskId: "task-1",
  rawReview: "{}",
  run: {
    path: "short",
    totalTokens: 120,
    fileCount: 1,
    deletedFileCount: 0,
    batchCount: 0,
    chunkCount: 0,
  },
  review: {
    files: [
      {
        name: "src/db.ts",
        issues: [
          {
            type: "security",
            line: 8,
            description: "Query built by string concatenation.",
            suggestion: "Use a parameterized query.",
          },
        ],
        code_suggestions: [],
        security_analysis: "SQL injection: user input reaches the query.",
      },
    ],
  },
};

function patch(filename: string, tokenCount: number): FilePatch {
  return { filename, content: "", language: "typescript", tokenCount };
}

const longPlan: ReviewPlan = {
  path: "long",
  totalTokens: 5000,
  files: [],
  deletedFiles: ["old.ts"],
  batches: [[patch("a.ts", 1000), patch("b.ts", 1000)], [patch("c.ts", 1000)]],
  overflowChunks: [[patch("d.ts", 2000)]],
};

describe("buildJsonReport", () => {
  it("includes the reference, task, run and review", () => {
    expect(buildJsonReport("octo/widgets#7", outcome)).toEqual({
      reference: "octo/widgets#7",
      taskId: "task-1",
      run: outcome.run,
      review: outcome.review,
    });
  });
});

describe("formatReviewSummary", () => {
  it("lists each issue and flags security findings", () => {
    const text = formatReviewSummary(outcome);

    expect(text).toContain("src/db.ts");
    expect(text).toContain("Query built by string concatenation.");
    expect(text).toContain("SQL injection: user input reaches the query.");
  });
});

describe("buildJsonPlan", () => {
  it("counts one call per batch and chunk plus the synthesis", () => {
    expect(buildJsonPlan("file:entries.json", longPlan)).toEqual({
      reference: "file:entries.json",
      path: "long",
      totalTokens: 5000,
      deletedFiles: ["old.ts"],
      batches: [
        [
          { filename: "a.ts", language: "typescript", tokens: 1000 },
          { filename: "b.ts", language: "typescript", tokens: 1000 },
        ],
        [{ filename: "c.ts", language: "typescript", tokens: 1000 }],
      ],
      overflowChunks: [[{ filename: "d.ts", language: "typescript", tokens: 2000 }]],
      modelCalls: 4,
    });
  });

  it("counts a single call on the short path", () => {
    expect(
      buildJsonPlan("local:staged", { ...longPlan, path: "short", batches: [], overflowChunks: [] })
        .modelCalls
    ).toBe(1);
  });
});

describe("formatPlan", () => {
  it("lists batches and overflow chunks", () => {
    const text = formatPlan("file:entries.json", longPlan);

    expect(text).toContain("Path: multi-stage (4 model calls)");
    expect(text).toContain("Batch 2 (1000 tokens)");
    expect(text).toContain("Overflow chunk 1 (2000 tokens)");
    expect(text).toContain("d.ts");
  });
});

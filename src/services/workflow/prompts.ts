/**
 * Review prompts
 *
 * Four requests make up a review run:
 * - short review: the whole change set in one call
 * - batch review: one batch of a long change set
 * - overflow summary: one chunk of files that did not fit the main group
 * - synthesis: batch reviews + overflow summaries → the final review
 *
 * The short review and the synthesis produce the final review, so both carry
 * the system prompt that pins down the JSON output format.
 */

import type { ChatMessage } from "../../types/llm.js";
import type { FilePatch } from "../../types/patch.js";
import {
  formatDeletedFiles,
  formatFilePatches,
} from "../../utils/format-patch.js";

/** Separator between batch reviews in the synthesis prompt */
export const SEGMENT_SEPARATOR = "\n\n---\n\n";

/** Shown in the synthesis prompt when no batch was reviewed */
export const NO_BATCH_REVIEWS = "None";

/** Shown in the synthesis prompt when nothing overflowed */
export const NO_OVERFLOW_SUMMARY = "No additional files to summarize.";

export const REVIEW_SYSTEM_PROMPT = `You are a senior engineer reviewing a pull request. You give precise, constructive feedback and concrete suggestions.

## What to look at

- Lines added by the change (prefixed with "+") are what you review; removed and context lines are there for reference.
- Bugs, broken control flow, missing error handling and logic mistakes come first.
- Then performance, modularity and maintainability.
- Do not ask for docstrings, type hints or comments unless their absence causes a real problem.
- Do not suggest changes the pull request already makes.

## Security

- Check for exposed secrets, injection (SQL, shell, template), cross-site scripting, unsafe deserialization and missing authorization.
- When you find one, start the file's security_analysis with a short label (for example "Sensitive information exposure:"), then explain the issue and how to fix it.
- When a file has nothing to report, its security_analysis is "No vulnerabilities detected."

## Output

Respond with ONLY a JSON object of this shape, no prose around it:

{
  "files": [
    {
      "name": "path/to/file.ext",
      "issues": [
        {
          "type": "bug | performance | maintainability | security | ...",
          "line": 42,
          "description": "What is wrong.",
          "suggestion": "How to fix it."
        }
      ],
      "code_suggestions": [
        {
          "line": 42,
          "suggestion": "An improvement that is not tied to a problem."
        }
      ],
      "security_analysis": "No vulnerabilities detected."
    }
  ]
}

Use null for "line" when a finding is not tied to one line. Keep every entry short and actionable.`;

/**
 * Messages for reviewing a whole (small) change set in one call.
 */
export function buildShortReviewMessages(
  files: readonly FilePatch[],
  deletedFiles: readonly string[]
): ChatMessage[] {
  const sections: string[] = [];

  sections.push("Review the following pull request changes.");
  sections.push("");
  sections.push("## Changed files");
  sections.push("");
  sections.push(files.length > 0 ? formatFilePatches(files) : "None");
  sections.push("");
  sections.push("## Deleted files");
  sections.push("");
  sections.push(formatDeletedFiles(deletedFiles));
  sections.push("");
  sections.push("---");
  sections.push(`Cover:
1. What the change does
2. Problems and risks
3. Suggested improvements
4. An overall assessment, folded into the per-file entries`);

  return [
    { role: "system", content: REVIEW_SYSTEM_PROMPT },
    { role: "user", content: sections.join("\n") },
  ];
}

/**
 * Messages for reviewing one batch of a long change set.
 *
 * Batches are reviewed independently, so the reply is free text; the
 * synthesis call turns the batch reviews into the final JSON review.
 */
export function buildBatchReviewMessages(
  batch: readonly FilePatch[],
  batchNumber: number
): ChatMessage[] {
  const sections: string[] = [];

  sections.push(
    `Review batch ${batchNumber} of a larger pull request. Other files are reviewed separately.`
  );
  sections.push("");
  sections.push(formatFilePatches(batch));
  sections.push("");
  sections.push("---");
  sections.push(`Cover:
1. Key changes in these files and their impact
2. Problems and risks, with file names and line numbers
3. Specific suggestions for these files`);

  return [{ role: "user", content: sections.join("\n") }];
}

/**
 * Messages for summarizing one chunk of overflow files.
 */
export function buildOverflowSummaryMessages(
  chunk: readonly FilePatch[]
): ChatMessage[] {
  const sections: string[] = [];

  sections.push("Briefly summarize these additional modified files from a larger pull request.");
  sections.push("");
  sections.push(formatFilePatches(chunk));
  sections.push("");
  sections.push("---");
  sections.push(`For each file give:
1. The key changes, in 2-3 sentences
2. Any risks or concerns`);

  return [{ role: "user", content: sections.join("\n") }];
}

/**
 * Messages for merging the partial results of a long run into the final
 * review.
 */
export function buildSynthesisMessages(
  batchReviews: readonly string[],
  overflowSummaries: readonly string[],
  deletedFiles: readonly string[]
): ChatMessage[] {
  const sections: string[] = [];

  sections.push(
    "Synthesize these partial reviews of one pull request into a single final review."
  );
  sections.push("");
  sections.push("## Batch reviews");
  sections.push("");
  sections.push(
    batchReviews.length > 0
      ? batchReviews.join(SEGMENT_SEPARATOR)
      : NO_BATCH_REVIEWS
  );
  sections.push("");
  sections.push("## Additional modified files");
  sections.push("");
  sections.push(
    overflowSummaries.length > 0
      ? overflowSummaries.join("\n\n")
      : NO_OVERFLOW_SUMMARY
  );
  sections.push("");
  sections.push("## Deleted files");
  sections.push("");
  sections.push(formatDeletedFiles(deletedFiles));
  sections.push("");
  sections.push("---");
  sections.push(`The batches were reviewed separately and could not see each other. Merge them:
1. An overall picture of the change
2. Concerns that appear across batches
3. The most important recommendations
4. A final assessment, folded into the per-file entries`);

  return [
    { role: "system", content: REVIEW_SYSTEM_PROMPT },
    { role: "user", content: sections.join("\n") },
  ];
}

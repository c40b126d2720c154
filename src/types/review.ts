/**
 * Review Types - the structured review, task records and run metadata
 *
 * The final model call is asked for a JSON document in the shape of
 * `StructuredReviewSchema`. ArkType validates it at runtime and gives us the
 * TypeScript type from the same definition.
 */

import { type } from "arktype";

/** A problem found in one file */
export const ReviewIssueSchema = type({
  /** Short category, e.g. "bug", "performance", "security" */
  type: "string",
  /** Line in the new file, when the model can tie the issue to one */
  "line?": "number | null",
  description: "string",
  suggestion: "string",
});

/** An improvement that is not tied to a problem */
export const CodeSuggestionSchema = type({
  "line?": "number | null",
  suggestion: "string",
});

export const FileReviewSchema = type({
  name: "string",
  issues: ReviewIssueSchema.array(),
  code_suggestions: CodeSuggestionSchema.array(),
  security_analysis: "string",
});

export const StructuredReviewSchema = type({
  files: FileReviewSchema.array(),
});

export type ReviewIssue = typeof ReviewIssueSchema.infer;
export type CodeSuggestion = typeof CodeSuggestionSchema.infer;
export type FileReview = typeof FileReviewSchema.infer;
export type StructuredReview = typeof StructuredReviewSchema.infer;

/** Which path a run took */
export type ReviewPath = "short" | "long";

/** Metadata about one completed workflow run */
export interface RunSummary {
  path: ReviewPath;
  /** Sum of tokenCount over all reviewable files */
  totalTokens: number;
  fileCount: number;
  deletedFileCount: number;
  /** Batch-review calls made (0 on the short path) */
  batchCount: number;
  /** Overflow-summary calls made (0 on the short path) */
  chunkCount: number;
}

export type TaskStatus = "pending" | "in_progress" | "succeeded" | "failed";

/** A tracked review task */
export interface ReviewTask {
  id: string;
  /** What is being reviewed, e.g. "owner/repo#12" or "local:staged" */
  reference: string;
  status: TaskStatus;
  result?: StructuredReview;
  /** Failure detail, set when status is "failed" */
  error?: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Error raised synchronously for input that cannot start a run */
export class ReviewInputError extends Error {
  constructor(
    message: string,
    public readonly code: ReviewInputErrorCode
  ) {
    super(message);
    this.name = "ReviewInputError";
  }
}

export type ReviewInputErrorCode =
  | "INVALID_REFERENCE"
  | "INVALID_ENTRIES"
  | "DUPLICATE_FILE";

/** Error raised when a task id is not known to the tracker */
export class TaskNotFoundError extends Error {
  constructor(public readonly taskId: string) {
    super(`Review task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

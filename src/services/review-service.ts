/**
 * Review Service - runs one review from diff source to tracked result
 *
 * This is the boundary between the outside world and the workflow:
 *
 * 1. Check budgets and the token counter (before any task exists)
 * 2. Create a task and mark it in progress
 * 3. List the change set's files and build patches
 * 4. Run the review workflow
 * 5. Parse the final review and record it on the task
 *
 * Any failure after step 2 marks the task failed with "<name>: <message>"
 * and is rethrown unchanged.
 */

import type { ReviewConfig } from "../types/config.js";
import type { ModelClient } from "../types/llm.js";
import type { DiffSource } from "../types/patch.js";
import type { RunSummary, StructuredReview } from "../types/review.js";
import {
  assertTokenCounter,
  createTokenCounter,
  type TokenCounter,
} from "../utils/token-estimate.js";
import { validateReviewConfig } from "./config.js";
import { buildChangeSet } from "./file-patch.js";
import { parseStructuredReview } from "./review-parser.js";
import type { TaskTracker } from "./task-tracker.js";
import { runReviewWorkflow, type WorkflowProgress } from "./workflow/index.js";

export interface ReviewServiceDeps {
  model: ModelClient;
  tracker: TaskTracker;
  config: ReviewConfig;
  /** Defaults to the char/4 estimator */
  tokenCounter?: TokenCounter;
}

export interface ReviewOutcome {
  taskId: string;
  review: StructuredReview;
  /** The final review text as the model returned it */
  rawReview: string;
  run: RunSummary;
}

/** Progress from the service itself ("Fetching files...") or the workflow */
export type ReviewProgress = (message: string) => void;

export interface ReviewCallbacks {
  onProgress?: ReviewProgress;
  /** Every workflow transition, for verbose output */
  onStep?: WorkflowProgress;
}

/** "<name>: <message>" for anything thrown */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/**
 * Review one change set.
 *
 * @throws {ReviewConfigError} before a task is created, for bad budgets or
 * a missing token counter
 * @throws whatever listing files, the workflow or parsing raised, after the
 * task is marked failed
 */
export async function reviewChangeSet(
  source: DiffSource,
  deps: ReviewServiceDeps,
  callbacks: ReviewCallbacks = {}
): Promise<ReviewOutcome> {
  const { onProgress, onStep } = callbacks;
  const tokenCounter = deps.tokenCounter ?? createTokenCounter();
  validateReviewConfig(deps.config);
  assertTokenCounter(tokenCounter);

  const task = deps.tracker.create(source.reference);
  deps.tracker.markInProgress(task.id);

  try {
    onProgress?.(`Fetching files for ${source.reference}...`);
    const entries = await source.listFiles();
    const changeSet = buildChangeSet(entries, tokenCounter);
    onProgress?.(
      `Found ${changeSet.files.length} changed and ${changeSet.deletedFiles.length} deleted file(s)`
    );

    const { finalReview, summary } = await runReviewWorkflow(
      changeSet,
      { model: deps.model, config: deps.config },
      (step, detail, state) => {
        onStep?.(step, detail, state);
        if (step !== "prepare-batch") {
          onProgress?.(detail);
        }
      }
    );

    const review = parseStructuredReview(finalReview);
    deps.tracker.markSucceeded(task.id, review);

    return { taskId: task.id, review, rawReview: finalReview, run: summary };
  } catch (error) {
    deps.tracker.markFailed(task.id, describeFailure(error));
    throw error;
  }
}

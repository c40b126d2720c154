/**
 * Review planning - what a run would send, without calling the model.
 *
 * Uses the same size decision, organizer, scheduler and chunker as the
 * workflow, so the plan matches the calls a real run makes.
 */

import type { ReviewConfig } from "../../types/config.js";
import type { ChangeSet, FilePatch } from "../../types/patch.js";
import type { ReviewPath } from "../../types/review.js";
import { chunkOverflow } from "./chunker.js";
import { organizePatches } from "./organizer.js";
import { drainBatches } from "./scheduler.js";

/** Sum of tokenCount over the given patches */
export function sumTokens(files: readonly FilePatch[]): number {
  return files.reduce((sum, file) => sum + file.tokenCount, 0);
}

/**
 * Whether a change set takes the multi-stage path.
 * A total exactly at the threshold still takes the short path.
 */
export function exceedsLongRunThreshold(
  totalTokens: number,
  longRunThreshold: number
): boolean {
  return totalTokens > longRunThreshold;
}

export interface ReviewPlan {
  path: ReviewPath;
  totalTokens: number;
  files: FilePatch[];
  deletedFiles: string[];
  /** Batch-review calls, in order (empty on the short path) */
  batches: FilePatch[][];
  /** Overflow-summary calls, in order (empty on the short path) */
  overflowChunks: FilePatch[][];
}

/**
 * Work out the model calls a run over this change set would make.
 */
export function planReview(
  changeSet: ChangeSet,
  config: ReviewConfig
): ReviewPlan {
  const totalTokens = sumTokens(changeSet.files);

  if (!exceedsLongRunThreshold(totalTokens, config.longRunThreshold)) {
    return {
      path: "short",
      totalTokens,
      files: changeSet.files,
      deletedFiles: changeSet.deletedFiles,
      batches: [],
      overflowChunks: [],
    };
  }

  const { buckets, overflow } = organizePatches(
    changeSet.files,
    config.primaryBudget
  );

  return {
    path: "long",
    totalTokens,
    files: changeSet.files,
    deletedFiles: changeSet.deletedFiles,
    batches: drainBatches(buckets, config.batchBudget),
    overflowChunks: chunkOverflow(overflow, config.chunkBudget),
  };
}

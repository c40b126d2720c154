import type { ChangeSet, FilePatch } from "../../types/patch.js";
import type { LanguageBuckets } from "../batching/types.js";

/**
 * The steps of a review run.
 *
 *   analyze-size ─┬─▶ review-short ───────────────────────────────▶ end
 *                 └─▶ prepare-batch ◀─▶ review-batch
 *                          └─▶ summarize-overflow ─▶ synthesize ─▶ end
 */
export type WorkflowStep =
  | "analyze-size"
  | "review-short"
  | "prepare-batch"
  | "review-batch"
  | "summarize-overflow"
  | "synthesize"
  | "end";

export const INITIAL_STEP: WorkflowStep = "analyze-size";

/**
 * Mutable context of one review run.
 *
 * Created per run by `createWorkflowState` and owned by that run alone.
 */
export interface WorkflowState {
  /** Reviewable patches, in the order received */
  readonly files: readonly FilePatch[];
  /** Removed files; listed in the final review, never reviewed */
  readonly deletedFiles: readonly string[];
  /** Set by analyze-size */
  totalTokens: number;
  /** Set once by analyze-size */
  isLongRun: boolean;
  /** Main group, drained by prepare-batch */
  languageBuckets: LanguageBuckets;
  /** Files that did not fit the main group; always summarized */
  overflowFiles: FilePatch[];
  /** The batch prepare-batch selected for the next review-batch */
  currentBatch: FilePatch[];
  /** One entry per reviewed batch, in scheduling order */
  readonly batchReviews: string[];
  /** One entry per overflow chunk, in chunk order */
  readonly overflowSummaries: string[];
  /** Empty until a terminal step writes it */
  finalReview: string;
}

export function createWorkflowState(changeSet: ChangeSet): WorkflowState {
  return {
    files: [...changeSet.files],
    deletedFiles: [...changeSet.deletedFiles],
    totalTokens: 0,
    isLongRun: false,
    languageBuckets: new Map(),
    overflowFiles: [],
    currentBatch: [],
    batchReviews: [],
    overflowSummaries: [],
    finalReview: "",
  };
}

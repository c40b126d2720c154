/**
 * Review Workflow - a finite-state machine over `WorkflowState`
 *
 * Short change sets are reviewed in one call. Long ones are decomposed so no
 * call exceeds the model's budget:
 *
 * 1. analyze-size: total the tokens; above the threshold, organize the
 *    patches into language buckets and overflow
 * 2. prepare-batch / review-batch: drain the buckets one batch at a time,
 *    one review call per batch
 * 3. summarize-overflow: one summary call per overflow chunk
 * 4. synthesize: merge batch reviews, summaries and deleted files into the
 *    final review
 *
 * Batches are reviewed independently and cannot reference each other's
 * findings; the synthesis call is what ties them together.
 *
 * Every step is its own exported function, `transition` dispatches on the
 * step tag, and `runReviewWorkflow` drives it to `end`. Steps run strictly
 * one after another. Any model failure aborts the run: the error propagates
 * and the partial state is dropped with it.
 */

import type { ReviewConfig } from "../../types/config.js";
import {
  LLMAPIKeyError,
  LLMGenerationError,
  type ChatMessage,
  type ModelClient,
} from "../../types/llm.js";
import type { ChangeSet } from "../../types/patch.js";
import type { RunSummary } from "../../types/review.js";
import {
  chunkOverflow,
  exceedsLongRunThreshold,
  nextBatch,
  organizePatches,
  sumTokens,
} from "../batching/index.js";
import {
  buildBatchReviewMessages,
  buildOverflowSummaryMessages,
  buildShortReviewMessages,
  buildSynthesisMessages,
} from "./prompts.js";
import {
  createWorkflowState,
  INITIAL_STEP,
  type WorkflowState,
  type WorkflowStep,
} from "./state.js";

// ============================================================================
// Types
// ============================================================================

export interface WorkflowDeps {
  model: ModelClient;
  config: ReviewConfig;
}

/**
 * Called after each transition with the step about to run.
 */
export type WorkflowProgress = (
  step: WorkflowStep,
  detail: string,
  state: Readonly<WorkflowState>
) => void;

export interface WorkflowResult {
  finalReview: string;
  summary: RunSummary;
}

// ============================================================================
// Model calls
// ============================================================================

/**
 * Call the model, keeping failures distinguishable.
 *
 * Errors that are already ours pass through; anything else is wrapped in
 * LLMGenerationError. An empty reply is a failure too.
 */
export async function invokeModel(
  model: ModelClient,
  messages: readonly ChatMessage[],
  step: WorkflowStep
): Promise<string> {
  let text: string;
  try {
    text = await model.invoke(messages);
  } catch (error) {
    if (error instanceof LLMAPIKeyError || error instanceof LLMGenerationError) {
      throw error;
    }
    throw new LLMGenerationError(
      `Model call failed during ${step}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  if (!text.trim()) {
    throw new LLMGenerationError(`Empty response from model during ${step}`);
  }
  return text;
}

function writeFinalReview(state: WorkflowState, text: string): void {
  if (state.finalReview) {
    throw new Error("Final review has already been written for this run");
  }
  state.finalReview = text;
}

// ============================================================================
// Steps
// ============================================================================

/**
 * Decide between the short and the multi-stage path.
 */
export function analyzeSize(
  state: WorkflowState,
  config: ReviewConfig
): WorkflowStep {
  state.totalTokens = sumTokens(state.files);
  state.isLongRun = exceedsLongRunThreshold(
    state.totalTokens,
    config.longRunThreshold
  );

  if (!state.isLongRun) {
    return "review-short";
  }

  const { buckets, overflow } = organizePatches(
    state.files,
    config.primaryBudget
  );
  state.languageBuckets = buckets;
  state.overflowFiles = overflow;
  state.currentBatch = [];
  return "prepare-batch";
}

/**
 * Pull the next batch; go review it, or move on once the buckets are empty.
 */
export function prepareBatch(
  state: WorkflowState,
  config: ReviewConfig
): WorkflowStep {
  state.currentBatch = nextBatch(state.languageBuckets, config.batchBudget);
  return state.currentBatch.length > 0 ? "review-batch" : "summarize-overflow";
}

export async function reviewBatch(
  state: WorkflowState,
  model: ModelClient
): Promise<WorkflowStep> {
  if (state.currentBatch.length === 0) {
    throw new Error("review-batch reached without a prepared batch");
  }

  const batchNumber = state.batchReviews.length + 1;
  const review = await invokeModel(
    model,
    buildBatchReviewMessages(state.currentBatch, batchNumber),
    "review-batch"
  );
  state.batchReviews.push(review);
  return "prepare-batch";
}

/**
 * Summarize overflow files chunk by chunk. Skipped when nothing overflowed.
 */
export async function summarizeOverflow(
  state: WorkflowState,
  deps: WorkflowDeps
): Promise<WorkflowStep> {
  for (const chunk of chunkOverflow(state.overflowFiles, deps.config.chunkBudget)) {
    const summary = await invokeModel(
      deps.model,
      buildOverflowSummaryMessages(chunk),
      "summarize-overflow"
    );
    state.overflowSummaries.push(summary);
  }
  return "synthesize";
}

export async function synthesize(
  state: WorkflowState,
  model: ModelClient
): Promise<WorkflowStep> {
  const review = await invokeModel(
    model,
    buildSynthesisMessages(
      state.batchReviews,
      state.overflowSummaries,
      state.deletedFiles
    ),
    "synthesize"
  );
  writeFinalReview(state, review);
  return "end";
}

export async function reviewShort(
  state: WorkflowState,
  model: ModelClient
): Promise<WorkflowStep> {
  const review = await invokeModel(
    model,
    buildShortReviewMessages(state.files, state.deletedFiles),
    "review-short"
  );
  writeFinalReview(state, review);
  return "end";
}

// ============================================================================
// Driver
// ============================================================================

/**
 * Run one step and return the next.
 */
export async function transition(
  step: WorkflowStep,
  state: WorkflowState,
  deps: WorkflowDeps
): Promise<WorkflowStep> {
  switch (step) {
    case "analyze-size":
      return analyzeSize(state, deps.config);
    case "review-short":
      return reviewShort(state, deps.model);
    case "prepare-batch":
      return prepareBatch(state, deps.config);
    case "review-batch":
      return reviewBatch(state, deps.model);
    case "summarize-overflow":
      return summarizeOverflow(state, deps);
    case "synthesize":
      return synthesize(state, deps.model);
    case "end":
      return "end";
  }
}

/**
 * Human-readable description of the step about to run.
 */
export function describeStep(
  step: WorkflowStep,
  state: Readonly<WorkflowState>
): string {
  switch (step) {
    case "analyze-size":
      return `Measuring ${state.files.length} file(s)...`;
    case "review-short":
      return `Reviewing ${state.files.length} file(s) (${state.totalTokens} tokens) in one pass...`;
    case "prepare-batch":
      return "Preparing next batch...";
    case "review-batch":
      return `Reviewing batch ${state.batchReviews.length + 1} (${state.currentBatch.length} file(s), ${sumTokens(state.currentBatch)} tokens)...`;
    case "summarize-overflow":
      return state.overflowFiles.length > 0
        ? `Summarizing ${state.overflowFiles.length} additional file(s)...`
        : "No additional files to summarize";
    case "synthesize":
      return `Synthesizing ${state.batchReviews.length} batch review(s) and ${state.overflowSummaries.length} summary(ies)...`;
    case "end":
      return "Review complete";
  }
}

export function summarizeRun(state: Readonly<WorkflowState>): RunSummary {
  return {
    path: state.isLongRun ? "long" : "short",
    totalTokens: state.totalTokens,
    fileCount: state.files.length,
    deletedFileCount: state.deletedFiles.length,
    batchCount: state.batchReviews.length,
    chunkCount: state.overflowSummaries.length,
  };
}

/**
 * Run a review from analyze-size to end.
 *
 * @param changeSet - Patches (token counts filled) and deleted files
 * @param deps - Model client and budgets
 * @param onProgress - Optional callback, called before each step runs
 * @throws whatever the model client raised, as LLMAPIKeyError or
 *   LLMGenerationError; no final review is produced in that case
 */
export async function runReviewWorkflow(
  changeSet: ChangeSet,
  deps: WorkflowDeps,
  onProgress?: WorkflowProgress
): Promise<WorkflowResult> {
  const state = createWorkflowState(changeSet);

  let step: WorkflowStep = INITIAL_STEP;
  while (step !== "end") {
    onProgress?.(step, describeStep(step, state), state);
    step = await transition(step, state, deps);
  }
  onProgress?.(step, describeStep(step, state), state);

  return { finalReview: state.finalReview, summary: summarizeRun(state) };
}

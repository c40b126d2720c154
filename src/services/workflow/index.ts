export type { WorkflowState, WorkflowStep } from "./state.js";
export type { WorkflowDeps, WorkflowProgress, WorkflowResult } from "./machine.js";

export { createWorkflowState, INITIAL_STEP } from "./state.js";
export {
  runReviewWorkflow,
  transition,
  analyzeSize,
  prepareBatch,
  reviewBatch,
  summarizeOverflow,
  synthesize,
  reviewShort,
  describeStep,
  summarizeRun,
  invokeModel,
} from "./machine.js";
export {
  REVIEW_SYSTEM_PROMPT,
  SEGMENT_SEPARATOR,
  NO_OVERFLOW_SUMMARY,
  NO_BATCH_REVIEWS,
  buildShortReviewMessages,
  buildBatchReviewMessages,
  buildOverflowSummaryMessages,
  buildSynthesisMessages,
} from "./prompts.js";

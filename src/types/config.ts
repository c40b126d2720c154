/**
 * Review configuration - the four token budgets that drive batching.
 */

export interface ReviewConfig {
  /** Ceiling for the main group assembled by the patch organizer */
  primaryBudget: number;
  /** Total-token cutoff; change sets above it take the multi-stage path */
  longRunThreshold: number;
  /** Ceiling for one batch-review call */
  batchBudget: number;
  /** Ceiling for one overflow-summary call */
  chunkBudget: number;
}

export const DEFAULT_REVIEW_CONFIG: Readonly<ReviewConfig> = {
  primaryBudget: 4000,
  longRunThreshold: 3000,
  batchBudget: 2000,
  chunkBudget: 1500,
};

/** Environment variable for each budget */
export const REVIEW_CONFIG_ENV: Readonly<Record<keyof ReviewConfig, string>> = {
  primaryBudget: "DIFFSIFT_PRIMARY_BUDGET",
  longRunThreshold: "DIFFSIFT_LONG_RUN_THRESHOLD",
  batchBudget: "DIFFSIFT_BATCH_BUDGET",
  chunkBudget: "DIFFSIFT_CHUNK_BUDGET",
};

/** Error raised before a run starts when it cannot be configured */
export class ReviewConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ReviewConfigErrorCode
  ) {
    super(message);
    this.name = "ReviewConfigError";
  }
}

export type ReviewConfigErrorCode =
  | "TOKEN_COUNTER_UNAVAILABLE"
  | "INVALID_BUDGET"
  | "INVALID_MODEL";

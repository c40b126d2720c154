/**
 * Batching core: fits a change set into budget-sized model calls.
 *
 * - organizer: main group (by language) vs overflow
 * - scheduler: main group → review batches
 * - chunker: overflow → summary chunks
 * - plan: the three together, as a dry run
 */

export type { LanguageBuckets, OrganizedPatches } from "./types.js";
export type { ReviewPlan } from "./plan.js";

export { organizePatches, sortBySizeDescending } from "./organizer.js";
export { chunkOverflow } from "./chunker.js";
export { nextBatch, drainBatches, remainingPatchCount } from "./scheduler.js";
export { planReview, sumTokens, exceedsLongRunThreshold } from "./plan.js";

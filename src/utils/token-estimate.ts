/**
 * Token Estimation Utilities
 *
 * Simple heuristics for estimating token counts without requiring
 * a full tokenizer library. Uses char/4 approximation which is
 * reasonably accurate for English text and code.
 *
 * Every budgeting decision (organizer, scheduler, chunker, size analysis)
 * reads `FilePatch.tokenCount`, which is filled from one TokenCounter when
 * the patch is built, so all comparisons use the same policy.
 */

import { ReviewConfigError } from "../types/config.js";

/** Converts content into budget units */
export interface TokenCounter {
  count(content: string): number;
}

/**
 * Estimate token count for a string using char/4 heuristic.
 *
 * This is a rough approximation - actual tokenization varies by model.
 * For Claude/GPT models, this tends to slightly overestimate for code
 * (which has more punctuation) and underestimate for prose.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** The default counter, backed by `estimateTokens` */
export function createTokenCounter(): TokenCounter {
  return { count: estimateTokens };
}

/**
 * Check that a counter is usable before anything is budgeted with it.
 *
 * @throws {ReviewConfigError} TOKEN_COUNTER_UNAVAILABLE
 */
export function assertTokenCounter(
  counter: TokenCounter | undefined
): asserts counter is TokenCounter {
  if (!counter || typeof counter.count !== "function") {
    throw new ReviewConfigError(
      "No token counter available; budgets cannot be computed.",
      "TOKEN_COUNTER_UNAVAILABLE"
    );
  }
}

/**
 * Count tokens and check the result is a non-negative integer.
 *
 * @throws {ReviewConfigError} TOKEN_COUNTER_UNAVAILABLE when the counter
 * returns something that is not a count
 */
export function countTokens(counter: TokenCounter, content: string): number {
  if (content.length === 0) return 0;

  const count = counter.count(content);
  if (!Number.isInteger(count) || count < 0) {
    throw new ReviewConfigError(
      `Token counter returned an invalid count (${String(count)}).`,
      "TOKEN_COUNTER_UNAVAILABLE"
    );
  }
  return count;
}

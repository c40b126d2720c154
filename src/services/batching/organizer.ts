/**
 * Patch Organizer
 *
 * Partitions a change set into a main group that fits `primaryBudget`
 * (bucketed by language) and an overflow group.
 *
 * Single greedy pass over the patches sorted largest-first: a patch joins
 * the main group when it still fits, otherwise it overflows. Large patches
 * get first claim on the budget, so a big single-file change is never
 * starved by many small ones. The main group may end up below the budget
 * even when a smaller overflowed patch would have fit.
 */

import type { FilePatch } from "../../types/patch.js";
import type { LanguageBuckets, OrganizedPatches } from "./types.js";

/**
 * Sort patches by tokenCount, largest first.
 * Array.prototype.sort is stable, so ties keep input order.
 */
export function sortBySizeDescending(
  patches: readonly FilePatch[]
): FilePatch[] {
  return [...patches].sort((a, b) => b.tokenCount - a.tokenCount);
}

/**
 * Organize patches into language buckets and overflow.
 *
 * @param patches - Patches with tokenCount already computed
 * @param primaryBudget - Token ceiling for the main group (inclusive)
 */
export function organizePatches(
  patches: readonly FilePatch[],
  primaryBudget: number
): OrganizedPatches {
  const buckets: LanguageBuckets = new Map();
  const overflow: FilePatch[] = [];
  let mainTokens = 0;

  for (const patch of sortBySizeDescending(patches)) {
    if (mainTokens + patch.tokenCount <= primaryBudget) {
      const bucket = buckets.get(patch.language);
      if (bucket) {
        bucket.push(patch);
      } else {
        buckets.set(patch.language, [patch]);
      }
      mainTokens += patch.tokenCount;
    } else {
      overflow.push(patch);
    }
  }

  return { buckets, overflow, mainTokens };
}

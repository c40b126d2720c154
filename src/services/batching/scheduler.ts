/**
 * Batch Scheduler
 *
 * Drains language buckets into review batches of at most `batchBudget`
 * tokens. The workflow calls `nextBatch` once per PrepareBatch step and
 * stops when it gets an empty batch back.
 */

import type { FilePatch } from "../../types/patch.js";
import type { LanguageBuckets } from "./types.js";

/**
 * Extract one batch from the buckets (mutates them).
 *
 * Buckets are visited in insertion order. From each, patches are taken off
 * the front while they fit; the first one that would overflow the batch
 * ends that bucket's turn. A batch can therefore mix languages, but keeps
 * each language's patches together.
 *
 * If nothing fit but patches remain, the front patch of the first
 * non-empty bucket is returned on its own: it is larger than the budget and
 * would otherwise never be scheduled.
 *
 * @returns The batch, empty only when every bucket is empty
 */
export function nextBatch(
  buckets: LanguageBuckets,
  batchBudget: number
): FilePatch[] {
  const batch: FilePatch[] = [];
  let batchTokens = 0;

  for (const queue of buckets.values()) {
    let next = queue[0];
    while (next && batchTokens + next.tokenCount <= batchBudget) {
      batch.push(next);
      batchTokens += next.tokenCount;
      queue.shift();
      next = queue[0];
    }
  }

  if (batch.length > 0) {
    return batch;
  }

  for (const queue of buckets.values()) {
    const oversized = queue.shift();
    if (oversized) {
      return [oversized];
    }
  }

  return [];
}

/** Total patches still waiting in the buckets */
export function remainingPatchCount(buckets: LanguageBuckets): number {
  let count = 0;
  for (const queue of buckets.values()) {
    count += queue.length;
  }
  return count;
}

/**
 * Run `nextBatch` until the buckets are empty (mutates them).
 */
export function drainBatches(
  buckets: LanguageBuckets,
  batchBudget: number
): FilePatch[][] {
  const batches: FilePatch[][] = [];

  for (
    let batch = nextBatch(buckets, batchBudget);
    batch.length > 0;
    batch = nextBatch(buckets, batchBudget)
  ) {
    batches.push(batch);
  }

  return batches;
}

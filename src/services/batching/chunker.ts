import type { FilePatch } from "../../types/patch.js";

/**
 * Split overflow patches into ordered chunks for summarization.
 *
 * Input order is kept. A patch joins the open chunk when
 * `chunkTokens + patch.tokenCount <= chunkBudget`, or when the open chunk is
 * empty; otherwise the open chunk is closed and the patch starts the next
 * one. A patch larger than the budget therefore sits alone in its own
 * chunk instead of being dropped.
 */
export function chunkOverflow(
  files: readonly FilePatch[],
  chunkBudget: number
): FilePatch[][] {
  const chunks: FilePatch[][] = [];
  let current: FilePatch[] = [];
  let currentTokens = 0;

  for (const file of files) {
    if (current.length > 0 && currentTokens + file.tokenCount > chunkBudget) {
      chunks.push(current);
      current = [];
      currentTokens = 0;
    }

    current.push(file);
    currentTokens += file.tokenCount;
  }

  if (current.length > 0) {
    chunks.push(current);
  }

  return chunks;
}

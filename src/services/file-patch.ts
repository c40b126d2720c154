/**
 * Builds FilePatch records from diff entries.
 *
 * Deleted files are routed to `deletedFiles` and never budgeted; every
 * other entry becomes a patch whose tokenCount is computed here, once.
 */

import type { ChangeSet, DiffEntry, FilePatch } from "../types/patch.js";
import { ReviewInputError } from "../types/review.js";
import { countTokens, type TokenCounter } from "../utils/token-estimate.js";
import { detectLanguage } from "./language.js";

/**
 * Bring diff entries to one status spelling.
 *
 * GitHub's "list pull request files" endpoint reports deleted files as
 * "removed"; everything downstream only recognises "deleted".
 */
export function normalizeDiffEntries(entries: readonly DiffEntry[]): DiffEntry[] {
  return entries.map((entry) =>
    entry.status === "removed" ? { ...entry, status: "deleted" } : entry
  );
}

/**
 * Create a single patch, counting its tokens.
 */
export function createFilePatch(
  filename: string,
  content: string,
  counter: TokenCounter
): FilePatch {
  return Object.freeze({
    filename,
    content,
    language: detectLanguage(filename),
    tokenCount: countTokens(counter, content),
  });
}

/**
 * Split diff entries into reviewable patches and deleted filenames.
 *
 * Order is preserved. An absent or null patch is treated as empty content.
 *
 * @throws {ReviewInputError} DUPLICATE_FILE if a filename appears twice
 */
export function buildChangeSet(
  entries: readonly DiffEntry[],
  counter: TokenCounter
): ChangeSet {
  const files: FilePatch[] = [];
  const deletedFiles: string[] = [];
  const seen = new Set<string>();

  for (const entry of entries) {
    if (seen.has(entry.filename)) {
      throw new ReviewInputError(
        `File appears more than once in the change set: ${entry.filename}`,
        "DUPLICATE_FILE"
      );
    }
    seen.add(entry.filename);

    if (entry.status === "deleted") {
      deletedFiles.push(entry.filename);
      continue;
    }

    files.push(createFilePatch(entry.filename, entry.patch ?? "", counter));
  }

  return { files, deletedFiles };
}

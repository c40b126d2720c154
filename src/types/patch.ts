/**
 * Patch Types - the reviewable unit of a change set
 *
 * A change set arrives as a list of diff entries (one per file). Every entry
 * that is not a deletion becomes a FilePatch, which is what the batching core
 * budgets and schedules.
 */

import { type } from "arktype";

/** Languages recognised by the extension mapping */
export type Language =
  | "python"
  | "javascript"
  | "typescript"
  | "markdown"
  | "text"
  | "unknown";

/** One modified file's reviewable unit */
export interface FilePatch {
  readonly filename: string;
  /** The patch text (may be empty, e.g. for binary or mode-only changes) */
  readonly content: string;
  readonly language: Language;
  /** Budget units for `content`, computed once when the patch is built */
  readonly tokenCount: number;
}

/**
 * Schema for a single diff entry.
 *
 * Matches the shape of GitHub's "list pull request files" response; extra
 * keys (sha, additions, blob_url, ...) are ignored.
 */
export const DiffEntrySchema = type({
  filename: "string > 0",
  "patch?": "string | null",
  "status?": "string",
});

/** A diff entry as read from a diff source */
export type DiffEntry = typeof DiffEntrySchema.infer;

export const DiffEntryListSchema = DiffEntrySchema.array();

/** Something that can list the files of one change set */
export interface DiffSource {
  /** Human-readable reference, stored on the review task */
  readonly reference: string;
  listFiles(): Promise<readonly DiffEntry[]>;
}

/** The result of turning diff entries into reviewable patches */
export interface ChangeSet {
  /** Reviewable patches, in the order the entries were received */
  files: FilePatch[];
  /** Filenames of removed files, listed in the review but not reviewed */
  deletedFiles: string[];
}

/**
 * JSON file diff source
 *
 * Reviews a change set described by a JSON file: an array of
 * `{ filename, patch?, status? }` objects, the same shape the GitHub
 * "list pull request files" endpoint returns. "-" reads from stdin.
 */

import { type } from "arktype";
import { fileExists, readStdin, readTextFile } from "../runtime/index.js";
import { DiffEntryListSchema, type DiffEntry, type DiffSource } from "../types/patch.js";
import { ReviewInputError } from "../types/review.js";
import { normalizeDiffEntries } from "./file-patch.js";

/**
 * Parse and validate a JSON list of diff entries. A "removed" status, as
 * saved from the GitHub API, becomes "deleted".
 *
 * @throws {ReviewInputError} INVALID_ENTRIES
 */
export function parseDiffEntries(json: string): DiffEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new ReviewInputError(
      `Diff entries are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      "INVALID_ENTRIES"
    );
  }

  const entries = DiffEntryListSchema(data);
  if (entries instanceof type.errors) {
    throw new ReviewInputError(`Invalid diff entries: ${entries.summary}`, "INVALID_ENTRIES");
  }
  return normalizeDiffEntries(entries);
}

/**
 * Load diff entries from a file, or from stdin when the path is "-".
 */
export async function loadDiffEntriesFile(path: string): Promise<DiffEntry[]> {
  if (path === "-") {
    return parseDiffEntries(await readStdin());
  }

  if (!(await fileExists(path))) {
    throw new ReviewInputError(`File not found: ${path}`, "INVALID_ENTRIES");
  }
  return parseDiffEntries(await readTextFile(path));
}

export function createFileDiffSource(path: string): DiffSource {
  return {
    reference: path === "-" ? "file:stdin" : `file:${path}`,
    listFiles: () => loadDiffEntriesFile(path),
  };
}

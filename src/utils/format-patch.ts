/**
 * Shared utilities for formatting patches in prompts
 *
 * Each file is rendered as a header line followed by a fenced block tagged
 * with its language, so the model sees where one file ends and the next
 * begins.
 */

import type { FilePatch } from "../types/patch.js";

/**
 * Pick a code fence that the content cannot close early.
 * Three backticks unless the content itself contains a run of three or more.
 */
export function fenceFor(content: string): string {
  let longest = 0;
  for (const match of content.matchAll(/`{3,}/g)) {
    longest = Math.max(longest, match[0].length);
  }
  return "`".repeat(Math.max(3, longest + 1));
}

/**
 * Format a single patch for inclusion in a prompt.
 */
export function formatFilePatch(patch: FilePatch): string {
  const fence = fenceFor(patch.content);
  return [
    `File: ${patch.filename} (${patch.language})`,
    `${fence}${patch.language}`,
    patch.content,
    fence,
  ].join("\n");
}

/** Format several patches, separated by a blank line */
export function formatFilePatches(patches: readonly FilePatch[]): string {
  return patches.map(formatFilePatch).join("\n\n");
}

/** Bullet list of deleted files, or "None" */
export function formatDeletedFiles(filenames: readonly string[]): string {
  if (filenames.length === 0) return "None";
  return filenames.map((name) => `- ${name}`).join("\n");
}

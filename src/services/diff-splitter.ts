import type { DiffEntry } from "../types/patch.js";

/**
 * Split a raw unified diff (as printed by `git diff`) into one entry per file.
 *
 * Each entry's `patch` holds the file's hunks, starting at the first `@@`
 * line, which is the same shape GitHub returns for pull request files.
 * Binary files and mode-only changes have no patch.
 */
export function splitUnifiedDiff(rawDiff: string): DiffEntry[] {
  if (!rawDiff || rawDiff.trim().length === 0) {
    return [];
  }

  const entries: DiffEntry[] = [];
  const lines = rawDiff.split("\n");

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    // Look for diff header: diff --git a/path b/path
    if (line?.startsWith("diff --git ")) {
      const { entry, nextIndex } = splitFile(lines, i);
      entries.push(entry);
      i = nextIndex;
    } else {
      i++;
    }
  }

  return entries;
}

/**
 * Read one file's section starting at its `diff --git` line
 */
function splitFile(
  lines: string[],
  startIndex: number
): { entry: DiffEntry; nextIndex: number } {
  const path = parseGitDiffPath(lines[startIndex] ?? "");
  let status = "modified";
  let i = startIndex + 1;

  // Header lines, up to the first hunk or the next file
  while (i < lines.length) {
    const line = lines[i];
    if (line === undefined || line.startsWith("diff --git ") || line.startsWith("@@")) {
      break;
    }

    if (line.startsWith("new file mode")) {
      status = "added";
    } else if (line.startsWith("deleted file mode")) {
      status = "deleted";
    } else if (line.startsWith("rename from ")) {
      status = "renamed";
    }
    i++;
  }

  // Hunks, up to the next file
  const hunkStart = i;
  while (i < lines.length && !lines[i]?.startsWith("diff --git ")) {
    i++;
  }

  const hunkLines = lines.slice(hunkStart, i);
  // A diff ends with a newline, which leaves an empty last element
  if (i === lines.length && hunkLines[hunkLines.length - 1] === "") {
    hunkLines.pop();
  }

  const entry: DiffEntry = { filename: path, status };
  if (hunkLines.length > 0) {
    entry.patch = hunkLines.join("\n");
  }

  return { entry, nextIndex: i };
}

/**
 * Get the new path from a "diff --git a/old b/new" line
 */
function parseGitDiffPath(line: string): string {
  const match = line.match(/^diff --git a\/(.+) b\/(.+)$/);
  if (match?.[2]) {
    return match[2];
  }

  // Fallback for unusual prefixes: take what follows the last " b/"
  const content = line.slice("diff --git ".length);
  const index = content.lastIndexOf(" b/");
  return index === -1 ? content : content.slice(index + 3);
}

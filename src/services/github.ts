/**
 * GitHub Service - Wrapper for gh CLI operations
 *
 * Lists a pull request's files through `gh api`. Requires `gh` to be
 * installed and authenticated.
 */

import { type } from "arktype";
import { GitHubError, type PullRequestRef } from "../types/github.js";
import { DiffEntryListSchema, type DiffEntry, type DiffSource } from "../types/patch.js";
import { spawn } from "../runtime/index.js";
import { normalizeDiffEntries } from "./file-patch.js";
import { formatPullRequestRef } from "./reference.js";

/** `--paginate --slurp` wraps each page's array in an outer array */
const PagedDiffEntriesSchema = DiffEntryListSchema.array();

/**
 * Check if gh CLI is installed and authenticated.
 *
 * @throws GitHubError if gh is not installed or not authenticated
 */
export async function checkGhAvailable(): Promise<void> {
  const version = await spawn("gh", ["--version"]).catch(() => null);
  if (!version || version.exitCode !== 0) {
    throw new GitHubError(
      "gh CLI is not installed. Install it from https://cli.github.com/",
      "GH_NOT_INSTALLED"
    );
  }

  const auth = await spawn("gh", ["auth", "status"]);
  if (auth.exitCode !== 0) {
    throw new GitHubError(
      "Not authenticated with GitHub. Run `gh auth login` to authenticate.",
      "NOT_AUTHENTICATED"
    );
  }
}

/**
 * Get current repository name ("owner/repo") from gh CLI.
 */
export async function getCurrentRepo(): Promise<string> {
  const { stdout, exitCode } = await spawn("gh", [
    "repo",
    "view",
    "--json",
    "nameWithOwner",
    "--jq",
    ".nameWithOwner",
  ]);

  if (exitCode !== 0) {
    throw new GitHubError(
      "Could not determine current repository. Use -R owner/repo to specify.",
      "NOT_IN_REPO"
    );
  }

  return stdout.trim();
}

/**
 * Parse the output of `gh api --paginate --slurp .../files`.
 *
 * GitHub reports deleted files as "removed"; `normalizeDiffEntries` renames
 * them to "deleted".
 *
 * @throws GitHubError GH_ERROR if the output is not a list of files
 */
export function parsePullRequestFiles(stdout: string): DiffEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    throw new GitHubError(
      `Failed to parse PR files: ${stdout.slice(0, 200)}`,
      "GH_ERROR"
    );
  }

  const pages = PagedDiffEntriesSchema(data);
  if (pages instanceof type.errors) {
    throw new GitHubError(`Unexpected PR files response: ${pages.summary}`, "GH_ERROR");
  }
  return normalizeDiffEntries(pages.flat());
}

/**
 * Fetch every file of a pull request, with its patch and status.
 *
 * @throws GitHubError on failure
 */
export async function fetchPullRequestFiles(ref: PullRequestRef): Promise<DiffEntry[]> {
  const { stdout, stderr, exitCode } = await spawn("gh", [
    "api",
    `repos/${ref.owner}/${ref.repo}/pulls/${ref.number}/files`,
    "--paginate",
    "--slurp",
  ]);

  if (exitCode !== 0) {
    throw classifyGhError(stderr, ref);
  }

  return parsePullRequestFiles(stdout);
}

/**
 * Map gh CLI stderr to the matching GitHubError.
 */
export function classifyGhError(stderr: string, ref: PullRequestRef): GitHubError {
  const errorLower = stderr.toLowerCase();
  const repo = `${ref.owner}/${ref.repo}`;

  if (
    errorLower.includes("could not resolve to a repository") ||
    errorLower.includes("repository not found")
  ) {
    return new GitHubError(`Repository not found: ${repo}`, "REPO_NOT_FOUND");
  }

  if (
    errorLower.includes("could not resolve to a pullrequest") ||
    errorLower.includes("no pull requests found") ||
    errorLower.includes("http 404")
  ) {
    return new GitHubError(`PR #${ref.number} not found in ${repo}`, "PR_NOT_FOUND");
  }

  if (
    errorLower.includes("not logged in") ||
    errorLower.includes("authentication") ||
    errorLower.includes("http 401")
  ) {
    return new GitHubError(
      "Not authenticated with GitHub. Run `gh auth login` to authenticate.",
      "NOT_AUTHENTICATED"
    );
  }

  return new GitHubError(`gh error: ${stderr.trim()}`, "GH_ERROR");
}

/**
 * A diff source over one pull request.
 */
export function createGitHubDiffSource(ref: PullRequestRef): DiffSource {
  return {
    reference: formatPullRequestRef(ref),
    listFiles: async () => {
      await checkGhAvailable();
      return fetchPullRequestFiles(ref);
    },
  };
}

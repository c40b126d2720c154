/**
 * Pull request references
 *
 * A pull request can be named three ways on the command line:
 * - a number, with the repository from `-R owner/repo` (or the current one)
 * - owner/repo#123
 * - a GitHub URL: https://github.com/owner/repo/pull/123
 */

import type { PullRequestRef } from "../types/github.js";
import { ReviewInputError } from "../types/review.js";

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);

/**
 * Parse a GitHub PR URL and extract owner, repo, and PR number.
 * Supports:
 * - https://github.com/owner/repo/pull/123
 * - https://github.com/owner/repo/pull/123/files (with trailing path)
 * - http://github.com/... (http variant)
 * - https://www.github.com/owner/repo/pull/123
 * - github.com/owner/repo/pull/123 (without protocol)
 *
 * Returns null if not a valid GitHub PR URL.
 */
export function parseGitHubPRUrl(url: string): PullRequestRef | null {
  // Normalize: add https:// if no protocol
  let normalized = url;
  if (!normalized.startsWith("http://") && !normalized.startsWith("https://")) {
    normalized = `https://${normalized}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(normalized);
  } catch {
    return null;
  }

  if (!GITHUB_HOSTS.has(parsed.hostname)) {
    return null;
  }

  // Path should be /owner/repo/pull/number[/...]
  const [owner, repo, pull, numberText] = parsed.pathname.slice(1).split("/");
  if (!owner || !repo || pull !== "pull" || !numberText) {
    return null;
  }

  const number = parsePositiveInteger(numberText);
  return number === null ? null : { owner, repo, number };
}

/** Parse "owner/repo" */
export function parseRepoSlug(slug: string): { owner: string; repo: string } {
  const match = slug.trim().match(/^([\w.-]+)\/([\w.-]+)$/);
  if (!match?.[1] || !match[2]) {
    throw new ReviewInputError(
      `Invalid repository "${slug}". Use owner/repo.`,
      "INVALID_REFERENCE"
    );
  }
  return { owner: match[1], repo: match[2] };
}

/** True when the identifier is a bare PR number and needs a repository */
export function isBarePullNumber(identifier: string): boolean {
  return /^\d+$/.test(identifier.trim());
}

/**
 * Turn a command-line identifier into a pull request reference.
 *
 * @param identifier - PR number, owner/repo#number, or GitHub PR URL
 * @param repo - "owner/repo", required for a bare number and ignored otherwise
 * @throws {ReviewInputError} INVALID_REFERENCE when no owner, repo and
 * number can be read
 */
export function parsePullRequestReference(
  identifier: string,
  repo?: string
): PullRequestRef {
  const trimmed = identifier.trim();

  if (isBarePullNumber(trimmed)) {
    const number = parsePositiveInteger(trimmed);
    if (number === null) {
      throw invalidReference(identifier);
    }
    if (!repo) {
      throw new ReviewInputError(
        `PR #${number} needs a repository. Use -R owner/repo.`,
        "INVALID_REFERENCE"
      );
    }
    return { ...parseRepoSlug(repo), number };
  }

  const short = trimmed.match(/^([\w.-]+)\/([\w.-]+)#(\d+)$/);
  if (short?.[1] && short[2] && short[3]) {
    const number = parsePositiveInteger(short[3]);
    if (number !== null) {
      return { owner: short[1], repo: short[2], number };
    }
  }

  if (trimmed.includes("github.com")) {
    const fromUrl = parseGitHubPRUrl(trimmed);
    if (fromUrl) {
      return fromUrl;
    }
  }

  throw invalidReference(identifier);
}

/** "owner/repo#123" */
export function formatPullRequestRef(ref: PullRequestRef): string {
  return `${ref.owner}/${ref.repo}#${ref.number}`;
}

function parsePositiveInteger(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const value = Number.parseInt(text, 10);
  return value > 0 ? value : null;
}

function invalidReference(identifier: string): ReviewInputError {
  return new ReviewInputError(
    `Invalid pull request reference "${identifier}". Use a PR number with -R owner/repo, owner/repo#123, or a GitHub PR URL.`,
    "INVALID_REFERENCE"
  );
}

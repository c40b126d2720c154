/**
 * GitHub Types - pull request references and gh CLI failures
 */

/** Identifies one pull request */
export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
}

/** Errors specific to GitHub/gh CLI operations */
export class GitHubError extends Error {
  constructor(
    message: string,
    public readonly code: GitHubErrorCode
  ) {
    super(message);
    this.name = "GitHubError";
  }
}

export type GitHubErrorCode =
  | "GH_NOT_INSTALLED"
  | "NOT_AUTHENTICATED"
  | "PR_NOT_FOUND"
  | "REPO_NOT_FOUND"
  | "NOT_IN_REPO"
  | "GH_ERROR";

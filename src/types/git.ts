/** Target formats for local diffs */
export type DiffTarget =
  | "staged"
  | "HEAD"
  | `branch:${string}`
  | `commit:${string}`
  | `range:${string}..${string}`;

/** Errors specific to git operations */
export class GitError extends Error {
  constructor(
    message: string,
    public readonly code: GitErrorCode
  ) {
    super(message);
    this.name = "GitError";
  }
}

export type GitErrorCode =
  | "NOT_A_REPO"
  | "INVALID_TARGET"
  | "BRANCH_NOT_FOUND"
  | "COMMIT_NOT_FOUND"
  | "GIT_ERROR";

import { describe, expect, it } from "vitest";
import { ReviewInputError } from "../types/review.js";
import {
  formatPullRequestRef,
  isBarePullNumber,
  parseGitHubPRUrl,
  parsePullRequestReference,
  parseRepoSlug,
} from "./reference.js";

describe("parseGitHubPRUrl", () => {
  it("parses standard GitHub PR URL", () => {
    expect(parseGitHubPRUrl("https://github.com/octo/widgets/pull/123")).toEqual({
      owner: "octo",
      repo: "widgets",
      number: 123,
    });
  });

  it("parses URL with trailing path", () => {
    expect(parseGitHubPRUrl("https://github.com/octo/widgets/pull/42/files")?.number).toBe(42);
  });

  it("parses URL without protocol", () => {
    expect(parseGitHubPRUrl("github.com/octo/widgets/pull/7")).toEqual({
      owner: "octo",
      repo: "widgets",
      number: 7,
    });
  });

  it("accepts the www host", () => {
    expect(parseGitHubPRUrl("https://www.github.com/o/r/pull/3")).toEqual({
      owner: "o",
      repo: "r",
      number: 3,
    });
    expect(parsePullRequestReference("www.github.com/o/r/pull/3")).toEqual({
      owner: "o",
      repo: "r",
      number: 3,
    });
  });

  it("returns null for non-GitHub or non-PR URLs", () => {
    expect(parseGitHubPRUrl("https://gitlab.com/octo/widgets/pull/1")).toBeNull();
    expect(parseGitHubPRUrl("https://notgithub.com/octo/widgets/pull/1")).toBeNull();
    expect(parseGitHubPRUrl("https://github.com/octo/widgets/issues/1")).toBeNull();
    expect(parseGitHubPRUrl("https://github.com/octo/widgets/pull/abc")).toBeNull();
    expect(parseGitHubPRUrl("https://github.com/octo/widgets")).toBeNull();
  });
});

describe("parsePullRequestReference", () => {
  it("combines a bare number with the repository", () => {
    expect(parsePullRequestReference("12", "octo/widgets")).toEqual({
      owner: "octo",
      repo: "widgets",
      number: 12,
    });
  });

  it("parses owner/repo#number", () => {
    expect(parsePullRequestReference("octo/widgets.js#9")).toEqual({
      owner: "octo",
      repo: "widgets.js",
      number: 9,
    });
  });

  it("parses URLs", () => {
    expect(
      parsePullRequestReference("https://github.com/octo/widgets/pull/5", "ignored/repo")
    ).toEqual({ owner: "octo", repo: "widgets", number: 5 });
  });

  it("requires a repository for a bare number", () => {
    expect(() => parsePullRequestReference("12")).toThrow(
      "PR #12 needs a repository. Use -R owner/repo."
    );
  });

  it.each(["", "abc", "0", "octo/widgets#0", "octo#3", "https://example.com/a/b/pull/1"])(
    "rejects %j",
    (identifier) => {
      try {
        parsePullRequestReference(identifier, "octo/widgets");
        expect.unreachable("should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(ReviewInputError);
        if (error instanceof ReviewInputError) {
          expect(error.code).toBe("INVALID_REFERENCE");
        }
      }
    }
  );
});

describe("parseRepoSlug", () => {
  it("splits owner and repo", () => {
    expect(parseRepoSlug("octo/widgets")).toEqual({ owner: "octo", repo: "widgets" });
  });

  it("rejects anything else", () => {
    expect(() => parseRepoSlug("widgets")).toThrow(ReviewInputError);
    expect(() => parseRepoSlug("a/b/c")).toThrow(ReviewInputError);
  });
});

describe("helpers", () => {
  it("recognises bare numbers", () => {
    expect(isBarePullNumber(" 42 ")).toBe(true);
    expect(isBarePullNumber("octo/widgets#42")).toBe(false);
  });

  it("formats a reference", () => {
    expect(formatPullRequestRef({ owner: "octo", repo: "widgets", number: 3 })).toBe(
      "octo/widgets#3"
    );
  });
});

/**
 * Pieces shared by the review, local and plan commands: budget flags,
 * diff-source selection and error reporting.
 */

import { InvalidArgumentError, type Command } from "commander";
import pc from "picocolors";

import { createFileDiffSource } from "../services/diff-entries.js";
import { createLocalDiffSource } from "../services/git.js";
import { createGitHubDiffSource, getCurrentRepo } from "../services/github.js";
import { isBarePullNumber, parsePullRequestReference } from "../services/reference.js";
import { ReviewConfigError, type ReviewConfig } from "../types/config.js";
import { GitError } from "../types/git.js";
import { GitHubError } from "../types/github.js";
import { LLMAPIKeyError, LLMGenerationError, LLMJSONParseError } from "../types/llm.js";
import type { DiffSource } from "../types/patch.js";
import { ReviewInputError } from "../types/review.js";

export interface BudgetOptions {
  primaryBudget?: number;
  longRunThreshold?: number;
  batchBudget?: number;
  chunkBudget?: number;
}

export interface SourceOptions {
  repo?: string;
  files?: string;
  local?: string;
}

/**
 * Commander argument parser for budget flags
 */
export function parsePositiveIntOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function addBudgetOptions(command: Command): Command {
  return command
    .option("--primary-budget <tokens>", "Main-group token budget", parsePositiveIntOption)
    .option(
      "--long-run-threshold <tokens>",
      "Total tokens above which the review is split into batches",
      parsePositiveIntOption
    )
    .option("--batch-budget <tokens>", "Token budget per batch review", parsePositiveIntOption)
    .option("--chunk-budget <tokens>", "Token budget per overflow summary", parsePositiveIntOption);
}

/** The budget flags that were actually given */
export function budgetOverrides(options: BudgetOptions): Partial<ReviewConfig> {
  const overrides: Partial<ReviewConfig> = {};
  if (options.primaryBudget !== undefined) overrides.primaryBudget = options.primaryBudget;
  if (options.longRunThreshold !== undefined) overrides.longRunThreshold = options.longRunThreshold;
  if (options.batchBudget !== undefined) overrides.batchBudget = options.batchBudget;
  if (options.chunkBudget !== undefined) overrides.chunkBudget = options.chunkBudget;
  return overrides;
}

/**
 * Pick the diff source: a JSON file, a local git target, or a pull request.
 *
 * A bare PR number without -R uses the repository gh sees in the current
 * directory.
 */
export async function resolveDiffSource(
  identifier: string | undefined,
  options: SourceOptions
): Promise<DiffSource> {
  if (options.files) {
    return createFileDiffSource(options.files);
  }
  if (options.local) {
    return createLocalDiffSource(options.local);
  }
  if (!identifier) {
    throw new ReviewInputError(
      "Nothing to review. Give a pull request, --files <path> or --local <target>.",
      "INVALID_REFERENCE"
    );
  }

  const repo =
    options.repo ?? (isBarePullNumber(identifier) ? await getCurrentRepo() : undefined);
  return createGitHubDiffSource(parsePullRequestReference(identifier, repo));
}

/**
 * Print a friendly message for an error and exit.
 */
export function exitWithError(error: unknown): never {
  if (error instanceof GitHubError) {
    console.error(pc.red(`GitHub error: ${error.message}`));

    if (error.code === "GH_NOT_INSTALLED") {
      console.error(pc.dim("Install gh from https://cli.github.com/"));
    } else if (error.code === "NOT_AUTHENTICATED") {
      console.error(pc.dim("Run `gh auth login` to authenticate."));
    } else if (error.code === "NOT_IN_REPO") {
      console.error(pc.dim("Specify the repository with -R owner/repo"));
    }
  } else if (error instanceof GitError) {
    console.error(pc.red(`Git error: ${error.message}`));
    if (error.code === "NOT_A_REPO") {
      console.error(pc.dim("Run this command from within a git repository."));
    }
  } else if (error instanceof ReviewConfigError) {
    console.error(pc.red(`Configuration error: ${error.message}`));
  } else if (error instanceof ReviewInputError) {
    console.error(pc.red(`Error: ${error.message}`));
  } else if (error instanceof LLMAPIKeyError) {
    console.error(
      pc.red("Error: Invalid or missing API key.\n") +
        pc.dim("Check that your ANTHROPIC_API_KEY is correct.")
    );
  } else if (error instanceof LLMGenerationError) {
    console.error(pc.red("Error: AI review failed.\n") + pc.dim(error.message));
  } else if (error instanceof LLMJSONParseError) {
    console.error(
      pc.red("Error: The AI returned a review that could not be read.\n") +
        pc.dim(error.message) +
        "\n" +
        pc.dim(error.rawText.slice(0, 500))
    );
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(pc.red(`Error: ${message}`));
  }

  process.exit(1);
}

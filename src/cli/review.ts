/**
 * Review Commands - review a pull request, a JSON file of entries, or local
 * changes
 *
 * Each run fetches the change set, lets the review workflow decide between a
 * single pass and batched review, and prints the parsed review.
 */

import { Command } from "commander";
import pc from "picocolors";

import { resolveModel, resolveReviewConfig } from "../services/config.js";
import { createLocalDiffSource } from "../services/git.js";
import { createModelClient, hasAPIKey } from "../services/llm.js";
import { reviewChangeSet } from "../services/review-service.js";
import { InMemoryTaskTracker } from "../services/task-tracker.js";
import type { DiffSource } from "../types/patch.js";
import { buildJsonReport, formatReviewSummary, formatReviewVerbose } from "./output.js";
import {
  addBudgetOptions,
  budgetOverrides,
  exitWithError,
  resolveDiffSource,
  type BudgetOptions,
} from "./shared.js";

export interface ReviewOptions extends BudgetOptions {
  repo?: string;
  files?: string;
  model?: string;
  verbose: boolean;
  json: boolean;
}

/**
 * Run a review over a diff source and print it.
 */
async function runReview(
  getSource: () => Promise<DiffSource> | DiffSource,
  options: ReviewOptions
): Promise<void> {
  // Check for API key before doing any work
  if (!hasAPIKey()) {
    console.error(
      pc.red("Error: ANTHROPIC_API_KEY environment variable is not set.\n") +
        pc.dim("Set it in your .env file or export it in your shell:\n") +
        pc.dim("  export ANTHROPIC_API_KEY=<your key>")
    );
    process.exit(1);
  }

  try {
    const config = resolveReviewConfig(budgetOverrides(options));
    const model = createModelClient({ model: resolveModel(options.model) });
    const source = await getSource();

    // Progress goes to stderr when stdout carries JSON
    const log = options.json ? console.error : console.log;

    const outcome = await reviewChangeSet(
      source,
      { model, tracker: new InMemoryTaskTracker(), config },
      {
        onProgress: (message) => log(pc.dim(message)),
        onStep: options.verbose
          ? (step, detail) => log(pc.dim(`  [${step}] ${detail}`))
          : undefined,
      }
    );

    if (options.json) {
      console.log(JSON.stringify(buildJsonReport(source.reference, outcome), null, 2));
    } else {
      console.log(""); // blank line before results
      console.log(options.verbose ? formatReviewVerbose(outcome) : formatReviewSummary(outcome));
    }
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * Create the review command.
 */
export function createReviewCommand(): Command {
  const command = new Command("review")
    .description("Review a GitHub PR (or a JSON file of diff entries)")
    .argument("[identifier]", "PR number, owner/repo#number, or GitHub URL")
    .option("-R, --repo <repo>", "Repository in owner/repo format")
    .option("--files <path>", "Review a JSON file of diff entries instead (- for stdin)")
    .option("-m, --model <model>", "Claude model to use");

  return addBudgetOptions(command)
    .option("-v, --verbose", "Show detailed output", false)
    .option("--json", "Output results as JSON", false)
    .action(async (identifier: string | undefined, options: ReviewOptions) => {
      await runReview(() => resolveDiffSource(identifier, options), options);
    });
}

/**
 * Create the local command.
 */
export function createLocalCommand(): Command {
  const command = new Command("local")
    .description("Review local changes")
    .argument(
      "[target]",
      "What to diff: staged, HEAD, branch:name, commit:hash, or range:a..b",
      "staged"
    )
    .option("-m, --model <model>", "Claude model to use");

  return addBudgetOptions(command)
    .option("-v, --verbose", "Show detailed output", false)
    .option("--json", "Output results as JSON", false)
    .action(async (target: string, options: ReviewOptions) => {
      await runReview(() => createLocalDiffSource(target), options);
    });
}

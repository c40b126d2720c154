/**
 * Plan Command - dry run without LLM calls
 *
 * Shows how a review would be split: the path taken, every batch and
 * overflow chunk with its files and token counts. Useful for tuning budgets.
 */

import { Command } from "commander";
import pc from "picocolors";

import { planReview } from "../services/batching/index.js";
import { resolveReviewConfig } from "../services/config.js";
import { buildChangeSet } from "../services/file-patch.js";
import { createTokenCounter } from "../utils/token-estimate.js";
import { buildJsonPlan, formatPlan } from "./output.js";
import {
  addBudgetOptions,
  budgetOverrides,
  exitWithError,
  resolveDiffSource,
  type BudgetOptions,
  type SourceOptions,
} from "./shared.js";

export interface PlanOptions extends BudgetOptions, SourceOptions {
  json: boolean;
}

async function planAction(identifier: string | undefined, options: PlanOptions): Promise<void> {
  try {
    const config = resolveReviewConfig(budgetOverrides(options));
    const source = await resolveDiffSource(identifier, options);

    console.error(pc.dim(`Fetching files for ${source.reference}...`));
    const changeSet = buildChangeSet(await source.listFiles(), createTokenCounter());
    const plan = planReview(changeSet, config);

    if (options.json) {
      console.log(JSON.stringify(buildJsonPlan(source.reference, plan), null, 2));
    } else {
      console.log(formatPlan(source.reference, plan));
    }
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * Create the plan command
 */
export function createPlanCommand(): Command {
  const command = new Command("plan")
    .description("Show how a review would be batched, without calling the model")
    .argument("[identifier]", "PR number, owner/repo#number, or GitHub URL")
    .option("-R, --repo <repo>", "Repository in owner/repo format")
    .option("--files <path>", "Plan a JSON file of diff entries instead (- for stdin)")
    .option("--local <target>", "Plan local changes: staged, HEAD, branch:name, commit:hash, range:a..b");

  return addBudgetOptions(command)
    .option("--json", "Output as JSON", false)
    .action(planAction);
}

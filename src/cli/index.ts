import { Command } from "commander";
import { createLocalCommand, createReviewCommand } from "./review.js";
import { createPlanCommand } from "./plan.js";

const program = new Command();

program
  .name("diffsift")
  .description("Token-budgeted AI code review for pull requests and local diffs")
  .version("0.1.0");

// Register subcommands
program.addCommand(createReviewCommand());
program.addCommand(createLocalCommand());
program.addCommand(createPlanCommand());

export async function run(): Promise<void> {
  await program.parseAsync();
}

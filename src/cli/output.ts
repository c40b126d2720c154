/**
 * CLI Output Formatting - Formats reviews and plans for terminal display
 *
 * Two modes for reviews:
 * - Summary: issue one-liners per file, for fast triage
 * - Verbose: every issue, suggestion and security note
 */

import pc from "picocolors";
import type { ReviewPlan } from "../services/batching/index.js";
import type { ReviewOutcome } from "../services/review-service.js";
import type { FilePatch } from "../types/patch.js";
import type { FileReview, ReviewIssue, RunSummary } from "../types/review.js";

const NO_VULNERABILITIES = "No vulnerabilities detected.";

/**
 * Color an issue type: security and bugs stand out
 */
function colorIssueType(issueType: string): string {
  switch (issueType.toLowerCase()) {
    case "security":
      return pc.bold(pc.magenta(issueType));
    case "bug":
      return pc.red(issueType);
    case "performance":
      return pc.yellow(issueType);
    default:
      return pc.cyan(issueType);
  }
}

function formatLine(line: number | null | undefined): string {
  return typeof line === "number" ? pc.dim(`L${line} `) : "";
}

function formatIssueOneLine(issue: ReviewIssue): string {
  return `  ${colorIssueType(issue.type)}: ${formatLine(issue.line)}${issue.description}`;
}

function formatIssueVerbose(issue: ReviewIssue, index: number): string {
  const lines: string[] = [];

  lines.push(`  ${pc.bold(`Issue #${index + 1}`)} ${colorIssueType(issue.type)}`);
  if (typeof issue.line === "number") {
    lines.push(`    Line: ${issue.line}`);
  }
  lines.push(`    ${issue.description}`);
  lines.push(`    ${pc.dim("Suggestion:")} ${issue.suggestion}`);

  return lines.join("\n");
}

function formatSecurity(analysis: string): string {
  return analysis.trim() === NO_VULNERABILITIES
    ? pc.green(analysis)
    : pc.red(analysis);
}

/**
 * One line describing how the run went
 */
export function formatRunLine(run: RunSummary): string {
  const path =
    run.path === "short"
      ? "single pass"
      : `${run.batchCount} batch(es), ${run.chunkCount} overflow chunk(s)`;
  return pc.dim(
    `${run.fileCount} file(s), ${run.deletedFileCount} deleted, ${run.totalTokens.toLocaleString()} tokens, ${path}`
  );
}

/**
 * Format for default (summary) output
 */
export function formatReviewSummary(outcome: ReviewOutcome): string {
  const lines: string[] = [];

  lines.push(pc.bold(`Review of ${outcome.review.files.length} file(s)`));
  lines.push(formatRunLine(outcome.run));
  lines.push("");

  for (const file of outcome.review.files) {
    lines.push(formatFileHeader(file));
    if (file.issues.length === 0) {
      lines.push(pc.dim("  No issues"));
    }
    for (const issue of file.issues) {
      lines.push(formatIssueOneLine(issue));
    }
    if (file.security_analysis.trim() !== NO_VULNERABILITIES) {
      lines.push(`  ${formatSecurity(file.security_analysis)}`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

/**
 * Format for verbose output
 */
export function formatReviewVerbose(outcome: ReviewOutcome): string {
  const lines: string[] = [];

  lines.push(pc.bold(`Review of ${outcome.review.files.length} file(s)`));
  lines.push(formatRunLine(outcome.run));
  lines.push(pc.dim(`Task ${outcome.taskId}`));
  lines.push("");

  for (const file of outcome.review.files) {
    lines.push(formatFileHeader(file));
    file.issues.forEach((issue, index) => {
      lines.push(formatIssueVerbose(issue, index));
    });
    if (file.code_suggestions.length > 0) {
      lines.push(`  ${pc.bold("Suggestions")}`);
      for (const suggestion of file.code_suggestions) {
        lines.push(`    - ${formatLine(suggestion.line)}${suggestion.suggestion}`);
      }
    }
    lines.push(`  ${pc.bold("Security")}: ${formatSecurity(file.security_analysis)}`);
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

function formatFileHeader(file: FileReview): string {
  const count = file.issues.length;
  return `${pc.blue(file.name)} ${pc.dim(`(${count} issue${count === 1 ? "" : "s"})`)}`;
}

/**
 * Machine-readable review output for --json
 */
export function buildJsonReport(reference: string, outcome: ReviewOutcome) {
  return {
    reference,
    taskId: outcome.taskId,
    run: outcome.run,
    review: outcome.review,
  };
}

// ============================================================================
// Plan
// ============================================================================

function formatPatchList(patches: readonly FilePatch[]): string[] {
  return patches.map(
    (p) => `    ${p.filename} ${pc.dim(`(${p.language}, ${p.tokenCount} tokens)`)}`
  );
}

function sumPatchTokens(patches: readonly FilePatch[]): number {
  return patches.reduce((sum, p) => sum + p.tokenCount, 0);
}

/**
 * Human-readable dry run
 */
export function formatPlan(reference: string, plan: ReviewPlan): string {
  const lines: string[] = [];

  lines.push(pc.bold(pc.cyan(`=== REVIEW PLAN: ${reference} ===`)));
  lines.push("");
  lines.push(
    `${plan.files.length} file(s), ${plan.deletedFiles.length} deleted, ${plan.totalTokens.toLocaleString()} tokens`
  );

  if (plan.path === "short") {
    lines.push(pc.green("Path: single pass (1 model call)"));
    return lines.join("\n");
  }

  const calls = plan.batches.length + plan.overflowChunks.length + 1;
  lines.push(pc.yellow(`Path: multi-stage (${calls} model calls)`));
  lines.push("");

  plan.batches.forEach((batch, index) => {
    lines.push(pc.bold(`  Batch ${index + 1} (${sumPatchTokens(batch)} tokens)`));
    lines.push(...formatPatchList(batch));
  });

  plan.overflowChunks.forEach((chunk, index) => {
    lines.push(pc.bold(`  Overflow chunk ${index + 1} (${sumPatchTokens(chunk)} tokens)`));
    lines.push(...formatPatchList(chunk));
  });

  lines.push(pc.bold("  Synthesis"));
  return lines.join("\n");
}

/**
 * Machine-readable plan for --json
 */
export function buildJsonPlan(reference: string, plan: ReviewPlan) {
  const describe = (patches: readonly FilePatch[]) =>
    patches.map((p) => ({ filename: p.filename, language: p.language, tokens: p.tokenCount }));

  return {
    reference,
    path: plan.path,
    totalTokens: plan.totalTokens,
    deletedFiles: plan.deletedFiles,
    batches: plan.batches.map(describe),
    overflowChunks: plan.overflowChunks.map(describe),
    modelCalls:
      plan.path === "short" ? 1 : plan.batches.length + plan.overflowChunks.length + 1,
  };
}

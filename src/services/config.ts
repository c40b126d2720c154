/**
 * Config Service - resolves budgets and the model from flags and environment
 *
 * Precedence: explicit override (CLI flag) > environment variable > default.
 */

import {
  DEFAULT_REVIEW_CONFIG,
  REVIEW_CONFIG_ENV,
  ReviewConfigError,
  type ReviewConfig,
} from "../types/config.js";
import { LLM_MODELS, type LLMModel } from "../types/llm.js";

type Environment = Readonly<Record<string, string | undefined>>;

export const DEFAULT_MODEL: LLMModel = "claude-sonnet-4-5";

/** Environment variable naming the model */
export const MODEL_ENV = "DIFFSIFT_MODEL";

const BUDGET_KEYS: ReadonlyArray<keyof ReviewConfig> = [
  "primaryBudget",
  "longRunThreshold",
  "batchBudget",
  "chunkBudget",
];

/**
 * Read a budget from the environment. Unset, empty and non-numeric values
 * are ignored so a stray variable cannot break a run.
 */
function readEnvBudget(env: Environment, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  const value = Number(raw);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Check that every budget is a positive integer.
 *
 * @throws {ReviewConfigError} INVALID_BUDGET
 */
export function validateReviewConfig(config: ReviewConfig): void {
  for (const key of BUDGET_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value <= 0) {
      throw new ReviewConfigError(
        `${key} must be a positive integer (got ${String(value)}).`,
        "INVALID_BUDGET"
      );
    }
  }
}

/**
 * Build the budgets for a run.
 *
 * @param overrides - Values given explicitly, e.g. from CLI flags
 * @param env - Environment to read DIFFSIFT_* budgets from
 * @throws {ReviewConfigError} INVALID_BUDGET if a resolved budget is not a
 * positive integer
 */
export function resolveReviewConfig(
  overrides: Partial<ReviewConfig> = {},
  env: Environment = process.env
): ReviewConfig {
  const config: ReviewConfig = { ...DEFAULT_REVIEW_CONFIG };

  for (const key of BUDGET_KEYS) {
    const value = overrides[key] ?? readEnvBudget(env, REVIEW_CONFIG_ENV[key]);
    if (value !== undefined) {
      config[key] = value;
    }
  }

  validateReviewConfig(config);
  return config;
}

/** Narrow a string to a supported model id */
export function parseModel(value: string): LLMModel | undefined {
  return LLM_MODELS.find((model) => model === value);
}

/**
 * Pick the model: flag, then DIFFSIFT_MODEL, then the default.
 *
 * @throws {ReviewConfigError} INVALID_MODEL for an unsupported model id
 */
export function resolveModel(
  flag?: string,
  env: Environment = process.env
): LLMModel {
  const requested = flag ?? env[MODEL_ENV]?.trim();
  if (!requested) return DEFAULT_MODEL;

  const model = parseModel(requested);
  if (!model) {
    throw new ReviewConfigError(
      `Unsupported model "${requested}". Choose one of: ${LLM_MODELS.join(", ")}.`,
      "INVALID_MODEL"
    );
  }
  return model;
}

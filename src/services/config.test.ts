import { describe, expect, it } from "vitest";
import { DEFAULT_REVIEW_CONFIG, ReviewConfigError } from "../types/config.js";
import {
  DEFAULT_MODEL,
  resolveModel,
  resolveReviewConfig,
  validateReviewConfig,
} from "./config.js";

describe("resolveReviewConfig", () => {
  it("returns the defaults when nothing is set", () => {
    expect(resolveReviewConfig({}, {})).toEqual({
      primaryBudget: 4000,
      longRunThreshold: 3000,
      batchBudget: 2000,
      chunkBudget: 1500,
    });
  });

  it("reads budgets from the environment", () => {
    const config = resolveReviewConfig(
      {},
      { DIFFSIFT_PRIMARY_BUDGET: "8000", DIFFSIFT_CHUNK_BUDGET: " 500 " }
    );

    expect(config.primaryBudget).toBe(8000);
    expect(config.chunkBudget).toBe(500);
    expect(config.batchBudget).toBe(DEFAULT_REVIEW_CONFIG.batchBudget);
  });

  it("prefers overrides to the environment", () => {
    const config = resolveReviewConfig(
      { batchBudget: 1000 },
      { DIFFSIFT_BATCH_BUDGET: "3000" }
    );

    expect(config.batchBudget).toBe(1000);
  });

  it("ignores non-numeric environment values", () => {
    const config = resolveReviewConfig(
      {},
      { DIFFSIFT_LONG_RUN_THRESHOLD: "lots", DIFFSIFT_BATCH_BUDGET: "" }
    );

    expect(config.longRunThreshold).toBe(3000);
    expect(config.batchBudget).toBe(2000);
  });

  it("rejects non-positive budgets", () => {
    expect(() => resolveReviewConfig({ chunkBudget: 0 }, {})).toThrow(ReviewConfigError);
    expect(() =>
      resolveReviewConfig({}, { DIFFSIFT_PRIMARY_BUDGET: "-5" })
    ).toThrow("primaryBudget must be a positive integer (got -5).");
  });
});

describe("validateReviewConfig", () => {
  it("rejects fractional budgets with INVALID_BUDGET", () => {
    try {
      validateReviewConfig({ ...DEFAULT_REVIEW_CONFIG, batchBudget: 1.5 });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ReviewConfigError);
      if (error instanceof ReviewConfigError) {
        expect(error.code).toBe("INVALID_BUDGET");
      }
    }
  });

  it("does not require batchBudget to fit in primaryBudget", () => {
    expect(() =>
      validateReviewConfig({ ...DEFAULT_REVIEW_CONFIG, batchBudget: 9000 })
    ).not.toThrow();
  });
});

describe("resolveModel", () => {
  it("defaults to the sonnet model", () => {
    expect(resolveModel(undefined, {})).toBe(DEFAULT_MODEL);
  });

  it("prefers the flag over DIFFSIFT_MODEL", () => {
    expect(
      resolveModel("claude-haiku-4-5", { DIFFSIFT_MODEL: "claude-opus-4-5" })
    ).toBe("claude-haiku-4-5");
    expect(resolveModel(undefined, { DIFFSIFT_MODEL: "claude-opus-4-5" })).toBe(
      "claude-opus-4-5"
    );
  });

  it("rejects unsupported models", () => {
    expect(() => resolveModel("gpt-4", {})).toThrow(
      'Unsupported model "gpt-4". Choose one of: claude-opus-4-5, claude-sonnet-4-5, claude-haiku-4-5.'
    );
  });
});

/**
 * Parses the final review text into a StructuredReview.
 *
 * Models sometimes wrap JSON in markdown code blocks even when told not to,
 * so a surrounding fence is stripped before parsing.
 */

import { type } from "arktype";
import { LLMJSONParseError } from "../types/llm.js";
import {
  StructuredReviewSchema,
  type StructuredReview,
} from "../types/review.js";

/**
 * Remove a ```json / ``` fence around the whole text, if present.
 */
export function stripCodeFence(text: string): string {
  let jsonText = text.trim();

  if (jsonText.startsWith("```json")) {
    jsonText = jsonText.slice(7);
  } else if (jsonText.startsWith("```")) {
    jsonText = jsonText.slice(3);
  }
  if (jsonText.endsWith("```")) {
    jsonText = jsonText.slice(0, -3);
  }
  return jsonText.trim();
}

/**
 * Parse and validate the final review.
 *
 * @throws {LLMJSONParseError} if the text is not JSON, or not a review
 */
export function parseStructuredReview(rawText: string): StructuredReview {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(rawText));
  } catch (parseError) {
    throw new LLMJSONParseError(
      `Failed to parse LLM response as JSON: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
      rawText
    );
  }

  const review = StructuredReviewSchema(data);
  if (review instanceof type.errors) {
    throw new LLMJSONParseError(
      `LLM response is not a valid review: ${review.summary}`,
      rawText
    );
  }
  return review;
}

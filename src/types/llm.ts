/**
 * LLM Types - Type definitions for the model-call capability
 *
 * The review workflow only depends on the `ModelClient` interface. The
 * concrete client (TanStack AI + Anthropic) lives in services/llm.ts.
 */

/**
 * Supported Claude models.
 * - "claude-opus-4-5" - Most capable, best for complex analysis
 * - "claude-sonnet-4-5" - Highly capable, good speed (default)
 * - "claude-haiku-4-5" - Fastest, good for simple tasks
 */
export const LLM_MODELS = [
  "claude-opus-4-5",
  "claude-sonnet-4-5",
  "claude-haiku-4-5",
] as const;

export type LLMModel = (typeof LLM_MODELS)[number];

/**
 * Configuration options for LLM requests.
 */
export interface LLMConfig {
  /**
   * The model to use for generation.
   * Defaults to "claude-sonnet-4-5".
   */
  model?: LLMModel;

  /**
   * Maximum number of tokens in the response. Defaults to 4096.
   */
  maxTokens?: number;

  /**
   * Controls randomness in the response. Defaults to 0 so repeated reviews
   * of the same change set stay close to each other.
   */
  temperature?: number;
}

/** Role of a prompt message */
export type ChatRole = "system" | "user" | "assistant";

/** One prompt message */
export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * The model-call capability.
 *
 * Implementations must be safe to call concurrently from independent runs,
 * and must reject (never resolve with a placeholder) when the call fails.
 */
export interface ModelClient {
  invoke(messages: readonly ChatMessage[]): Promise<string>;
}

/**
 * Error thrown when the LLM API key is missing.
 */
export class LLMAPIKeyError extends Error {
  constructor() {
    super(
      "ANTHROPIC_API_KEY environment variable is not set. " +
        "Please set it to your Anthropic API key."
    );
    this.name = "LLMAPIKeyError";
  }
}

/**
 * Error thrown when a model call fails or returns nothing usable.
 */
export class LLMGenerationError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "LLMGenerationError";
  }
}

/**
 * Error thrown when the final review is not the JSON document we asked for.
 */
export class LLMJSONParseError extends Error {
  constructor(message: string, public readonly rawText: string) {
    super(message);
    this.name = "LLMJSONParseError";
  }
}

/**
 * LLM Service - TanStack AI integration for Claude
 *
 * Provides the `ModelClient` the review workflow calls. The workflow speaks
 * in `ChatMessage[]`; this module turns those into a TanStack AI `chat()`
 * request.
 *
 * ## How TanStack AI Works
 *
 * TanStack AI uses an "adapter" pattern to support different LLM providers:
 * - **Adapters**: Provider-specific implementations (Anthropic, OpenAI, etc.)
 * - **chat()**: The main function that sends messages to the LLM
 * - **Messages**: Conversation history in a standard format
 *
 * System prompts are not messages in TanStack AI; they are passed separately
 * as `systemPrompts` and applied before the conversation.
 */

import { chat } from "@tanstack/ai";
import { anthropicText } from "@tanstack/ai-anthropic";
import {
  LLMAPIKeyError,
  LLMGenerationError,
  type ChatMessage,
  type LLMConfig,
  type LLMModel,
  type ModelClient,
} from "../types/llm.js";
import { DEFAULT_MODEL } from "./config.js";

/**
 * Default maximum tokens for responses.
 * The final review lists every file, so it needs room.
 */
const DEFAULT_MAX_TOKENS = 4096;

/**
 * Default temperature for responses.
 * 0 keeps repeated reviews of the same change set close to each other.
 */
const DEFAULT_TEMPERATURE = 0;

/**
 * Checks if the Anthropic API key is available in the environment.
 *
 * @returns true if ANTHROPIC_API_KEY is set
 */
export function hasAPIKey(): boolean {
  return !!process.env["ANTHROPIC_API_KEY"];
}

/**
 * Validates that the API key is present, throwing a clear error if not.
 *
 * @throws {LLMAPIKeyError} if ANTHROPIC_API_KEY is not set
 */
function validateAPIKey(): void {
  if (!hasAPIKey()) {
    throw new LLMAPIKeyError();
  }
}

type ConversationMessage = ChatMessage & { role: "user" | "assistant" };

function isConversationMessage(
  message: ChatMessage
): message is ConversationMessage {
  return message.role !== "system";
}

/** The parts of a `chat()` request that depend on our input */
export interface ChatRequest {
  model: LLMModel;
  maxTokens: number;
  temperature: number;
  systemPrompts: string[];
  messages: Array<{ role: "user" | "assistant"; content: string }>;
}

/**
 * Split prompt messages into TanStack AI's system prompts and conversation,
 * and fill in the defaults.
 */
export function toChatRequest(
  messages: readonly ChatMessage[],
  config?: LLMConfig
): ChatRequest {
  return {
    model: config?.model ?? DEFAULT_MODEL,
    maxTokens: config?.maxTokens ?? DEFAULT_MAX_TOKENS,
    temperature: config?.temperature ?? DEFAULT_TEMPERATURE,
    systemPrompts: messages
      .filter((message) => message.role === "system")
      .map((message) => message.content),
    messages: messages
      .filter(isConversationMessage)
      .map(({ role, content }) => ({ role, content })),
  };
}

/**
 * Create a model client backed by Claude.
 *
 * The client holds no per-call state, so one instance can serve concurrent
 * review runs.
 *
 * @example
 * ```ts
 * const model = createModelClient({ model: "claude-haiku-4-5" });
 * const text = await model.invoke([{ role: "user", content: "Hello" }]);
 * ```
 */
export function createModelClient(config?: LLMConfig): ModelClient {
  return {
    async invoke(messages) {
      // Ensure we have an API key before making the request
      validateAPIKey();

      const request = toChatRequest(messages, config);

      try {
        // Use chat() with stream: false to get a simple string response
        return await chat({
          adapter: anthropicText(request.model),
          stream: false,
          maxTokens: request.maxTokens,
          temperature: request.temperature,
          systemPrompts: request.systemPrompts,
          messages: request.messages,
        });
      } catch (error) {
        if (error instanceof LLMAPIKeyError) {
          throw error;
        }
        throw new LLMGenerationError(
          `Failed to generate text: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        );
      }
    },
  };
}

import { ChatOpenAI } from "@langchain/openai";
import type { BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import type { AppConfig } from "./config.js";

/**
 * What the reasoning node needs from a model: one call from the message
 * history to the next message, which may carry tool calls.
 * A tool-bound ChatOpenAI satisfies it, and so does a plain object in tests.
 */
export interface ToolCallingModel {
  invoke(messages: BaseMessage[], options?: { signal?: AbortSignal; timeout?: number }): Promise<BaseMessage>;
}

/**
 * Central model configuration.
 *
 * Any OpenAI-compatible endpoint works; point MODEL_BASE_URL at OpenRouter
 * (https://openrouter.ai/api/v1) and set MODEL_NAME to e.g. "openai/gpt-4o-mini".
 */
export function createChatModel(config: AppConfig["model"]): ChatOpenAI {
  return new ChatOpenAI({
    model: config.name,
    temperature: config.temperature,
    apiKey: config.apiKey,
    configuration: config.baseUrl ? { baseURL: config.baseUrl } : undefined,
  });
}

/** Declare the tool catalogue as callable functions on the model */
export function bindTaskTools(model: ChatOpenAI, tools: StructuredToolInterface[]): ToolCallingModel {
  return model.bindTools(tools);
}

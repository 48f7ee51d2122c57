import debug from "debug";
import { END, type LangGraphRunnableConfig } from "@langchain/langgraph";
import { AIMessage, AIMessageChunk, SystemMessage, ToolMessage, type BaseMessage } from "@langchain/core/messages";
import { buildSystemPrompt } from "../agents/tasksAgent.js";
import { getUserContext, type UserContext } from "../context.js";
import { errorMessage, MissingUserContextError, ServiceUnavailableError } from "../errors.js";
import type { ToolCallingModel } from "../lib/models.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { AgentState, AgentStateUpdate } from "./state.js";

const log = debug("tasks-agent:graph");

export type ToolCallRequest = NonNullable<AIMessage["tool_calls"]>[number];

/** Node names; `agent` is the reasoning node */
export const AGENT_NODE = "agent";
export const TOOLS_NODE = "tools";
export const INCOMPLETE_NODE = "incomplete";

/**
 * Tool calls requested by a model message; empty for any other message.
 */
export function getToolCalls(message: BaseMessage | undefined): ToolCallRequest[] {
  if (message instanceof AIMessage || message instanceof AIMessageChunk) {
    return message.tool_calls ?? [];
  }
  return [];
}

export interface ReasoningNodeOptions {
  model: ToolCallingModel;
  /** Time zone for the current date in the system prompt */
  timeZone: string;
  /** Per model call; no timeout when unset */
  timeoutMs?: number;
  now?: () => Date;
}

/**
 * Reasoning node - calls the tool-bound model with the system prompt and the
 * full history. A failed model call becomes an assistant message so the loop
 * can still end; only cancellation of the run is rethrown.
 */
export function createReasoningNode(options: ReasoningNodeOptions) {
  const now = options.now ?? (() => new Date());

  return async function reasoningNode(
    state: AgentState,
    config?: LangGraphRunnableConfig
  ): Promise<AgentStateUpdate> {
    const userContext = getUserContext(config);

    return userContext.withUser(state.userId, async () => {
      const messages = [new SystemMessage(buildSystemPrompt(now(), options.timeZone)), ...state.messages];
      log("Reasoning over %d messages", state.messages.length);

      try {
        const response = await options.model.invoke(messages, {
          signal: config?.signal,
          timeout: options.timeoutMs,
        });
        const toolCalls = getToolCalls(response);
        if (toolCalls.length > 0) {
          log("Model requested %d tool call(s): %s", toolCalls.length, toolCalls.map((tc) => tc.name).join(", "));
        }
        return { messages: [response] };
      } catch (error) {
        if (config?.signal?.aborted) {
          throw error;
        }
        console.error("Error in reasoning node:", error);
        return {
          messages: [new AIMessage(`I encountered an error: ${errorMessage(error)}. Please try again.`)],
        };
      }
    });
  };
}

/**
 * Tool-execution node - runs every tool call of the last message concurrently
 * and returns one ToolMessage per call, in request order. A failing call
 * yields an error-status ToolMessage without affecting its siblings.
 * ServiceUnavailableError aborts the run.
 */
export function createToolExecutionNode(registry: ToolRegistry) {
  return async function toolExecutionNode(
    state: AgentState,
    config?: LangGraphRunnableConfig
  ): Promise<AgentStateUpdate> {
    const toolCalls = getToolCalls(state.messages[state.messages.length - 1]);
    const userContext = getUserContext(config);

    const results = await userContext.withUser(state.userId, () =>
      Promise.all(
        toolCalls.map((call, index) => runToolCall(registry, call, index, userContext, config?.signal))
      )
    );

    log("Executed %d tool call(s)", results.length);
    return { messages: results, roundTrips: 1 };
  };
}

async function runToolCall(
  registry: ToolRegistry,
  call: ToolCallRequest,
  index: number,
  userContext: UserContext,
  signal?: AbortSignal
): Promise<ToolMessage> {
  const toolCallId = call.id ?? `call_${index}`;
  const tool = registry.get(call.name);

  if (!tool) {
    return new ToolMessage({
      content: `Error: unknown tool "${call.name}". Available tools: ${[...registry.keys()].join(", ")}`,
      tool_call_id: toolCallId,
      name: call.name,
      status: "error",
    });
  }

  try {
    const userId = userContext.requireUser();
    const output: unknown = await tool.invoke(call.args, { configurable: { userId }, signal });
    return new ToolMessage({
      content: typeof output === "string" ? output : JSON.stringify(output),
      tool_call_id: toolCallId,
      name: call.name,
    });
  } catch (error) {
    if (error instanceof ServiceUnavailableError || signal?.aborted) {
      throw error;
    }
    if (error instanceof MissingUserContextError) {
      console.error(`Tool ${call.name} ran without an acting user:`, error);
    } else {
      console.error(`Error executing tool ${call.name}:`, error);
    }
    return new ToolMessage({
      content: `Error executing ${call.name}: ${errorMessage(error)}`,
      tool_call_id: toolCallId,
      name: call.name,
      status: "error",
    });
  }
}

export function incompleteMessage(maxRoundTrips: number): string {
  return `I could not complete your request within ${maxRoundTrips} rounds of tool calls. Please try again with a more specific request.`;
}

/**
 * Terminal node reached when the round-trip cap is hit
 */
export function createIncompleteNode(maxRoundTrips: number) {
  return async function incompleteNode(): Promise<AgentStateUpdate> {
    console.warn(`Agent stopped after ${maxRoundTrips} tool round trips`);
    return { messages: [new AIMessage(incompleteMessage(maxRoundTrips))] };
  };
}

/**
 * Conditional edge after the reasoning node
 */
export function routeAfterReasoning(maxRoundTrips: number) {
  return function shouldContinue(state: AgentState): typeof TOOLS_NODE | typeof INCOMPLETE_NODE | typeof END {
    const toolCalls = getToolCalls(state.messages[state.messages.length - 1]);
    if (toolCalls.length === 0) {
      log("Routing to end");
      return END;
    }
    if (state.roundTrips >= maxRoundTrips) {
      log("Round-trip cap of %d reached", maxRoundTrips);
      return INCOMPLETE_NODE;
    }
    log("Routing to tools (%d calls)", toolCalls.length);
    return TOOLS_NODE;
  };
}

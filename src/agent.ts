/**
 * Tasks Agent facade
 *
 * The public entry point: resolves the caller's external user id to an
 * internal id, runs the graph with a fresh UserContext, and returns the
 * final assistant text. Ordinary model and tool failures come back as text;
 * only ServiceUnavailableError and cancellation by the caller are thrown.
 *
 * LangChain JS has no sync/async split: `invoke` is the single call-and-wait
 * entry point and `stream` yields per-node deltas.
 */

import { AIMessage, BaseMessage, HumanMessage } from "@langchain/core/messages";
import { UserContext } from "./context.js";
import { errorMessage, MissingUserContextError, ServiceUnavailableError } from "./errors.js";
import { createTaskGraph, recursionLimitFor, type CompiledTaskGraph } from "./graph/workflow.js";
import type { AppConfig } from "./lib/config.js";
import { HttpTaskStore } from "./lib/httpStore.js";
import { InMemoryTaskStore } from "./lib/memoryStore.js";
import { bindTaskTools, createChatModel, type ToolCallingModel } from "./lib/models.js";
import type { TaskStore } from "./lib/tasks.js";
import { UserDirectory } from "./lib/users.js";
import { createToolRegistry } from "./tools/registry.js";
import { createTaskTools } from "./tools/taskTools.js";

export interface AgentRunOptions {
  /** Cancels the run at the next suspend point */
  signal?: AbortSignal;
}

/** Messages one node appended to the state */
export interface AgentStateDelta {
  node: string;
  messages: BaseMessage[];
}

/** Node name reported for the synthesized failure message of a stream */
export const ERROR_DELTA_NODE = "error";

/**
 * Text of a message; structured content keeps its text parts only.
 */
export function messageText(message: BaseMessage | undefined): string {
  if (!message) {
    return "";
  }
  if (typeof message.content === "string") {
    return message.content;
  }
  return message.content
    .map((part) =>
      typeof part === "object" && part !== null && "text" in part && typeof part.text === "string" ? part.text : ""
    )
    .join("");
}

function messagesOf(update: unknown): BaseMessage[] {
  if (typeof update !== "object" || update === null || !("messages" in update)) {
    return [];
  }
  const { messages } = update;
  return Array.isArray(messages)
    ? messages.filter((message): message is BaseMessage => message instanceof BaseMessage)
    : [];
}

export class TaskAgent {
  constructor(
    private readonly graph: CompiledTaskGraph,
    private readonly users: UserDirectory,
    private readonly maxRoundTrips: number
  ) {}

  /**
   * Run the agent to completion and return its final reply.
   */
  async invoke(message: string, externalUserId: string, options: AgentRunOptions = {}): Promise<string> {
    const userId = this.users.getOrCreate(externalUserId);
    const userContext = new UserContext();

    try {
      const result = await this.graph.invoke(
        { messages: [new HumanMessage(message)], userId },
        this.runConfig(userContext, options)
      );
      return messageText(result.messages[result.messages.length - 1]);
    } catch (error) {
      return this.describeFailure(error, externalUserId, options.signal);
    } finally {
      userContext.clearCurrentUser();
    }
  }

  /**
   * Run the agent, yielding what each node appended as soon as it finishes.
   * A failure is reported as a final delta from the "error" node.
   */
  async *stream(
    message: string,
    externalUserId: string,
    options: AgentRunOptions = {}
  ): AsyncGenerator<AgentStateDelta> {
    const userId = this.users.getOrCreate(externalUserId);
    const userContext = new UserContext();

    try {
      const stream = await this.graph.stream(
        { messages: [new HumanMessage(message)], userId },
        { ...this.runConfig(userContext, options), streamMode: "updates" }
      );
      for await (const chunk of stream) {
        for (const [node, update] of Object.entries(chunk)) {
          yield { node, messages: messagesOf(update) };
        }
      }
    } catch (error) {
      const text = this.describeFailure(error, externalUserId, options.signal);
      yield { node: ERROR_DELTA_NODE, messages: [new AIMessage(text)] };
    } finally {
      userContext.clearCurrentUser();
    }
  }

  private runConfig(userContext: UserContext, options: AgentRunOptions) {
    return {
      configurable: { userContext },
      recursionLimit: recursionLimitFor(this.maxRoundTrips),
      signal: options.signal,
    };
  }

  private describeFailure(error: unknown, externalUserId: string, signal?: AbortSignal): string {
    if (error instanceof ServiceUnavailableError || signal?.aborted) {
      throw error;
    }
    if (error instanceof MissingUserContextError) {
      console.error(`Agent run for user ${externalUserId} lost its user context:`, error);
      return `Internal error: ${error.message}. Please try again.`;
    }
    console.error(`Agent run for user ${externalUserId} failed:`, error);
    return `I encountered an error while processing your request: ${errorMessage(error)}`;
  }
}

export interface TaskAgentOverrides {
  store?: TaskStore;
  /** Replaces the configured chat model; must already know the tools */
  model?: ToolCallingModel;
  users?: UserDirectory;
  now?: () => Date;
}

/**
 * Wire config, store, tools, model and graph into an agent.
 */
export function createTaskAgent(config: AppConfig, overrides: TaskAgentOverrides = {}): TaskAgent {
  const store =
    overrides.store ??
    (config.taskStore
      ? new HttpTaskStore({ baseUrl: config.taskStore.url, apiKey: config.taskStore.apiKey })
      : new InMemoryTaskStore());

  const registry = createToolRegistry(createTaskTools(store));
  const model = overrides.model ?? bindTaskTools(createChatModel(config.model), [...registry.values()]);

  const graph = createTaskGraph({
    model,
    registry,
    timeZone: config.agent.timeZone,
    maxRoundTrips: config.agent.maxRoundTrips,
    modelTimeoutMs: config.model.timeoutMs,
    now: overrides.now,
  });

  return new TaskAgent(graph, overrides.users ?? new UserDirectory(), config.agent.maxRoundTrips);
}

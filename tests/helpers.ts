import { AIMessage, type BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { InMemoryTaskStore } from "../src/lib/memoryStore.js";
import type { ToolCallingModel } from "../src/lib/models.js";
import { createTaskTools } from "../src/tools/taskTools.js";

export const NOW = new Date("2026-10-19T09:00:00.000Z");

/**
 * In-memory store with a fixed clock and ids task-1, task-2, …
 */
export function createTestStore(now: () => Date = () => NOW): InMemoryTaskStore {
  let next = 0;
  return new InMemoryTaskStore({ now, generateId: () => `task-${++next}` });
}

/**
 * Model stand-in: answers each call with `respond` and records what it saw.
 */
export class ScriptedModel implements ToolCallingModel {
  readonly calls: BaseMessage[][] = [];

  constructor(private readonly respond: (messages: BaseMessage[], call: number) => BaseMessage | Promise<BaseMessage>) {}

  async invoke(messages: BaseMessage[]): Promise<BaseMessage> {
    this.calls.push(messages);
    return this.respond(messages, this.calls.length - 1);
  }
}

export interface ScriptedToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export function toolCallMessage(calls: ScriptedToolCall[]): AIMessage {
  return new AIMessage({
    content: "",
    tool_calls: calls.map((call) => ({ ...call, type: "tool_call" as const })),
  });
}

/**
 * Tool catalogue over `store`, invoked the way the tool-execution node does.
 */
export function createToolRunner(store: InMemoryTaskStore) {
  const tools = createTaskTools(store);

  function find(name: string): StructuredToolInterface {
    const tool = tools.find((candidate) => candidate.name === name);
    if (!tool) {
      throw new Error(`No tool named ${name}`);
    }
    return tool;
  }

  return async function run(name: string, args: Record<string, unknown>, userId?: string): Promise<unknown> {
    return find(name).invoke(args, userId ? { configurable: { userId } } : {});
  };
}

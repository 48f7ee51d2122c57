import { Annotation } from "@langchain/langgraph";
import type { BaseMessage } from "@langchain/core/messages";

/**
 * State threaded through one agent invocation. Created per call, never persisted.
 */
export const AgentStateAnnotation = Annotation.Root({
  /** Append-only transcript; each node's messages are concatenated */
  messages: Annotation<BaseMessage[]>({
    reducer: (prev, next) => prev.concat(next),
    default: () => [],
  }),

  /** Internal id of the acting user, set once when the run starts */
  userId: Annotation<string>({
    reducer: (prev, next) => prev || next,
    default: () => "",
  }),

  /** Completed reasoning → tool-execution round trips */
  roundTrips: Annotation<number>({
    reducer: (prev, next) => prev + next,
    default: () => 0,
  }),
});

export type AgentState = typeof AgentStateAnnotation.State;
export type AgentStateUpdate = typeof AgentStateAnnotation.Update;

/**
 * LangGraph workflow for the tasks agent.
 *
 * START → agent → (tool calls) tools → agent → … → (no tool calls) END
 *                 (tool calls, cap reached) incomplete → END
 *
 * The round-trip cap bounds the loop against a model that keeps requesting
 * tools; the recursion limit is derived from it so the cap is always hit first.
 */

import { END, START, StateGraph } from "@langchain/langgraph";
import type { ToolCallingModel } from "../lib/models.js";
import type { ToolRegistry } from "../tools/registry.js";
import {
  AGENT_NODE,
  createIncompleteNode,
  createReasoningNode,
  createToolExecutionNode,
  INCOMPLETE_NODE,
  routeAfterReasoning,
  TOOLS_NODE,
} from "./nodes.js";
import { AgentStateAnnotation } from "./state.js";

export const DEFAULT_MAX_ROUND_TRIPS = 10;

export interface TaskGraphOptions {
  model: ToolCallingModel;
  registry: ToolRegistry;
  timeZone?: string;
  maxRoundTrips?: number;
  modelTimeoutMs?: number;
  now?: () => Date;
}

export function createTaskGraph(options: TaskGraphOptions) {
  const maxRoundTrips = options.maxRoundTrips ?? DEFAULT_MAX_ROUND_TRIPS;

  const workflow = new StateGraph(AgentStateAnnotation)
    .addNode(
      AGENT_NODE,
      createReasoningNode({
        model: options.model,
        timeZone: options.timeZone ?? "UTC",
        timeoutMs: options.modelTimeoutMs,
        now: options.now,
      })
    )
    .addNode(TOOLS_NODE, createToolExecutionNode(options.registry))
    .addNode(INCOMPLETE_NODE, createIncompleteNode(maxRoundTrips))
    .addEdge(START, AGENT_NODE)
    .addConditionalEdges(AGENT_NODE, routeAfterReasoning(maxRoundTrips), [TOOLS_NODE, INCOMPLETE_NODE, END])
    .addEdge(TOOLS_NODE, AGENT_NODE)
    .addEdge(INCOMPLETE_NODE, END);

  return workflow.compile();
}

export type CompiledTaskGraph = ReturnType<typeof createTaskGraph>;

/**
 * Supersteps a capped run can take: one per reasoning and tool step, the
 * terminal node, and some slack.
 */
export function recursionLimitFor(maxRoundTrips: number): number {
  return 2 * maxRoundTrips + 5;
}

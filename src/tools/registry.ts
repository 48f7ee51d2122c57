import debug from "debug";
import type { StructuredToolInterface } from "@langchain/core/tools";

const log = debug("tasks-agent:registry");

/**
 * Tools by name. The same instances are bound to the model and looked up by
 * the tool-execution node, so a tool is added by registering it here.
 */
export type ToolRegistry = ReadonlyMap<string, StructuredToolInterface>;

/**
 * Build the registry. Duplicate names keep the first instance.
 */
export function createToolRegistry(tools: StructuredToolInterface[]): ToolRegistry {
  const registry = new Map<string, StructuredToolInterface>();
  for (const tool of tools) {
    if (registry.has(tool.name)) {
      console.warn(`Duplicate tool found: ${tool.name}, keeping first instance`);
      continue;
    }
    registry.set(tool.name, tool);
  }
  log("Registered %d tools: %s", registry.size, [...registry.keys()].join(", "));
  return registry;
}

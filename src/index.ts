export {
  TaskAgent,
  createTaskAgent,
  messageText,
  ERROR_DELTA_NODE,
  type AgentRunOptions,
  type AgentStateDelta,
  type TaskAgentOverrides,
} from "./agent.js";
export { UserContext, agentContextSchema, getActingUserId, getUserContext, type AgentContext } from "./context.js";
export {
  TaskAgentError,
  MissingUserContextError,
  ServiceUnavailableError,
  ConfigError,
  isTaskAgentError,
} from "./errors.js";
export { createTaskGraph, recursionLimitFor, DEFAULT_MAX_ROUND_TRIPS, type CompiledTaskGraph } from "./graph/workflow.js";
export { AgentStateAnnotation, type AgentState, type AgentStateUpdate } from "./graph/state.js";
export { loadConfig, type AppConfig } from "./lib/config.js";
export { createChatModel, bindTaskTools, type ToolCallingModel } from "./lib/models.js";
export { InMemoryTaskStore } from "./lib/memoryStore.js";
export { HttpTaskStore } from "./lib/httpStore.js";
export { UserDirectory } from "./lib/users.js";
export * from "./lib/tasks.js";
export { createTaskTools } from "./tools/taskTools.js";
export { createToolRegistry, type ToolRegistry } from "./tools/registry.js";

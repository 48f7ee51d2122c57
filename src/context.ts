/**
 * Agent Context
 *
 * The acting user travels with the run, never through module state:
 * - the facade creates one UserContext per invocation and passes it to the
 *   graph as `configurable.userContext`;
 * - nodes bind it to `state.userId` while they run;
 * - the tool-execution node hands the bound id to each tool as
 *   `configurable.userId`, which tools read back with getActingUserId().
 */

import type { RunnableConfig } from "@langchain/core/runnables";
import { z } from "zod";
import { MissingUserContextError } from "./errors.js";

/**
 * Context schema for tool invocations.
 * Passed via `configurable` when a tool is invoked.
 */
export const agentContextSchema = z.object({
  userId: z.string().min(1).describe("Internal id of the acting user"),
});

export type AgentContext = z.infer<typeof agentContextSchema>;

/**
 * Holds the acting user for one agent invocation.
 */
export class UserContext {
  private current: string | null = null;

  setCurrentUser(userId: string): void {
    if (!userId) {
      throw new MissingUserContextError("Cannot set an empty acting user");
    }
    this.current = userId;
  }

  clearCurrentUser(): void {
    this.current = null;
  }

  /** The acting user, or MissingUserContextError when none is set */
  requireUser(): string {
    if (!this.current) {
      throw new MissingUserContextError();
    }
    return this.current;
  }

  get isSet(): boolean {
    return this.current !== null;
  }

  /** Bind `userId` for the duration of `fn`; cleared however `fn` settles */
  async withUser<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    this.setCurrentUser(userId);
    try {
      return await fn();
    } finally {
      this.clearCurrentUser();
    }
  }
}

/**
 * The UserContext bound to a graph run.
 */
export function getUserContext(config?: RunnableConfig): UserContext {
  const userContext: unknown = config?.configurable?.userContext;
  if (!(userContext instanceof UserContext)) {
    throw new MissingUserContextError("No user context bound to this run");
  }
  return userContext;
}

/**
 * Runtime handed to a tool function. Depending on who invokes the tool the
 * configurable sits on the runtime itself or on its `config`.
 */
export interface ToolRuntimeLike {
  configurable?: Record<string, unknown>;
  config?: { configurable?: Record<string, unknown> };
}

/**
 * Extract the acting user's id from a tool runtime.
 * Throws MissingUserContextError rather than guessing a user.
 */
export function getActingUserId(runtime?: ToolRuntimeLike): string {
  const parsed = agentContextSchema.safeParse(runtime?.configurable ?? runtime?.config?.configurable);
  if (!parsed.success) {
    throw new MissingUserContextError();
  }
  return parsed.data.userId;
}

/**
 * Error classes for the tasks agent.
 *
 * Ordinary tool failures (bad input, unknown task, wrong owner) are never
 * thrown: tools report them as result strings. The classes here cover the
 * conditions that must stay distinguishable:
 *
 * - MissingUserContextError → a tool ran without an acting user (a context bug)
 * - ServiceUnavailableError → the task store or model cannot be reached at all
 * - ConfigError → invalid environment configuration
 */

export type TaskAgentErrorType = "missing_user_context" | "service_unavailable" | "config";

/** Base class for errors raised by the agent itself */
export abstract class TaskAgentError extends Error {
  abstract readonly type: TaskAgentErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      type: this.type,
      name: this.name,
      message: this.message,
    };
  }
}

/**
 * Raised when a tool executes with no acting user bound to the run.
 * Never converted into a default user.
 */
export class MissingUserContextError extends TaskAgentError {
  readonly type = "missing_user_context" as const;

  constructor(message = "No current user set in agent context") {
    super(message);
  }
}

/**
 * The persistence service (or another required collaborator) is unreachable.
 * Propagates past the tool boundary instead of becoming a tool result.
 */
export class ServiceUnavailableError extends TaskAgentError {
  readonly type = "service_unavailable" as const;

  /** Collaborator that failed, e.g. "task-store" */
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.service = service;
  }
}

export class ConfigError extends TaskAgentError {
  readonly type = "config" as const;

  /** One entry per offending environment variable */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n- ${issues.join("\n- ")}`);
    this.issues = issues;
  }
}

export function isTaskAgentError(error: unknown): error is TaskAgentError {
  return error instanceof TaskAgentError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

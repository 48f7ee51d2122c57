/**
 * HTTP client for a remote task persistence service.
 *
 * Each store operation is a named function on the service, called with
 * `POST <baseUrl>/api/query` (reads) or `POST <baseUrl>/api/mutation` (writes)
 * and a body of `{ path, args, format: "json" }`. The service answers with
 * `{ status: "success", value }` or `{ status: "error", errorMessage }`.
 *
 * Configured by TASK_STORE_URL and TASK_STORE_API_KEY.
 */

import debug from "debug";
import { z } from "zod";
import { ServiceUnavailableError } from "../errors.js";
import {
  taskPrioritySchema,
  taskStatusSchema,
  type NewTask,
  type Task,
  type TaskListQuery,
  type TaskPatch,
  type TaskStatistics,
  type TaskStore,
} from "./tasks.js";

const SERVICE = "task-store";

/** Gateway statuses that mean the service itself is down */
const UNAVAILABLE_STATUSES = new Set([502, 503, 504]);

const responseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), value: z.unknown() }),
  z.object({ status: z.literal("error"), errorMessage: z.string() }),
]);

/** Task as serialized by the service: dates are ISO strings */
const taskRecordSchema = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  priority: taskPrioritySchema,
  status: taskStatusSchema,
  tags: z.array(z.string()).nullish(),
  dueAt: z.coerce.date().nullish(),
  createdAt: z.coerce.date(),
  completedAt: z.coerce.date().nullish(),
});

const statisticsSchema = z.object({
  total: z.number().int().nonnegative(),
  byStatus: z.object({
    pending: z.number().int().nonnegative(),
    in_progress: z.number().int().nonnegative(),
    completed: z.number().int().nonnegative(),
    cancelled: z.number().int().nonnegative(),
  }),
});

type TaskRecord = z.infer<typeof taskRecordSchema>;

export interface HttpTaskStoreOptions {
  baseUrl: string;
  apiKey?: string;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

export class HttpTaskStore implements TaskStore {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;
  private debug = debug("tasks-agent:HttpTaskStore");

  constructor(options: HttpTaskStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async create(input: NewTask): Promise<Task> {
    const value = await this.request("tasks:create", { ...input, dueAt: input.dueAt?.toISOString() }, "mutation");
    return toTask(taskRecordSchema.parse(value));
  }

  async getById(taskId: string): Promise<Task | null> {
    const value = await this.request("tasks:get", { id: taskId }, "query");
    return value === null ? null : toTask(taskRecordSchema.parse(value));
  }

  async listForUser(userId: string, query: TaskListQuery = {}): Promise<Task[]> {
    const value = await this.request("tasks:listForUser", { userId, ...query }, "query");
    return z.array(taskRecordSchema).parse(value).map(toTask);
  }

  async update(taskId: string, patch: TaskPatch): Promise<Task | null> {
    const value = await this.request(
      "tasks:update",
      { id: taskId, ...patch, dueAt: patch.dueAt?.toISOString() },
      "mutation"
    );
    return value === null ? null : toTask(taskRecordSchema.parse(value));
  }

  async delete(taskId: string): Promise<boolean> {
    const value = await this.request("tasks:delete", { id: taskId }, "mutation");
    return z.boolean().parse(value);
  }

  async searchByText(userId: string, term: string, limit?: number): Promise<Task[]> {
    const value = await this.request("tasks:search", { userId, term, limit }, "query");
    return z.array(taskRecordSchema).parse(value).map(toTask);
  }

  async listByTag(userId: string, tag: string, limit?: number): Promise<Task[]> {
    const value = await this.request("tasks:listByTag", { userId, tag, limit }, "query");
    return z.array(taskRecordSchema).parse(value).map(toTask);
  }

  async listOverdue(userId: string): Promise<Task[]> {
    const value = await this.request("tasks:listOverdue", { userId }, "query");
    return z.array(taskRecordSchema).parse(value).map(toTask);
  }

  async statistics(userId: string): Promise<TaskStatistics> {
    const value = await this.request("tasks:statistics", { userId }, "query");
    return statisticsSchema.parse(value);
  }

  /**
   * Call a function on the persistence service.
   *
   * @param functionPath - e.g. "tasks:listForUser"
   * @param type - "query" for reads, "mutation" for writes
   */
  private async request(
    functionPath: string,
    args: Record<string, unknown>,
    type: "query" | "mutation"
  ): Promise<unknown> {
    const url = `${this.baseUrl}/api/${type}`;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    this.debug("%s %s", type, functionPath);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify({ path: functionPath, args, format: "json" }),
      });
    } catch (error) {
      throw new ServiceUnavailableError(SERVICE, `Task store unreachable at ${this.baseUrl}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      if (UNAVAILABLE_STATUSES.has(response.status)) {
        throw new ServiceUnavailableError(SERVICE, `Task store unavailable (${response.status}): ${errorText}`);
      }
      throw new Error(`Task store ${type} failed (${response.status}): ${errorText}`);
    }

    const result = responseSchema.parse(await response.json());
    if (result.status === "error") {
      throw new Error(`Task store error: ${result.errorMessage}`);
    }
    return result.value;
  }
}

function toTask(record: TaskRecord): Task {
  return {
    id: record.id,
    userId: record.userId,
    name: record.name,
    description: record.description ?? undefined,
    priority: record.priority,
    status: record.status,
    tags: record.tags ?? [],
    dueAt: record.dueAt ?? undefined,
    createdAt: record.createdAt,
    completedAt: record.completedAt ?? undefined,
  };
}

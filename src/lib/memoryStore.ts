import { randomUUID } from "node:crypto";
import debug from "debug";
import {
  DEFAULT_LIST_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  emptyStatusCounts,
  isOpen,
  type NewTask,
  type Task,
  type TaskListQuery,
  type TaskPatch,
  type TaskStatistics,
  type TaskStore,
} from "./tasks.js";

export interface InMemoryTaskStoreOptions {
  /** Clock used for creation, completion and overdue checks */
  now?: () => Date;
  generateId?: () => string;
}

interface StoredTask {
  task: Task;
  /** Insertion sequence, breaks ties between equal creation times */
  seq: number;
}

/**
 * Process-local task store. Used when no remote store is configured and in tests.
 * Returned tasks are copies; callers cannot mutate stored state.
 */
export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<string, StoredTask>();
  private seq = 0;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private debug = debug("tasks-agent:InMemoryTaskStore");

  constructor(options: InMemoryTaskStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async create(input: NewTask): Promise<Task> {
    const status = input.status ?? "pending";
    const createdAt = this.now();
    const task: Task = {
      id: this.generateId(),
      userId: input.userId,
      name: input.name,
      description: input.description,
      priority: input.priority ?? "medium",
      status,
      tags: input.tags ? [...input.tags] : [],
      dueAt: input.dueAt,
      createdAt,
      completedAt: status === "completed" ? createdAt : undefined,
    };

    this.tasks.set(task.id, { task, seq: this.seq++ });
    this.debug("Created task %s for user %s", task.id, task.userId);
    return copyTask(task);
  }

  async getById(taskId: string): Promise<Task | null> {
    const stored = this.tasks.get(taskId);
    return stored ? copyTask(stored.task) : null;
  }

  async listForUser(userId: string, query: TaskListQuery = {}): Promise<Task[]> {
    const offset = query.offset ?? 0;
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;

    return this.ownedBy(userId)
      .filter((task) => !query.status || task.status === query.status)
      .filter((task) => !query.priority || task.priority === query.priority)
      .slice(offset, offset + limit)
      .map(copyTask);
  }

  async update(taskId: string, patch: TaskPatch): Promise<Task | null> {
    const stored = this.tasks.get(taskId);
    if (!stored) {
      return null;
    }

    const task = stored.task;
    if (patch.name !== undefined) task.name = patch.name;
    if (patch.description !== undefined) task.description = patch.description;
    if (patch.priority !== undefined) task.priority = patch.priority;
    if (patch.tags !== undefined) task.tags = [...patch.tags];
    if (patch.dueAt !== undefined) task.dueAt = patch.dueAt;
    if (patch.status !== undefined) {
      task.status = patch.status;
      if (patch.status === "completed" && !task.completedAt) {
        task.completedAt = this.now();
      }
    }

    this.debug("Updated task %s", taskId);
    return copyTask(task);
  }

  async delete(taskId: string): Promise<boolean> {
    const deleted = this.tasks.delete(taskId);
    if (deleted) {
      this.debug("Deleted task %s", taskId);
    }
    return deleted;
  }

  async searchByText(userId: string, term: string, limit = DEFAULT_SEARCH_LIMIT): Promise<Task[]> {
    const needle = term.toLowerCase();
    return this.ownedBy(userId)
      .filter(
        (task) =>
          task.name.toLowerCase().includes(needle) ||
          (task.description?.toLowerCase().includes(needle) ?? false)
      )
      .slice(0, limit)
      .map(copyTask);
  }

  async listByTag(userId: string, tag: string, limit = DEFAULT_LIST_LIMIT): Promise<Task[]> {
    const wanted = tag.toLowerCase();
    return this.ownedBy(userId)
      .filter((task) => task.tags.some((candidate) => candidate.toLowerCase() === wanted))
      .slice(0, limit)
      .map(copyTask);
  }

  async listOverdue(userId: string): Promise<Task[]> {
    const now = this.now().getTime();
    return this.ownedBy(userId)
      .filter((task) => isOpen(task) && task.dueAt !== undefined && task.dueAt.getTime() < now)
      .sort((a, b) => (a.dueAt?.getTime() ?? 0) - (b.dueAt?.getTime() ?? 0))
      .map(copyTask);
  }

  async statistics(userId: string): Promise<TaskStatistics> {
    const byStatus = emptyStatusCounts();
    const owned = this.ownedBy(userId);
    for (const task of owned) {
      byStatus[task.status] += 1;
    }
    return { total: owned.length, byStatus };
  }

  /** The user's tasks, newest first */
  private ownedBy(userId: string): Task[] {
    return [...this.tasks.values()]
      .filter((stored) => stored.task.userId === userId)
      .sort((a, b) => b.task.createdAt.getTime() - a.task.createdAt.getTime() || b.seq - a.seq)
      .map((stored) => stored.task);
  }
}

function copyTask(task: Task): Task {
  return { ...task, tags: [...task.tags] };
}

/**
 * Task model and the narrow store interface the tools call through.
 *
 * Priority and status values are defined once here. Tool schemas, both store
 * implementations and the display code all read these enums.
 */

import { z } from "zod";

export const taskPrioritySchema = z.enum(["low", "medium", "high"]);
export type TaskPriority = z.infer<typeof taskPrioritySchema>;

export const taskStatusSchema = z.enum(["pending", "in_progress", "completed", "cancelled"]);
export type TaskStatus = z.infer<typeof taskStatusSchema>;

/** Display order when grouping by priority */
export const PRIORITY_ORDER: readonly TaskPriority[] = ["high", "medium", "low"];

/** Display order when grouping by status */
export const STATUS_ORDER: readonly TaskStatus[] = ["pending", "in_progress", "completed", "cancelled"];

export const STATUS_LABELS: Record<TaskStatus, string> = {
  pending: "Pending",
  in_progress: "In progress",
  completed: "Completed",
  cancelled: "Cancelled",
};

export interface Task {
  id: string;
  /** Internal id of the owning user */
  userId: string;
  name: string;
  description?: string;
  priority: TaskPriority;
  status: TaskStatus;
  tags: string[];
  dueAt?: Date;
  createdAt: Date;
  /** Set the first time the task reaches `completed` */
  completedAt?: Date;
}

export interface NewTask {
  userId: string;
  name: string;
  description?: string;
  priority?: TaskPriority;
  status?: TaskStatus;
  tags?: string[];
  dueAt?: Date;
}

export interface TaskPatch {
  name?: string;
  description?: string;
  priority?: TaskPriority;
  status?: TaskStatus;
  tags?: string[];
  dueAt?: Date;
}

export interface TaskListQuery {
  status?: TaskStatus;
  priority?: TaskPriority;
  /** Default 100 */
  limit?: number;
  offset?: number;
}

export interface TaskStatistics {
  total: number;
  byStatus: Record<TaskStatus, number>;
}

/**
 * Persistence collaborator. Implementations: InMemoryTaskStore, HttpTaskStore.
 */
export interface TaskStore {
  create(input: NewTask): Promise<Task>;
  getById(taskId: string): Promise<Task | null>;
  /** Newest first */
  listForUser(userId: string, query?: TaskListQuery): Promise<Task[]>;
  update(taskId: string, patch: TaskPatch): Promise<Task | null>;
  delete(taskId: string): Promise<boolean>;
  /** Case-insensitive substring match over name and description */
  searchByText(userId: string, term: string, limit?: number): Promise<Task[]>;
  /** Tasks carrying `tag` (case-insensitive), newest first */
  listByTag(userId: string, tag: string, limit?: number): Promise<Task[]>;
  /** Open tasks whose due time has passed */
  listOverdue(userId: string): Promise<Task[]>;
  statistics(userId: string): Promise<TaskStatistics>;
}

export const DEFAULT_LIST_LIMIT = 100;
export const DEFAULT_SEARCH_LIMIT = 50;

export function emptyStatusCounts(): Record<TaskStatus, number> {
  return { pending: 0, in_progress: 0, completed: 0, cancelled: 0 };
}

export function isOpen(task: Task): boolean {
  return task.status !== "completed" && task.status !== "cancelled";
}

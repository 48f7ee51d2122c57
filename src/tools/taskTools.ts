/**
 * Task Tools for the LangGraph Agent
 *
 * Every tool acts for exactly one user: the acting user is read from the run
 * config (`configurable.userId`) via getActingUserId(), which throws
 * MissingUserContextError when it is absent. Everything else that can go
 * wrong is reported back to the model as a result string starting with
 * "Error", except ServiceUnavailableError, which propagates.
 */

import { tool } from "langchain";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { z } from "zod";
import { getActingUserId, type ToolRuntimeLike } from "../context.js";
import { errorMessage, ServiceUnavailableError } from "../errors.js";
import { formatDate, parseDueDate } from "../lib/dates.js";
import {
  DEFAULT_LIST_LIMIT,
  PRIORITY_ORDER,
  STATUS_LABELS,
  STATUS_ORDER,
  taskPrioritySchema,
  taskStatusSchema,
  type Task,
  type TaskPatch,
  type TaskStore,
} from "../lib/tasks.js";

/** Page size when a tool reads every task of the user */
const PAGE_SIZE = DEFAULT_LIST_LIMIT;

const DUE_DATE_HELP = "Use YYYY-MM-DD or an ISO 8601 date-time.";

/**
 * Format a task for display
 */
export function formatTask(task: Task): string {
  const details = [`Priority: ${task.priority}`];
  if (task.dueAt) details.push(`Due: ${formatDate(task.dueAt)}`);
  if (task.tags.length > 0) details.push(`Tags: ${task.tags.join(", ")}`);

  const lines = [`- [${task.id}] ${task.name} (${task.status})`, `  ${details.join(" | ")}`];
  if (task.description) {
    lines.push(`  Description: ${task.description}`);
  }
  return lines.join("\n");
}

/**
 * Every task of the user, newest first, read page by page.
 */
async function listAllTasks(store: TaskStore, userId: string): Promise<Task[]> {
  const tasks: Task[] = [];
  for (let offset = 0; ; offset += PAGE_SIZE) {
    const page = await store.listForUser(userId, { limit: PAGE_SIZE, offset });
    tasks.push(...page);
    if (page.length < PAGE_SIZE) {
      return tasks;
    }
  }
}

/** Header plus one line per task; nothing for an empty bucket */
function groupSection(title: string, tasks: Task[], detail: (task: Task) => string): string[] {
  if (tasks.length === 0) return [];
  return [`${title} (${tasks.length}):`, ...tasks.map((task) => `  - [${task.id}] ${task.name} (${detail(task)})`)];
}

/** Tasks keyed by UTC day; tasks without a date are left out */
function bucketByDay(tasks: Task[], dateOf: (task: Task) => Date | undefined): Map<string, Task[]> {
  const buckets = new Map<string, Task[]>();
  for (const task of tasks) {
    const date = dateOf(task);
    if (!date) continue;
    const day = formatDate(date);
    buckets.set(day, [...(buckets.get(day) ?? []), task]);
  }
  return buckets;
}

/**
 * Turn a store failure into a result string; an unreachable store is rethrown.
 */
function failure(action: string, error: unknown): string {
  if (error instanceof ServiceUnavailableError) {
    throw error;
  }
  return `Error ${action}: ${errorMessage(error)}`;
}

type OwnedTask = { task: Task; error?: undefined } | { task?: undefined; error: string };

/**
 * Load a task and check it belongs to the acting user.
 */
async function loadOwnedTask(store: TaskStore, taskId: string, userId: string): Promise<OwnedTask> {
  const task = await store.getById(taskId);
  if (!task) {
    return { error: `Task ${taskId} not found` };
  }
  if (task.userId !== userId) {
    return { error: `Task ${taskId} does not belong to the current user` };
  }
  return { task };
}

/**
 * Schema for add_task
 */
export const addTaskSchema = z.object({
  name: z.string().min(1).describe("Short title of the task"),
  description: z.string().optional().describe("What needs to be done, in one or two sentences"),
  priority: taskPrioritySchema.optional().describe("Priority of the task (default: medium)"),
  tags: z.array(z.string()).optional().describe("Free-form tags, e.g. ['work', 'urgent']"),
  due_date: z
    .string()
    .optional()
    .describe(`Due date. ${DUE_DATE_HELP} Resolve relative dates like 'tomorrow' first.`),
});

export const taskIdSchema = z.object({
  task_id: z.string().describe("The ID of the task"),
});

export const updateTaskSchema = z.object({
  task_id: z.string().describe("The ID of the task to update"),
  name: z.string().min(1).optional().describe("New name for the task"),
  description: z.string().optional().describe("New description for the task"),
  priority: taskPrioritySchema.optional().describe("New priority for the task"),
  status: taskStatusSchema.optional().describe("New status for the task"),
  tags: z.array(z.string()).optional().describe("Replacement tag list"),
  due_date: z.string().optional().describe(`New due date. ${DUE_DATE_HELP}`),
});

export const listTasksSchema = z.object({
  status: taskStatusSchema.optional().describe("Only list tasks with this status"),
  limit: z.number().int().min(1).max(100).optional().describe("Maximum number of tasks to return"),
});

export const searchTasksSchema = z.object({
  query: z.string().min(1).describe("Text to look for in task names and descriptions"),
});

export const tagSchema = z.object({
  tag: z.string().min(1).describe("The tag to look for, e.g. 'work'"),
});

/**
 * Build the task tool catalogue over a store.
 */
export function createTaskTools(store: TaskStore): StructuredToolInterface[] {
  const addTask = tool(
    async ({ name, description, priority, tags, due_date }, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);

      let dueAt: Date | undefined;
      if (due_date) {
        const parsed = parseDueDate(due_date);
        if (!parsed) {
          return `Error creating task: could not parse due date "${due_date}". ${DUE_DATE_HELP}`;
        }
        dueAt = parsed;
      }

      try {
        const task = await store.create({
          userId,
          name,
          description,
          priority: priority ?? "medium",
          tags,
          dueAt,
        });
        return `Task "${task.name}" created successfully with ID: ${task.id}`;
      } catch (error) {
        return failure("creating task", error);
      }
    },
    {
      name: "add_task",
      description:
        "Create a new task for the user. Requires a name. Optional: description, priority (low/medium/high, default medium), tags, due_date.",
      schema: addTaskSchema,
    }
  );

  const removeTask = tool(
    async ({ task_id }, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const owned = await loadOwnedTask(store, task_id, userId);
        if (owned.error !== undefined) {
          return owned.error;
        }
        await store.delete(task_id);
        return `Task ${task_id} removed successfully`;
      } catch (error) {
        return failure("removing task", error);
      }
    },
    {
      name: "remove_task",
      description: "Delete one of the user's tasks by its ID. This action cannot be undone.",
      schema: taskIdSchema,
    }
  );

  const updateTask = tool(
    async ({ task_id, name, description, priority, status, tags, due_date }, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);

      const patch: TaskPatch = {};
      const updates: string[] = [];
      if (name !== undefined) {
        patch.name = name;
        updates.push(`Name: ${name}`);
      }
      if (description !== undefined) {
        patch.description = description;
        updates.push(`Description: ${description}`);
      }
      if (priority !== undefined) {
        patch.priority = priority;
        updates.push(`Priority: ${priority}`);
      }
      if (status !== undefined) {
        patch.status = status;
        updates.push(`Status: ${status}`);
      }
      if (tags !== undefined) {
        patch.tags = tags;
        updates.push(`Tags: ${tags.join(", ")}`);
      }
      if (due_date !== undefined) {
        const dueAt = parseDueDate(due_date);
        if (!dueAt) {
          return `Error updating task: could not parse due date "${due_date}". ${DUE_DATE_HELP}`;
        }
        patch.dueAt = dueAt;
        updates.push(`Due date: ${formatDate(dueAt)}`);
      }

      if (updates.length === 0) {
        return `No changes provided for task ${task_id}`;
      }

      try {
        const owned = await loadOwnedTask(store, task_id, userId);
        if (owned.error !== undefined) {
          return owned.error;
        }
        const updated = await store.update(task_id, patch);
        if (!updated) {
          return `Task ${task_id} not found`;
        }
        return `Task ${task_id} updated successfully!\nUpdated fields:\n- ${updates.join("\n- ")}`;
      } catch (error) {
        return failure("updating task", error);
      }
    },
    {
      name: "update_task",
      description:
        "Update one of the user's tasks. Provide the task ID and only the fields to change: name, description, priority, status (pending/in_progress/completed/cancelled), tags, due_date.",
      schema: updateTaskSchema,
    }
  );

  const completeTask = tool(
    async ({ task_id }, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const owned = await loadOwnedTask(store, task_id, userId);
        if (owned.error !== undefined) {
          return owned.error;
        }
        if (owned.task.status === "completed") {
          return `Task "${owned.task.name}" is already completed`;
        }
        const updated = await store.update(task_id, { status: "completed" });
        if (!updated) {
          return `Task ${task_id} not found`;
        }
        return `Task "${updated.name}" marked as completed`;
      } catch (error) {
        return failure("completing task", error);
      }
    },
    {
      name: "complete_task",
      description: "Mark one of the user's tasks as completed.",
      schema: taskIdSchema,
    }
  );

  const searchTasks = tool(
    async ({ query }, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const tasks = await store.searchByText(userId, query);
        if (tasks.length === 0) {
          return `No tasks found matching "${query}".`;
        }
        return `Found ${tasks.length} task(s) matching "${query}":\n${tasks.map(formatTask).join("\n")}`;
      } catch (error) {
        return failure("searching tasks", error);
      }
    },
    {
      name: "search_tasks",
      description:
        "Search the user's tasks by text (case-insensitive, matches name and description). Use this when the user refers to a task by name.",
      schema: searchTasksSchema,
    }
  );

  const listTasks = tool(
    async ({ status, limit }, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const max = limit ?? DEFAULT_LIST_LIMIT;
        // one extra row tells whether the list was cut
        const fetched = await store.listForUser(userId, { status, limit: max + 1 });
        const tasks = fetched.slice(0, max);
        if (tasks.length === 0) {
          return status ? `No ${status} tasks found.` : "No tasks found.";
        }
        const text = `Found ${tasks.length} task(s):\n${tasks.map(formatTask).join("\n")}`;
        return fetched.length > max ? `${text}\n(Showing the first ${max} tasks; more exist.)` : text;
      } catch (error) {
        return failure("listing tasks", error);
      }
    },
    {
      name: "list_tasks",
      description:
        "List the user's tasks, newest first, with IDs, status, priority, due date and tags. Optionally filter by status and cap the number of results.",
      schema: listTasksSchema,
    }
  );

  const taskStatistics = tool(
    async (_input: Record<string, never>, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const stats = await store.statistics(userId);
        const lines = [
          "Task statistics:",
          `- Total: ${stats.total}`,
          ...STATUS_ORDER.map((status) => `- ${STATUS_LABELS[status]}: ${stats.byStatus[status]}`),
        ];
        if (stats.total > 0) {
          const rate = Math.round((stats.byStatus.completed / stats.total) * 1000) / 10;
          lines.push(`- Completion rate: ${rate.toFixed(1)}%`);
        }
        return lines.join("\n");
      } catch (error) {
        return failure("computing statistics", error);
      }
    },
    {
      name: "task_statistics",
      description: "Count the user's tasks per status and report the completion rate.",
      schema: z.object({}),
    }
  );

  const groupByPriority = tool(
    async (_input: Record<string, never>, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const tasks = await listAllTasks(store, userId);
        const sections = PRIORITY_ORDER.flatMap((priority) =>
          groupSection(
            `${priority.toUpperCase()} priority`,
            tasks.filter((task) => task.priority === priority),
            (task) => task.status
          )
        );
        return sections.length > 0 ? sections.join("\n") : "No tasks found.";
      } catch (error) {
        return failure("grouping tasks", error);
      }
    },
    {
      name: "group_tasks_by_priority",
      description: "Show the user's tasks grouped by priority: high, then medium, then low.",
      schema: z.object({}),
    }
  );

  const groupByStatus = tool(
    async (_input: Record<string, never>, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const tasks = await listAllTasks(store, userId);
        const sections = STATUS_ORDER.flatMap((status) =>
          groupSection(
            STATUS_LABELS[status],
            tasks.filter((task) => task.status === status),
            (task) => task.priority
          )
        );
        return sections.length > 0 ? sections.join("\n") : "No tasks found.";
      } catch (error) {
        return failure("grouping tasks", error);
      }
    },
    {
      name: "group_tasks_by_status",
      description: "Show the user's tasks grouped by status: pending, in progress, completed, cancelled.",
      schema: z.object({}),
    }
  );

  const groupByDueDate = tool(
    async (_input: Record<string, never>, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const tasks = await listAllTasks(store, userId);
        const byDay = bucketByDay(tasks, (task) => task.dueAt);
        const sections = [...byDay.keys()]
          .sort()
          .flatMap((day) => groupSection(`Due ${day}`, byDay.get(day) ?? [], (task) => task.status));
        sections.push(
          ...groupSection(
            "No due date",
            tasks.filter((task) => !task.dueAt),
            (task) => task.status
          )
        );
        return sections.length > 0 ? sections.join("\n") : "No tasks found.";
      } catch (error) {
        return failure("grouping tasks", error);
      }
    },
    {
      name: "group_tasks_by_due_date",
      description: "Show the user's tasks grouped by due day, earliest first, then the tasks without a due date.",
      schema: z.object({}),
    }
  );

  const groupByDateCreated = tool(
    async (_input: Record<string, never>, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const byDay = bucketByDay(await listAllTasks(store, userId), (task) => task.createdAt);
        const sections = [...byDay.keys()]
          .sort()
          .reverse()
          .flatMap((day) => groupSection(`Created ${day}`, byDay.get(day) ?? [], (task) => task.status));
        return sections.length > 0 ? sections.join("\n") : "No tasks found.";
      } catch (error) {
        return failure("grouping tasks", error);
      }
    },
    {
      name: "group_tasks_by_date_created",
      description: "Show the user's tasks grouped by the day they were created, most recent day first.",
      schema: z.object({}),
    }
  );

  const listTasksByTag = tool(
    async ({ tag }, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const tasks = await store.listByTag(userId, tag);
        if (tasks.length === 0) {
          return `No tasks tagged "${tag}".`;
        }
        return `Found ${tasks.length} task(s) tagged "${tag}":\n${tasks.map(formatTask).join("\n")}`;
      } catch (error) {
        return failure("listing tasks by tag", error);
      }
    },
    {
      name: "list_tasks_by_tag",
      description: "List the user's tasks that carry a given tag (case-insensitive, whole tag), newest first.",
      schema: tagSchema,
    }
  );

  const listOverdueTasks = tool(
    async (_input: Record<string, never>, runtime?: ToolRuntimeLike) => {
      const userId = getActingUserId(runtime);
      try {
        const tasks = await store.listOverdue(userId);
        if (tasks.length === 0) {
          return "No overdue tasks.";
        }
        return `${tasks.length} overdue task(s):\n${tasks.map(formatTask).join("\n")}`;
      } catch (error) {
        return failure("listing overdue tasks", error);
      }
    },
    {
      name: "list_overdue_tasks",
      description: "List the user's open tasks whose due date has passed, oldest due date first.",
      schema: z.object({}),
    }
  );

  return [
    addTask,
    removeTask,
    updateTask,
    completeTask,
    searchTasks,
    listTasks,
    taskStatistics,
    groupByPriority,
    groupByStatus,
    groupByDueDate,
    groupByDateCreated,
    listTasksByTag,
    listOverdueTasks,
  ];
}

import { describe, it, expect, beforeEach } from "vitest";
import { MissingUserContextError } from "../../src/errors.js";
import type { InMemoryTaskStore } from "../../src/lib/memoryStore.js";
import { createTaskTools } from "../../src/tools/taskTools.js";
import { createTestStore, createToolRunner, NOW } from "../helpers.js";

describe("Task Tools", () => {
  let store: InMemoryTaskStore;
  let run: ReturnType<typeof createToolRunner>;

  beforeEach(() => {
    store = createTestStore();
    run = createToolRunner(store);
  });

  it("exposes the full catalogue", () => {
    expect(createTaskTools(store).map((tool) => tool.name)).toEqual([
      "add_task",
      "remove_task",
      "update_task",
      "complete_task",
      "search_tasks",
      "list_tasks",
      "task_statistics",
      "group_tasks_by_priority",
      "group_tasks_by_status",
      "group_tasks_by_due_date",
      "group_tasks_by_date_created",
      "list_tasks_by_tag",
      "list_overdue_tasks",
    ]);
  });

  describe("add_task", () => {
    it("creates a task and returns its id", async () => {
      const result = await run(
        "add_task",
        { name: "Test Task", description: "Test description", priority: "high", tags: ["test", "urgent"] },
        "alice"
      );

      expect(result).toBe('Task "Test Task" created successfully with ID: task-1');
      const task = await store.getById("task-1");
      expect(task).toMatchObject({
        userId: "alice",
        name: "Test Task",
        description: "Test description",
        priority: "high",
        status: "pending",
        tags: ["test", "urgent"],
      });
    });

    it("defaults priority to medium", async () => {
      await run("add_task", { name: "Plain" }, "alice");
      expect((await store.getById("task-1"))?.priority).toBe("medium");
    });

    it("stores a date-only due date at the end of that day", async () => {
      await run("add_task", { name: "Report", due_date: "2026-10-20" }, "alice");
      expect((await store.getById("task-1"))?.dueAt?.toISOString()).toBe("2026-10-20T23:59:59.999Z");
    });

    it("reports an unparseable due date without creating anything", async () => {
      const result = await run("add_task", { name: "Report", due_date: "next tuesday" }, "alice");

      expect(result).toBe(
        'Error creating task: could not parse due date "next tuesday". Use YYYY-MM-DD or an ISO 8601 date-time.'
      );
      expect((await store.statistics("alice")).total).toBe(0);
    });

    it("refuses to run without an acting user", async () => {
      await expect(run("add_task", { name: "Orphan" })).rejects.toBeInstanceOf(MissingUserContextError);
      expect(await store.getById("task-1")).toBeNull();
    });
  });

  describe("isolation", () => {
    it("shows a user's task to that user only", async () => {
      await run("add_task", { name: "Write report", priority: "high" }, "alice");

      expect(await run("list_tasks", {}, "alice")).toBe(
        "Found 1 task(s):\n- [task-1] Write report (pending)\n  Priority: high"
      );
      expect(await run("list_tasks", {}, "bob")).toBe("No tasks found.");
      expect(await run("search_tasks", { query: "report" }, "bob")).toBe('No tasks found matching "report".');
    });

    it("leaves another user's task untouched", async () => {
      await run("add_task", { name: "Write report" }, "alice");

      expect(await run("remove_task", { task_id: "task-1" }, "bob")).toBe(
        "Task task-1 does not belong to the current user"
      );
      expect(await run("update_task", { task_id: "task-1", name: "Hijacked" }, "bob")).toBe(
        "Task task-1 does not belong to the current user"
      );
      expect(await run("complete_task", { task_id: "task-1" }, "bob")).toBe(
        "Task task-1 does not belong to the current user"
      );

      expect(await store.getById("task-1")).toMatchObject({ name: "Write report", status: "pending" });
    });
  });

  describe("remove_task", () => {
    it("deletes an owned task", async () => {
      await run("add_task", { name: "To Delete" }, "alice");

      expect(await run("remove_task", { task_id: "task-1" }, "alice")).toBe("Task task-1 removed successfully");
      expect(await store.getById("task-1")).toBeNull();
    });

    it("reports a missing task", async () => {
      expect(await run("remove_task", { task_id: "task-404" }, "alice")).toBe("Task task-404 not found");
    });
  });

  describe("update_task", () => {
    it("updates the given fields and lists them", async () => {
      await run("add_task", { name: "Original Name", priority: "low" }, "alice");

      const result = await run(
        "update_task",
        { task_id: "task-1", name: "Updated Name", status: "in_progress", priority: "high" },
        "alice"
      );

      expect(result).toBe(
        "Task task-1 updated successfully!\nUpdated fields:\n- Name: Updated Name\n- Priority: high\n- Status: in_progress"
      );
      expect(await store.getById("task-1")).toMatchObject({
        name: "Updated Name",
        status: "in_progress",
        priority: "high",
      });
    });

    it("says so when nothing would change", async () => {
      await run("add_task", { name: "Same" }, "alice");
      expect(await run("update_task", { task_id: "task-1" }, "alice")).toBe("No changes provided for task task-1");
    });

    it("rejects a bad due date before touching the task", async () => {
      await run("add_task", { name: "Same" }, "alice");

      expect(await run("update_task", { task_id: "task-1", name: "Other", due_date: "someday" }, "alice")).toBe(
        'Error updating task: could not parse due date "someday". Use YYYY-MM-DD or an ISO 8601 date-time.'
      );
      expect((await store.getById("task-1"))?.name).toBe("Same");
    });

    it("reports a missing task", async () => {
      expect(await run("update_task", { task_id: "task-9", name: "Updated" }, "alice")).toBe("Task task-9 not found");
    });
  });

  describe("complete_task", () => {
    it("marks an owned task as completed", async () => {
      await run("add_task", { name: "Write report" }, "alice");

      expect(await run("complete_task", { task_id: "task-1" }, "alice")).toBe('Task "Write report" marked as completed');
      expect(await store.getById("task-1")).toMatchObject({ status: "completed", completedAt: NOW });
      expect(await run("complete_task", { task_id: "task-1" }, "alice")).toBe('Task "Write report" is already completed');
    });

    it("reports an unknown id without changing anything", async () => {
      await run("add_task", { name: "Write report" }, "alice");

      const result = await run("complete_task", { task_id: "7d3f3a52-0000-4000-8000-000000000000" }, "alice");

      expect(result).toBe("Task 7d3f3a52-0000-4000-8000-000000000000 not found");
      expect((await store.statistics("alice")).byStatus.completed).toBe(0);
    });
  });

  describe("search_tasks", () => {
    it("matches name and description case-insensitively", async () => {
      await run("add_task", { name: "Write report", description: "Quarterly numbers" }, "alice");
      await run("add_task", { name: "Buy milk" }, "alice");

      expect(await run("search_tasks", { query: "QUARTERLY" }, "alice")).toBe(
        'Found 1 task(s) matching "QUARTERLY":\n- [task-1] Write report (pending)\n  Priority: medium\n  Description: Quarterly numbers'
      );
      expect(await run("search_tasks", { query: "milk" }, "alice")).toBe(
        'Found 1 task(s) matching "milk":\n- [task-2] Buy milk (pending)\n  Priority: medium'
      );
    });
  });

  describe("list_tasks", () => {
    beforeEach(async () => {
      await run("add_task", { name: "First", tags: ["home"], due_date: "2026-10-25" }, "alice");
      await run("add_task", { name: "Second" }, "alice");
      await run("complete_task", { task_id: "task-1" }, "alice");
    });

    it("lists newest first with details", async () => {
      expect(await run("list_tasks", {}, "alice")).toBe(
        "Found 2 task(s):\n" +
          "- [task-2] Second (pending)\n  Priority: medium\n" +
          "- [task-1] First (completed)\n  Priority: medium | Due: 2026-10-25 | Tags: home"
      );
    });

    it("filters by status", async () => {
      expect(await run("list_tasks", { status: "completed" }, "alice")).toBe(
        "Found 1 task(s):\n- [task-1] First (completed)\n  Priority: medium | Due: 2026-10-25 | Tags: home"
      );
      expect(await run("list_tasks", { status: "cancelled" }, "alice")).toBe("No cancelled tasks found.");
    });

    it("caps the number of results and says so", async () => {
      expect(await run("list_tasks", { limit: 1 }, "alice")).toBe(
        "Found 1 task(s):\n- [task-2] Second (pending)\n  Priority: medium\n(Showing the first 1 tasks; more exist.)"
      );
    });

    it("adds no note when everything fits", async () => {
      expect(await run("list_tasks", { limit: 2, status: "pending" }, "alice")).toBe(
        "Found 1 task(s):\n- [task-2] Second (pending)\n  Priority: medium"
      );
    });

    it("notes a listing cut at the default limit", async () => {
      for (let i = 0; i < 100; i++) {
        await store.create({ userId: "alice", name: `Bulk ${i}` });
      }

      const lines = String(await run("list_tasks", {}, "alice")).split("\n");

      expect(lines[0]).toBe("Found 100 task(s):");
      expect(lines[lines.length - 1]).toBe("(Showing the first 100 tasks; more exist.)");
    });
  });

  describe("task_statistics", () => {
    it("omits the completion rate when there are no tasks", async () => {
      expect(await run("task_statistics", {}, "alice")).toBe(
        "Task statistics:\n- Total: 0\n- Pending: 0\n- In progress: 0\n- Completed: 0\n- Cancelled: 0"
      );
    });

    it("rounds the completion rate to one decimal", async () => {
      await run("add_task", { name: "A" }, "alice");
      await run("add_task", { name: "B" }, "alice");
      await run("add_task", { name: "C" }, "alice");
      await run("complete_task", { task_id: "task-1" }, "alice");

      expect(await run("task_statistics", {}, "alice")).toBe(
        "Task statistics:\n- Total: 3\n- Pending: 2\n- In progress: 0\n- Completed: 1\n- Cancelled: 0\n- Completion rate: 33.3%"
      );
    });

    it("keeps one decimal on whole percentages", async () => {
      for (const name of ["A", "B", "C", "D"]) {
        await run("add_task", { name }, "alice");
      }
      await run("update_task", { task_id: "task-2", status: "in_progress" }, "alice");
      await run("update_task", { task_id: "task-3", status: "cancelled" }, "alice");
      await run("complete_task", { task_id: "task-4" }, "alice");

      expect(await run("task_statistics", {}, "alice")).toBe(
        "Task statistics:\n- Total: 4\n- Pending: 1\n- In progress: 1\n- Completed: 1\n- Cancelled: 1\n- Completion rate: 25.0%"
      );
    });
  });

  describe("grouping", () => {
    it("groups by priority high, medium, low and skips empty buckets", async () => {
      await run("add_task", { name: "A", priority: "low" }, "alice");
      await run("add_task", { name: "B", priority: "high" }, "alice");
      await run("add_task", { name: "C", priority: "high" }, "alice");

      expect(await run("group_tasks_by_priority", {}, "alice")).toBe(
        "HIGH priority (2):\n  - [task-3] C (pending)\n  - [task-2] B (pending)\nLOW priority (1):\n  - [task-1] A (pending)"
      );
    });

    it("groups by status in display order", async () => {
      await run("add_task", { name: "A" }, "alice");
      await run("add_task", { name: "B", priority: "high" }, "alice");
      await run("complete_task", { task_id: "task-2" }, "alice");

      expect(await run("group_tasks_by_status", {}, "alice")).toBe(
        "Pending (1):\n  - [task-1] A (medium)\nCompleted (1):\n  - [task-2] B (high)"
      );
    });

    it("says so when there is nothing to group", async () => {
      expect(await run("group_tasks_by_priority", {}, "alice")).toBe("No tasks found.");
      expect(await run("group_tasks_by_status", {}, "alice")).toBe("No tasks found.");
      expect(await run("group_tasks_by_due_date", {}, "alice")).toBe("No tasks found.");
      expect(await run("group_tasks_by_date_created", {}, "alice")).toBe("No tasks found.");
    });

    it("groups every task, not just the first page", async () => {
      await store.create({ userId: "alice", name: "Oldest", priority: "high" });
      for (let i = 0; i < 150; i++) {
        await store.create({ userId: "alice", name: `Bulk ${i}`, priority: "low" });
      }

      const headers = (name: string) =>
        run(name, {}, "alice").then((text) =>
          String(text)
            .split("\n")
            .filter((line) => !line.startsWith("  "))
        );

      expect(await headers("group_tasks_by_priority")).toEqual(["HIGH priority (1):", "LOW priority (150):"]);
      expect(await headers("group_tasks_by_status")).toEqual(["Pending (151):"]);
    });

    it("groups by due day, earliest first, undated last", async () => {
      await run("add_task", { name: "A", due_date: "2026-10-25" }, "alice");
      await run("add_task", { name: "B", due_date: "2026-10-20" }, "alice");
      await run("add_task", { name: "C" }, "alice");
      await run("add_task", { name: "D", due_date: "2026-10-20T08:00:00Z" }, "alice");

      expect(await run("group_tasks_by_due_date", {}, "alice")).toBe(
        "Due 2026-10-20 (2):\n  - [task-4] D (pending)\n  - [task-2] B (pending)\n" +
          "Due 2026-10-25 (1):\n  - [task-1] A (pending)\n" +
          "No due date (1):\n  - [task-3] C (pending)"
      );
    });

    it("groups by creation day, most recent first", async () => {
      let clock = new Date("2026-10-17T10:00:00.000Z");
      const dated = createTestStore(() => clock);
      const runDated = createToolRunner(dated);

      await runDated("add_task", { name: "A" }, "alice");
      clock = NOW;
      await runDated("add_task", { name: "B" }, "alice");
      clock = new Date("2026-10-19T12:00:00.000Z");
      await runDated("add_task", { name: "C" }, "alice");
      await runDated("complete_task", { task_id: "task-1" }, "alice");

      expect(await runDated("group_tasks_by_date_created", {}, "alice")).toBe(
        "Created 2026-10-19 (2):\n  - [task-3] C (pending)\n  - [task-2] B (pending)\n" +
          "Created 2026-10-17 (1):\n  - [task-1] A (completed)"
      );
    });
  });

  describe("list_tasks_by_tag", () => {
    it("matches whole tags case-insensitively within the user's tasks", async () => {
      await run("add_task", { name: "A", tags: ["Work"] }, "alice");
      await run("add_task", { name: "B", tags: ["homework"] }, "alice");
      await run("add_task", { name: "C", tags: ["work", "urgent"] }, "alice");
      await run("add_task", { name: "D", tags: ["work"] }, "bob");

      expect(await run("list_tasks_by_tag", { tag: "work" }, "alice")).toBe(
        'Found 2 task(s) tagged "work":\n' +
          "- [task-3] C (pending)\n  Priority: medium | Tags: work, urgent\n" +
          "- [task-1] A (pending)\n  Priority: medium | Tags: Work"
      );
      expect(await run("list_tasks_by_tag", { tag: "garden" }, "alice")).toBe('No tasks tagged "garden".');
    });
  });

  describe("list_overdue_tasks", () => {
    it("lists open tasks past their due date", async () => {
      await run("add_task", { name: "Late", due_date: "2026-10-18" }, "alice");
      await run("add_task", { name: "Upcoming", due_date: "2026-10-25" }, "alice");
      await run("add_task", { name: "Done late", due_date: "2026-10-01" }, "alice");
      await run("complete_task", { task_id: "task-3" }, "alice");

      expect(await run("list_overdue_tasks", {}, "alice")).toBe(
        "1 overdue task(s):\n- [task-1] Late (pending)\n  Priority: medium | Due: 2026-10-18"
      );
      expect(await run("list_overdue_tasks", {}, "bob")).toBe("No overdue tasks.");
    });
  });
});

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileBackedTaskStore, InMemoryTaskStore } from "../src/services/task-store.js";
import type { NewTask } from "../src/types/task.js";

function newTask(overrides: Partial<NewTask> = {}): NewTask {
  return {
    name: "AI 追踪",
    userId: "user-1",
    keywords: ["AI"],
    filters: [],
    platforms: ["baidu"],
    reportMode: "daily",
    expandKeywords: false,
    status: "active",
    ...overrides,
  };
}

function steppingClock(): () => number {
  let now = Date.parse("2026-03-01T08:00:00.000Z");
  return () => {
    now += 60_000;
    return now;
  };
}

describe("InMemoryTaskStore", () => {
  test("creates tasks with generated ids and timestamps", async () => {
    const store = new InMemoryTaskStore({ nowFn: steppingClock() });
    const task = await store.createTask(newTask());

    expect(task.id).toMatch(/^task_[0-9a-f]{12}$/);
    expect(task.createdAt).toBe("2026-03-01T08:01:00.000Z");
    expect(task.updatedAt).toBe(task.createdAt);
  });

  test("lists a user's tasks newest first", async () => {
    const store = new InMemoryTaskStore({ nowFn: steppingClock() });
    const older = await store.createTask(newTask({ name: "旧" }));
    const newer = await store.createTask(newTask({ name: "新" }));
    await store.createTask(newTask({ userId: "user-2" }));

    expect((await store.listTasks("user-1")).map((task) => task.id)).toEqual([newer.id, older.id]);
  });

  test("updates fields and bumps updatedAt", async () => {
    const store = new InMemoryTaskStore({ nowFn: steppingClock() });
    const task = await store.createTask(newTask());
    const updated = await store.updateTask(task.id, { status: "paused" });

    expect(updated?.status).toBe("paused");
    expect(updated?.name).toBe("AI 追踪");
    expect(updated?.updatedAt).toBe("2026-03-01T08:02:00.000Z");
    expect(await store.updateTask("task_missing", { status: "paused" })).toBeUndefined();
  });

  test("keeps only the newest executions per task", async () => {
    const store = new InMemoryTaskStore({ executionRetention: 2, nowFn: steppingClock() });
    const task = await store.createTask(newTask());

    for (const matchedCount of [1, 2, 3]) {
      await store.recordExecution(task.id, { status: "success", matchedCount, durationMs: 5 });
    }

    const executions = await store.listExecutions(task.id);
    expect(executions.map((execution) => execution.id)).toEqual([3, 2]);
    expect(executions.map((execution) => execution.matchedCount)).toEqual([3, 2]);
  });

  test("deleting a task drops its executions", async () => {
    const store = new InMemoryTaskStore();
    const task = await store.createTask(newTask());
    await store.recordExecution(task.id, { status: "failed", matchedCount: 0, durationMs: 1, errorMessage: "x" });

    expect(await store.deleteTask(task.id)).toBe(true);
    expect(await store.deleteTask(task.id)).toBe(false);
    expect(await store.listExecutions(task.id)).toEqual([]);
  });
});

describe("FileBackedTaskStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "task-store-"));
    file = path.join(dir, "tasks.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("reloads tasks and continues execution ids", async () => {
    const first = new FileBackedTaskStore(file);
    await first.load();
    const task = await first.createTask(newTask());
    await first.recordExecution(task.id, { status: "success", matchedCount: 4, durationMs: 12 });

    const second = new FileBackedTaskStore(file);
    await second.load();
    expect((await second.getTask(task.id))?.name).toBe("AI 追踪");

    const next = await second.recordExecution(task.id, { status: "success", matchedCount: 1, durationMs: 3 });
    expect(next.id).toBe(2);
    expect((await second.listExecutions(task.id)).map((execution) => execution.id)).toEqual([2, 1]);
  });

  test("concurrent writes all land in the file", async () => {
    const store = new FileBackedTaskStore(file);
    await store.load();

    const outcomes = await Promise.allSettled(
      Array.from({ length: 20 }, (_, index) => store.createTask(newTask({ name: `任务 ${index}` }))),
    );
    expect(outcomes.filter((outcome) => outcome.status === "rejected")).toEqual([]);

    const reloaded = new FileBackedTaskStore(file);
    await reloaded.load();
    expect(await reloaded.listTasks("user-1")).toHaveLength(20);
  });
});

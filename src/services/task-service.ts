import { z } from "zod";
import { formatZodIssues, reportModeSchema } from "../domain/config-snapshot.js";
import { NotFoundError, ValidationError } from "../middleware/error-handler.js";
import type { RunResult } from "../types/pipeline.js";
import type { Task, TaskExecution } from "../types/task.js";
import { errorMessage, logger } from "../utils/logger.js";
import { platformListSchema, type SearchService } from "./search-service.js";
import type { TaskStore } from "./task-store.js";

const termList = z.array(z.string().trim().min(1));
const taskStatusSchema = z.enum(["active", "paused", "archived"]);

const newTaskSchema = z.object({
  name: z.string().trim().min(1),
  userId: z.string().trim().min(1),
  keywords: termList.min(1, "keywords must be a non-empty array"),
  filters: termList.default([]),
  platforms: platformListSchema,
  reportMode: reportModeSchema.default("current"),
  expandKeywords: z.boolean().default(true),
  status: taskStatusSchema.default("active"),
  description: z.string().optional(),
});

const taskUpdateSchema = z
  .object({
    name: z.string().trim().min(1),
    keywords: termList.min(1, "keywords must be a non-empty array"),
    filters: termList,
    platforms: platformListSchema,
    reportMode: reportModeSchema,
    expandKeywords: z.boolean(),
    status: taskStatusSchema,
    description: z.string(),
  })
  .partial()
  .strict();

const RECENT_EXECUTIONS = 5;

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(message, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export interface TaskDetail {
  task: Task;
  executions: TaskExecution[];
}

export interface TaskRunResult {
  execution: TaskExecution;
  result: RunResult;
}

export class TaskService {
  private readonly store: TaskStore;
  private readonly search: SearchService;

  constructor(store: TaskStore, search: SearchService) {
    this.store = store;
    this.search = search;
  }

  async createTask(input: unknown): Promise<Task> {
    const fields = parseOrThrow(newTaskSchema, input, "Invalid task");
    const task = await this.store.createTask(fields);
    logger.info("task_created", { taskId: task.id, userId: task.userId });
    return task;
  }

  async listTasks(userId: string | undefined): Promise<Task[]> {
    const owner = userId?.trim();
    if (!owner) {
      throw new ValidationError("userId is required");
    }
    return this.store.listTasks(owner);
  }

  async getTask(id: string): Promise<TaskDetail> {
    const task = await this.requireTask(id);
    const executions = await this.store.listExecutions(id, RECENT_EXECUTIONS);
    return { task, executions };
  }

  async updateTask(id: string, input: unknown): Promise<Task> {
    const fields = parseOrThrow(taskUpdateSchema, input, "Invalid task update");
    const updated = await this.store.updateTask(id, fields);
    if (!updated) {
      throw new NotFoundError(`Task not found: ${id}`);
    }
    return updated;
  }

  async deleteTask(id: string): Promise<void> {
    const deleted = await this.store.deleteTask(id);
    if (!deleted) {
      throw new NotFoundError(`Task not found: ${id}`);
    }
    logger.info("task_deleted", { taskId: id });
  }

  /**
   * Runs the task's search through the shared isolation path and appends an
   * execution record whether the run succeeds or fails.
   */
  async executeTask(id: string, signal?: AbortSignal): Promise<TaskRunResult> {
    const task = await this.requireTask(id);
    const startedAt = Date.now();

    let result: RunResult;
    try {
      result = await this.search.search(
        {
          keywords: task.keywords,
          filters: task.filters,
          platforms: task.platforms,
          reportMode: task.reportMode,
          expandKeywords: task.expandKeywords,
          generateReport: true,
        },
        { signal, label: task.id },
      );
    } catch (error) {
      await this.store.recordExecution(task.id, {
        status: "failed",
        matchedCount: 0,
        durationMs: Date.now() - startedAt,
        errorMessage: errorMessage(error),
      });
      logger.warn("task_execution_failed", { taskId: task.id, error: errorMessage(error) });
      throw error;
    }

    const execution = await this.store.recordExecution(task.id, {
      status: "success",
      matchedCount: result.stats.matchedRecords,
      durationMs: result.durationMs,
      reportPath: result.reportPath,
    });
    logger.info("task_executed", {
      taskId: task.id,
      executionId: execution.id,
      matchedCount: execution.matchedCount,
    });
    return { execution, result };
  }

  private async requireTask(id: string): Promise<Task> {
    const task = await this.store.getTask(id);
    if (!task) {
      throw new NotFoundError(`Task not found: ${id}`);
    }
    return task;
  }
}

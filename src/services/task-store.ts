import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env.js";
import type { ExecutionOutcome, NewTask, Task, TaskExecution, TaskUpdate } from "../types/task.js";

export interface TaskStore {
  load(): Promise<void>;
  createTask(input: NewTask): Promise<Task>;
  getTask(id: string): Promise<Task | undefined>;
  listTasks(userId: string): Promise<Task[]>;
  updateTask(id: string, fields: TaskUpdate): Promise<Task | undefined>;
  deleteTask(id: string): Promise<boolean>;
  /** Appends a record and prunes the task's oldest records beyond the retention cap. */
  recordExecution(taskId: string, outcome: ExecutionOutcome): Promise<TaskExecution>;
  /** Newest first. */
  listExecutions(taskId: string, limit?: number): Promise<TaskExecution[]>;
}

function generateTaskId(): string {
  return `task_${randomUUID().replaceAll("-", "").slice(0, 12)}`;
}

export class InMemoryTaskStore implements TaskStore {
  protected readonly tasks = new Map<string, Task>();
  protected readonly executions = new Map<string, TaskExecution[]>();
  protected nextExecutionId = 1;
  protected readonly executionRetention: number;
  protected readonly nowFn: () => number;

  constructor(options: { executionRetention?: number; nowFn?: () => number } = {}) {
    this.executionRetention = Math.max(1, options.executionRetention ?? env.EXECUTION_RETENTION);
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  async load(): Promise<void> {}

  protected async persist(): Promise<void> {}

  private nowIso(): string {
    return new Date(this.nowFn()).toISOString();
  }

  async createTask(input: NewTask): Promise<Task> {
    const now = this.nowIso();
    const task: Task = {
      ...input,
      id: generateTaskId(),
      createdAt: now,
      updatedAt: now,
    };
    this.tasks.set(task.id, task);
    await this.persist();
    return { ...task };
  }

  async getTask(id: string): Promise<Task | undefined> {
    const task = this.tasks.get(id);
    return task ? { ...task } : undefined;
  }

  async listTasks(userId: string): Promise<Task[]> {
    return Array.from(this.tasks.values())
      .filter((task) => task.userId === userId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((task) => ({ ...task }));
  }

  async updateTask(id: string, fields: TaskUpdate): Promise<Task | undefined> {
    const existing = this.tasks.get(id);
    if (!existing) return undefined;

    const updated: Task = {
      ...existing,
      ...fields,
      updatedAt: this.nowIso(),
    };
    this.tasks.set(id, updated);
    await this.persist();
    return { ...updated };
  }

  async deleteTask(id: string): Promise<boolean> {
    const deleted = this.tasks.delete(id);
    this.executions.delete(id);
    if (deleted) await this.persist();
    return deleted;
  }

  async recordExecution(taskId: string, outcome: ExecutionOutcome): Promise<TaskExecution> {
    const execution: TaskExecution = {
      ...outcome,
      id: this.nextExecutionId,
      taskId,
      executedAt: outcome.executedAt ?? this.nowIso(),
    };
    this.nextExecutionId += 1;

    const history = [...(this.executions.get(taskId) ?? []), execution];
    this.executions.set(taskId, history.slice(-this.executionRetention));
    await this.persist();
    return { ...execution };
  }

  async listExecutions(taskId: string, limit = 10): Promise<TaskExecution[]> {
    return [...(this.executions.get(taskId) ?? [])]
      .reverse()
      .slice(0, Math.max(1, limit))
      .map((execution) => ({ ...execution }));
  }
}

interface TaskFileShapeV1 {
  version: 1;
  updatedAt: string;
  nextExecutionId: number;
  tasks: Task[];
  executions: TaskExecution[];
}

export class FileBackedTaskStore extends InMemoryTaskStore {
  private readonly storePath: string;
  private readonly tmpPath: string;
  private writing: Promise<void> = Promise.resolve();

  constructor(storePath: string, options: { executionRetention?: number; nowFn?: () => number } = {}) {
    super(options);
    const absolute = path.isAbsolute(storePath) ? storePath : path.resolve(process.cwd(), storePath);
    this.storePath = absolute;
    this.tmpPath = `${absolute}.tmp`;
  }

  override async load(): Promise<void> {
    try {
      const raw = await fs.readFile(this.storePath, "utf8");
      const parsed = JSON.parse(raw) as Partial<TaskFileShapeV1>;
      for (const task of parsed.tasks ?? []) {
        if (!task?.id || !task.userId) continue;
        this.tasks.set(task.id, task);
      }
      for (const execution of parsed.executions ?? []) {
        if (!execution?.taskId) continue;
        const list = this.executions.get(execution.taskId) ?? [];
        list.push(execution);
        this.executions.set(execution.taskId, list);
      }
      const maxId = Math.max(0, ...(parsed.executions ?? []).map((execution) => execution.id));
      this.nextExecutionId = Math.max(parsed.nextExecutionId ?? 1, maxId + 1);
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") return;
      throw error;
    }
  }

  /** Writes are queued so concurrent mutations never race on the tmp file. */
  protected override persist(): Promise<void> {
    const next = this.writing.then(() => this.writeFile());
    // The caller sees the failure through `next`; the queue keeps going.
    this.writing = next.catch(() => undefined);
    return next;
  }

  private async writeFile(): Promise<void> {
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    const payload: TaskFileShapeV1 = {
      version: 1,
      updatedAt: new Date().toISOString(),
      nextExecutionId: this.nextExecutionId,
      tasks: Array.from(this.tasks.values()),
      executions: Array.from(this.executions.values()).flat(),
    };
    await fs.writeFile(this.tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.rename(this.tmpPath, this.storePath);
  }
}

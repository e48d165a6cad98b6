import type { ReportMode } from "./pipeline.js";

export type TaskStatus = "active" | "paused" | "archived";

export interface Task {
  id: string;
  name: string;
  userId: string;
  keywords: string[];
  filters: string[];
  platforms: string[];
  reportMode: ReportMode;
  expandKeywords: boolean;
  status: TaskStatus;
  description?: string;
  createdAt: string;
  updatedAt: string;
}

export type NewTask = Omit<Task, "id" | "createdAt" | "updatedAt">;

export type TaskUpdate = Partial<Omit<Task, "id" | "userId" | "createdAt" | "updatedAt">>;

export interface TaskExecution {
  id: number;
  taskId: string;
  reportPath?: string;
  matchedCount: number;
  durationMs: number;
  status: "success" | "failed";
  errorMessage?: string;
  executedAt: string;
}

export type ExecutionOutcome = Omit<TaskExecution, "id" | "taskId" | "executedAt"> & {
  executedAt?: string;
};

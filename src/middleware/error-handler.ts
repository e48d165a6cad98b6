import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { logger } from "../utils/logger.js";

export type FailureReason =
  | "invalid_request"
  | "not_found"
  | "config_write_failed"
  | "config_restore_failed"
  | "execution_cancelled"
  | "model_unavailable"
  | "model_failed"
  | "internal_error";

export class AppError extends Error {
  status: number;
  reason: FailureReason;

  constructor(message: string, status = 500, reason: FailureReason = "internal_error") {
    super(message);
    this.name = "AppError";
    this.status = status;
    this.reason = reason;
  }
}

/** Malformed run or task request; always raised before the execution lock is taken. */
export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400, "invalid_request");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "not_found");
    this.name = "NotFoundError";
  }
}

export type ConfigWriteStage = "backup" | "override";

export class ConfigWriteError extends AppError {
  readonly stage: ConfigWriteStage;

  constructor(stage: ConfigWriteStage, cause: unknown) {
    super(`Shared configuration ${stage} step failed`, 500, "config_write_failed");
    this.name = "ConfigWriteError";
    this.stage = stage;
    this.cause = cause;
  }
}

/**
 * The baseline could not be written back. Shared state is now inconsistent
 * for every later run, so this is never folded into the body's own failure.
 */
export class ConfigRestoreError extends AppError {
  readonly bodyError?: unknown;

  constructor(cause: unknown, bodyError?: unknown) {
    super("Failed to restore shared configuration", 500, "config_restore_failed");
    this.name = "ConfigRestoreError";
    this.cause = cause;
    this.bodyError = bodyError;
  }
}

export class ExecutionCancelledError extends AppError {
  constructor(message = "Execution cancelled before it started") {
    super(message, 499, "execution_cancelled");
    this.name = "ExecutionCancelledError";
  }
}

/** No chat model is configured for the assistant endpoints. */
export class ModelUnavailableError extends AppError {
  constructor() {
    super("No language model is configured", 503, "model_unavailable");
    this.name = "ModelUnavailableError";
  }
}

export class ModelFailedError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, "model_failed");
    this.name = "ModelFailedError";
    this.cause = cause;
  }
}

export class FetchError extends Error {
  readonly platform: string;

  constructor(platform: string, message: string, cause?: unknown) {
    super(message);
    this.name = "FetchError";
    this.platform = platform;
    this.cause = cause;
  }
}

export class HistoryCorruptError extends Error {
  readonly signature: string;

  constructor(signature: string, message: string) {
    super(message);
    this.name = "HistoryCorruptError";
    this.signature = signature;
  }
}

export function formatErrorResponse(error: unknown, c: Context): Response {
  const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");

  if (error instanceof AppError) {
    const log = error.status >= 500 ? logger.error : logger.warn;
    log("request_failed", {
      requestId,
      status: error.status,
      reason: error.reason,
      path: c.req.path,
      message: error.message,
    });
    return c.json(
      {
        code: error.status,
        message: error.message,
        reason: error.reason,
        ...(error instanceof ValidationError && error.issues.length > 0 ? { issues: error.issues } : {}),
      },
      error.status as ContentfulStatusCode,
    );
  }

  const message = error instanceof Error ? error.message : "Internal Server Error";

  logger.error("unhandled_error", {
    requestId,
    path: c.req.path,
    message,
  });

  return c.json(
    {
      code: 500,
      message: "Internal Server Error",
      reason: "internal_error" satisfies FailureReason,
    },
    500,
  );
}

import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { env } from "./config/env.js";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { createReportRouter } from "./routes/reports.js";
import { createV1Router } from "./routes/v1.js";
import type { ExecutionIsolationManager } from "./services/isolation-manager.js";
import { QueryAssistant } from "./services/query-assistant.js";
import { ReportWriter } from "./services/report-writer.js";
import type { SearchService } from "./services/search-service.js";
import type { TaskService } from "./services/task-service.js";
import { logger } from "./utils/logger.js";

export interface CreateAppOptions {
  searchService: SearchService;
  taskService: TaskService;
  isolation: ExecutionIsolationManager;
  reportWriter?: ReportWriter;
  /** Defaults to an assistant without a model, which answers 503. */
  assistant?: QueryAssistant;
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();
  const reportWriter = options.reportWriter ?? new ReportWriter();
  const assistant = options.assistant ?? new QueryAssistant(options.searchService);

  app.use("*", async (c, next) => {
    const requestId = c.req.header("x-request-id")?.trim() || randomUUID();
    c.header("x-request-id", requestId);
    const start = Date.now();
    await next();
    logger.info("request", {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });
  app.use(
    "*",
    cors({
      origin: env.CORS_ORIGIN,
      allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    }),
  );

  app.get("/healthz", (c) => {
    return c.json({
      code: 200,
      message: "ok",
      data: { status: "ok", lock: options.isolation.lockState() },
    });
  });

  app.route(
    "/api/v1",
    createV1Router({
      searchService: options.searchService,
      taskService: options.taskService,
      isolation: options.isolation,
      assistant,
    }),
  );
  app.route("/reports", createReportRouter(reportWriter));

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
        reason: "not_found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}

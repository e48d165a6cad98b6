import { Hono } from "hono";
import { PLATFORM_DEFINITIONS } from "../domain/platforms.js";
import type { ExecutionIsolationManager } from "../services/isolation-manager.js";
import type { QueryAssistant } from "../services/query-assistant.js";
import type { SearchService } from "../services/search-service.js";
import type { TaskService } from "../services/task-service.js";
import { readJsonBody } from "./body.js";
import { createTaskRouter } from "./tasks.js";

interface V1RouterOptions {
  searchService: SearchService;
  taskService: TaskService;
  isolation: ExecutionIsolationManager;
  assistant: QueryAssistant;
}

export function createV1Router(options: V1RouterOptions): Hono {
  const app = new Hono();

  app.get("/platforms", (c) => {
    return c.json({
      code: 200,
      message: "ok",
      data: PLATFORM_DEFINITIONS,
    });
  });

  app.get("/config", async (c) => {
    const config = await options.isolation.currentBaseline();
    return c.json({ code: 200, message: "ok", data: config }, 200);
  });

  app.put("/config", async (c) => {
    const body = await readJsonBody(c);
    const config = await options.isolation.replaceBaseline(body, { signal: c.req.raw.signal });
    return c.json({ code: 200, message: "ok", data: config }, 200);
  });

  app.post("/search", async (c) => {
    const body = await readJsonBody(c);
    const result = await options.searchService.search(body, { signal: c.req.raw.signal });
    return c.json({ code: 200, message: "ok", data: result }, 200);
  });

  app.post("/suggest", async (c) => {
    const body = await readJsonBody(c);
    const suggestion = await options.assistant.suggest(body);
    return c.json({ code: 200, message: "ok", data: suggestion }, 200);
  });

  app.post("/query/smart", async (c) => {
    const body = await readJsonBody(c);
    const outcome = await options.assistant.smartQuery(body, { signal: c.req.raw.signal });
    return c.json({ code: 200, message: "ok", data: outcome }, 200);
  });

  app.route("/tasks", createTaskRouter(options.taskService));

  return app;
}

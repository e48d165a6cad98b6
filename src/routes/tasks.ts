import { Hono } from "hono";
import type { TaskService } from "../services/task-service.js";
import { readJsonBody } from "./body.js";

export function createTaskRouter(service: TaskService): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    const tasks = await service.listTasks(c.req.query("userId"));
    return c.json({ code: 200, message: "ok", data: tasks }, 200);
  });

  app.post("/", async (c) => {
    const task = await service.createTask(await readJsonBody(c));
    return c.json({ code: 201, message: "created", data: task }, 201);
  });

  app.get("/:id", async (c) => {
    const detail = await service.getTask(c.req.param("id"));
    return c.json({ code: 200, message: "ok", data: detail }, 200);
  });

  app.patch("/:id", async (c) => {
    const task = await service.updateTask(c.req.param("id"), await readJsonBody(c));
    return c.json({ code: 200, message: "ok", data: task }, 200);
  });

  app.delete("/:id", async (c) => {
    await service.deleteTask(c.req.param("id"));
    return c.json({ code: 200, message: "deleted" }, 200);
  });

  app.post("/:id/execute", async (c) => {
    const outcome = await service.executeTask(c.req.param("id"), c.req.raw.signal);
    return c.json({ code: 200, message: "ok", data: outcome }, 200);
  });

  return app;
}

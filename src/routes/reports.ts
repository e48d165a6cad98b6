import { Hono } from "hono";
import { NotFoundError } from "../middleware/error-handler.js";
import type { ReportWriter } from "../services/report-writer.js";

export function createReportRouter(writer: ReportWriter): Hono {
  const app = new Hono();

  app.get("/:day/:file", async (c) => {
    const xml = await writer.read(c.req.param("day"), c.req.param("file"));
    if (xml === undefined) {
      throw new NotFoundError("Report not found");
    }
    c.header("content-type", "application/xml; charset=utf-8");
    return c.body(xml, 200);
  });

  return app;
}

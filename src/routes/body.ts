import type { Context } from "hono";
import { ValidationError } from "../middleware/error-handler.js";

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}

import { z } from "zod";
import type { ConfigSnapshot } from "../types/pipeline.js";

const termList = z.array(z.string()).default([]);

export const reportModeSchema = z.enum(["daily", "current", "incremental"]);

export const keywordGroupSchema = z.object({
  label: z.string().trim().min(1),
  terms: termList,
  expansions: termList,
  expand: z.boolean().default(false),
});

export const configSnapshotSchema = z.object({
  groups: z.array(keywordGroupSchema).default([]),
  filters: termList,
  platforms: z.array(z.string().trim().min(1)).default([]),
  mode: reportModeSchema.default("current"),
});

export function emptySnapshot(): ConfigSnapshot {
  return { groups: [], filters: [], platforms: [], mode: "current" };
}

/** Fills every unset field so the result can fully replace the live snapshot. */
export function parseConfigSnapshot(input: unknown): ConfigSnapshot {
  return configSnapshotSchema.parse(input);
}

export function cloneSnapshot(snapshot: ConfigSnapshot): ConfigSnapshot {
  return {
    groups: snapshot.groups.map((group) => ({
      label: group.label,
      terms: [...group.terms],
      expansions: [...group.expansions],
      expand: group.expand,
    })),
    filters: [...snapshot.filters],
    platforms: [...snapshot.platforms],
    mode: snapshot.mode,
  };
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

import { z } from "zod";
import { formatZodIssues, reportModeSchema } from "../domain/config-snapshot.js";
import { isSupportedPlatform, listPlatformIds, type PlatformId } from "../domain/platforms.js";
import { ValidationError } from "../middleware/error-handler.js";
import type { ConfigSnapshot, KeywordGroup, RunResult } from "../types/pipeline.js";
import { errorMessage, logger } from "../utils/logger.js";
import type { FetchAdapter } from "./fetch-adapter.js";
import type { ExecutionIsolationManager } from "./isolation-manager.js";
import type { KeywordExpander } from "./keyword-expander.js";
import { runPipeline, type PipelineDeps } from "./pipeline.js";
import type { ReportWriter } from "./report-writer.js";
import type { RunHistoryStore } from "./run-history.js";

const keywordInputSchema = z.union([
  z.string().trim().min(1),
  z.object({
    label: z.string().trim().min(1),
    terms: z
      .array(z.string().trim())
      .default([])
      .transform((terms) => terms.filter(Boolean)),
    expansions: z.array(z.string()).default([]),
  }),
]);

export const platformListSchema = z
  .array(z.string().trim())
  .default([])
  .transform((values, ctx): PlatformId[] => {
    const supported: PlatformId[] = [];
    for (const value of values) {
      if (!isSupportedPlatform(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unsupported platform: ${value}`,
        });
        continue;
      }
      if (!supported.includes(value)) supported.push(value);
    }
    return supported;
  });

export const searchRequestSchema = z.object({
  keywords: z.array(keywordInputSchema).min(1, "keywords must be a non-empty array"),
  filters: z.array(z.string()).default([]),
  platforms: platformListSchema,
  reportMode: reportModeSchema.default("current"),
  expandKeywords: z.boolean().default(true),
  generateReport: z.boolean().default(false),
});

export type SearchRequest = z.input<typeof searchRequestSchema>;

type ParsedSearchRequest = z.output<typeof searchRequestSchema>;

export interface SearchOptions {
  signal?: AbortSignal;
  /** Tag carried into logs, such as a task id. */
  label?: string;
}

interface SearchServiceOptions {
  isolation: ExecutionIsolationManager;
  fetchAdapter: FetchAdapter;
  historyStore: RunHistoryStore;
  expander: KeywordExpander;
  reportWriter?: ReportWriter;
  pipeline?: Omit<PipelineDeps, "fetchAdapter" | "historyStore">;
}

export function parseSearchRequest(input: unknown): ParsedSearchRequest {
  const parsed = searchRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid search request", formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export class SearchService {
  private readonly isolation: ExecutionIsolationManager;
  private readonly fetchAdapter: FetchAdapter;
  private readonly historyStore: RunHistoryStore;
  private readonly expander: KeywordExpander;
  private readonly reportWriter?: ReportWriter;
  private readonly pipeline: Omit<PipelineDeps, "fetchAdapter" | "historyStore">;

  constructor(options: SearchServiceOptions) {
    this.isolation = options.isolation;
    this.fetchAdapter = options.fetchAdapter;
    this.historyStore = options.historyStore;
    this.expander = options.expander;
    this.reportWriter = options.reportWriter;
    this.pipeline = options.pipeline ?? {};
  }

  /** Validation and keyword expansion happen before the execution lock is requested. */
  async search(input: unknown, options: SearchOptions = {}): Promise<RunResult> {
    const request = parseSearchRequest(input);
    const override = await this.buildOverride(request);

    logger.info("search_started", {
      label: options.label,
      groups: override.groups.map((group) => group.label),
      filters: override.filters.length,
      platforms: override.platforms,
      mode: override.mode,
    });

    const result = await this.isolation.runIsolated(
      override,
      ({ config, signal }) =>
        runPipeline(
          config,
          { ...this.pipeline, fetchAdapter: this.fetchAdapter, historyStore: this.historyStore },
          signal,
        ),
      { signal: options.signal, label: options.label },
    );

    if (request.generateReport && this.reportWriter) {
      try {
        result.reportPath = await this.reportWriter.write(result);
      } catch (error) {
        logger.warn("report_write_failed", {
          label: options.label,
          signature: result.signature,
          error: errorMessage(error),
        });
      }
    }

    logger.info("search_finished", {
      label: options.label,
      signature: result.signature,
      mode: result.mode,
      matchedRecords: result.stats.matchedRecords,
      failedPlatforms: result.stats.failedPlatforms,
      degraded: result.stats.degraded,
      durationMs: result.durationMs,
    });
    return result;
  }

  private async buildOverride(request: ParsedSearchRequest): Promise<ConfigSnapshot> {
    const groups: KeywordGroup[] = request.keywords.map((keyword) =>
      typeof keyword === "string"
        ? { label: keyword, terms: [keyword], expansions: [], expand: request.expandKeywords }
        : {
            label: keyword.label,
            terms: keyword.terms.length > 0 ? keyword.terms : [keyword.label],
            expansions: keyword.expansions,
            expand: request.expandKeywords,
          },
    );

    if (request.expandKeywords) {
      const expansions = await this.expander.expand(groups.map((group) => group.label));
      for (const group of groups) {
        const extra = expansions.get(group.label) ?? [];
        group.expansions = Array.from(new Set([...group.expansions, ...extra]));
      }
    }

    return {
      groups,
      filters: request.filters.map((filter) => filter.trim()).filter(Boolean),
      platforms: request.platforms.length > 0 ? request.platforms : listPlatformIds(),
      mode: request.reportMode,
    };
  }
}

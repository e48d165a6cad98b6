import { z } from "zod";
import { formatZodIssues, reportModeSchema } from "../domain/config-snapshot.js";
import { ModelFailedError, ModelUnavailableError, ValidationError } from "../middleware/error-handler.js";
import type { RunResult } from "../types/pipeline.js";
import { errorMessage, logger } from "../utils/logger.js";
import { cleanTerms, parseModelJson, type ChatClient } from "./llm-client.js";
import { platformListSchema, type SearchOptions, type SearchService } from "./search-service.js";

const MAX_TERMS = 10;

const SUGGEST_PROMPT = `你是一个热点监控关键词助手。
用户会给出一个主题词，请给出适合在热榜标题中做子串匹配的扩展词。

严格返回 JSON，不要代码块标记：
{"terms": ["苹果", "Apple", "iPhone", "库克"]}

规则：包含原始主题词；补充中英文品牌名、核心产品、关联人物；最多 10 个。`;

const EXTRACT_PROMPT = `你是一个热点搜索意图解析器。
用户会用自然语言描述想关注的内容，请从中提取关键词。

严格返回 JSON，不要代码块标记：
{"display_keywords": ["苹果"], "search_keywords": ["苹果", "Apple", "iPhone"], "confidence": 0.9}

规则：display_keywords 是描述中的核心实体；search_keywords 在其基础上扩展中英文名称、产品、关联人物，最多 10 个；描述模糊时降低 confidence（0 到 1）。`;

const suggestRequestSchema = z.object({
  keyword: z.string().trim().min(1, "keyword is required"),
});

const smartQueryRequestSchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  platforms: platformListSchema,
  reportMode: reportModeSchema.default("current"),
});

const suggestionPayloadSchema = z.object({
  terms: z.array(z.string()).default([]),
});

const extractionPayloadSchema = z.object({
  display_keywords: z.array(z.string()).default([]),
  search_keywords: z.array(z.string()).optional(),
  confidence: z.number().min(0).max(1).default(0),
});

export interface Suggestion {
  keyword: string;
  terms: string[];
}

export interface SmartQueryResult {
  query: string;
  /** False when nothing searchable could be extracted; `result` is then absent. */
  matched: boolean;
  extractedKeywords: string[];
  searchKeywords: string[];
  confidence: number;
  result?: RunResult;
  durationMs: number;
}

function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(message, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

/** Model-backed helpers that sit in front of the regular search path. */
export class QueryAssistant {
  private readonly search: SearchService;
  private readonly client?: ChatClient;

  constructor(search: SearchService, client?: ChatClient) {
    this.search = search;
    this.client = client;
  }

  async suggest(input: unknown): Promise<Suggestion> {
    const { keyword } = parseRequest(suggestRequestSchema, input, "Invalid suggestion request");
    const payload = await this.ask(SUGGEST_PROMPT, `主题词：${keyword}`, suggestionPayloadSchema);
    const terms = cleanTerms([keyword, ...payload.terms], MAX_TERMS);

    logger.info("suggestion_ok", { keyword, terms: terms.length });
    return { keyword, terms };
  }

  /**
   * Extracts keywords from a free-form description and runs them as a single
   * group through the isolated search path.
   */
  async smartQuery(input: unknown, options: SearchOptions = {}): Promise<SmartQueryResult> {
    const request = parseRequest(smartQueryRequestSchema, input, "Invalid smart query");
    const startedAt = Date.now();

    const extraction = await this.ask(EXTRACT_PROMPT, request.query, extractionPayloadSchema);
    const extractedKeywords = cleanTerms(extraction.display_keywords, MAX_TERMS);
    const searchKeywords = cleanTerms(extraction.search_keywords ?? extraction.display_keywords, MAX_TERMS);

    const summary = {
      query: request.query,
      extractedKeywords,
      searchKeywords,
      confidence: extraction.confidence,
    };

    const label = extractedKeywords.join("、") || searchKeywords[0];
    if (!label) {
      logger.info("smart_query_empty", { query: request.query, confidence: extraction.confidence });
      return { ...summary, matched: false, durationMs: Date.now() - startedAt };
    }

    const result = await this.search.search(
      {
        keywords: [{ label, terms: searchKeywords }],
        platforms: request.platforms,
        reportMode: request.reportMode,
        expandKeywords: false,
      },
      options,
    );
    return { ...summary, matched: true, result, durationMs: Date.now() - startedAt };
  }

  private async ask<S extends z.ZodTypeAny>(
    systemPrompt: string,
    userContent: string,
    schema: S,
  ): Promise<z.output<S>> {
    if (!this.client) {
      throw new ModelUnavailableError();
    }

    let content: string;
    try {
      content = await this.client.complete(systemPrompt, userContent);
    } catch (error) {
      logger.warn("model_request_failed", { error: errorMessage(error) });
      throw new ModelFailedError("Language model request failed", error);
    }

    try {
      return parseModelJson(content, schema);
    } catch (error) {
      logger.warn("model_reply_invalid", { error: errorMessage(error) });
      throw new ModelFailedError("Language model returned an unusable reply", error);
    }
  }
}

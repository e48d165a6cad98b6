import { z } from "zod";
import { errorMessage, logger } from "../utils/logger.js";
import { cleanTerms, parseModelJson, type ChatClient } from "./llm-client.js";

/** Maps each input keyword to its expansion terms; keywords without expansions are absent. */
export type ExpansionMap = Map<string, string[]>;

export interface KeywordExpander {
  expand(keywords: readonly string[]): Promise<ExpansionMap>;
}

export class NoopKeywordExpander implements KeywordExpander {
  async expand(_keywords: readonly string[]): Promise<ExpansionMap> {
    return new Map();
  }
}

const EXPAND_PROMPT = `你是一个专业的关键词扩展引擎。
用户会输入一个或多个主题词，请为每个主题扩展相关的搜索关键词。

严格返回 JSON，不要代码块标记：
{"expanded": [{"original": "苹果", "keywords": ["苹果", "Apple", "iPhone", "库克"]}]}

规则：保留原始关键词；补充英文名称、核心产品、关联人物与技术；每个主题最多 10 个关键词。`;

const MAX_TERMS_PER_KEYWORD = 10;

const expansionPayloadSchema = z.object({
  expanded: z
    .array(
      z.object({
        original: z.string(),
        keywords: z.array(z.string()).default([]),
      }),
    )
    .default([]),
});

/**
 * Asks a chat model for synonyms. Any failure degrades to "no expansion" so a
 * run never depends on the model.
 */
export class ChatKeywordExpander implements KeywordExpander {
  private readonly client: ChatClient;

  constructor(client: ChatClient) {
    this.client = client;
  }

  async expand(keywords: readonly string[]): Promise<ExpansionMap> {
    if (keywords.length === 0) return new Map();

    try {
      const content = await this.client.complete(EXPAND_PROMPT, `主题词：${JSON.stringify(keywords)}`);
      const payload = parseModelJson(content, expansionPayloadSchema);

      const wanted = new Set(keywords);
      const expansions: ExpansionMap = new Map();
      for (const item of payload.expanded) {
        if (!wanted.has(item.original)) continue;
        const terms = cleanTerms(
          item.keywords.filter((term) => term.trim() !== item.original),
          MAX_TERMS_PER_KEYWORD,
        );
        if (terms.length > 0) expansions.set(item.original, terms);
      }

      logger.info("keyword_expansion_ok", {
        keywords: keywords.length,
        expanded: expansions.size,
      });
      return expansions;
    } catch (error) {
      logger.warn("keyword_expansion_failed", {
        keywords,
        error: errorMessage(error),
      });
      return new Map();
    }
  }
}

export function createKeywordExpander(client: ChatClient | undefined): KeywordExpander {
  return client ? new ChatKeywordExpander(client) : new NoopKeywordExpander();
}

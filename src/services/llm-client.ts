import { z } from "zod";
import { env } from "../config/env.js";

/** One system + user exchange with a chat model; resolves to the reply text. */
export interface ChatClient {
  complete(systemPrompt: string, userContent: string): Promise<string>;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      }),
    )
    .min(1),
});

interface OpenAiChatClientOptions {
  apiBase?: string;
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

function stripCodeFence(content: string): string {
  return content.replace(/```(?:json)?/g, "").trim();
}

/** Talks to any OpenAI-compatible `/chat/completions` endpoint. */
export class OpenAiChatClient implements ChatClient {
  private readonly apiBase: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAiChatClientOptions = {}) {
    this.apiBase = (options.apiBase ?? env.EXPANDER_API_BASE).replace(/\/+$/, "");
    this.apiKey = options.apiKey ?? env.EXPANDER_API_KEY;
    this.model = (options.model ?? env.EXPANDER_MODEL).replace(/^openai\//, "");
    this.timeoutMs = options.timeoutMs ?? env.EXPANDER_TIMEOUT_MS;
  }

  async complete(systemPrompt: string, userContent: string): Promise<string> {
    const response = await fetch(`${this.apiBase}/chat/completions`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        temperature: 0.3,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userContent },
        ],
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Chat completion failed: ${response.status}`);
    }

    const completion = chatCompletionSchema.parse(await response.json());
    return stripCodeFence(completion.choices[0]?.message.content ?? "");
  }
}

/** Parses a model reply as JSON and validates it; throws on either failure. */
export function parseModelJson<S extends z.ZodTypeAny>(content: string, schema: S): z.output<S> {
  const parsed: unknown = JSON.parse(content);
  return schema.parse(parsed);
}

/** Trims, drops blanks and duplicates, and caps the list. */
export function cleanTerms(terms: readonly string[], limit: number): string[] {
  return Array.from(new Set(terms.map((term) => term.trim()).filter(Boolean))).slice(0, limit);
}

export function createChatClient(): ChatClient | undefined {
  return env.EXPANDER_API_KEY ? new OpenAiChatClient() : undefined;
}

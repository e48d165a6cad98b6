import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(6688),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  CORS_ORIGIN: z.string().default("*"),
  CONFIG_PATH: z.string().default("data/config.json"),
  HISTORY_PATH: z.string().default("data/run-history.json"),
  TASKS_PATH: z.string().default("data/tasks.json"),
  REPORT_DIR: z.string().default("output/reports"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(500).default(8000),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  FETCH_ROUNDS: z.coerce.number().int().min(1).max(24).default(1),
  ROUND_INTERVAL_MS: z.coerce.number().int().min(0).default(0),
  HISTORY_RETENTION_RUNS: z.coerce.number().int().min(1).default(10),
  EXECUTION_RETENTION: z.coerce.number().int().min(1).default(20),
  USE_REDIS: booleanFlag,
  REDIS_URL: z.string().default(""),
  REDIS_PREFIX: z.string().default("hotlist-radar"),
  EXPANDER_API_BASE: z.string().default("https://api.openai.com/v1"),
  EXPANDER_API_KEY: z.string().default(""),
  EXPANDER_MODEL: z.string().default("gpt-4o-mini"),
  EXPANDER_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60000),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

import fs from "node:fs/promises";
import path from "node:path";
import { Redis } from "ioredis";
import { z } from "zod";
import { env } from "../config/env.js";
import { HistoryCorruptError } from "../middleware/error-handler.js";
import { errorMessage, logger } from "../utils/logger.js";

export interface SeenIdentity {
  firstSeenAt: string;
  lastSeenAt: string;
}

export interface RunHistoryEntry {
  signature: string;
  /** Timestamps of the retained runs, oldest first. */
  runs: string[];
  identities: Record<string, SeenIdentity>;
}

export interface RunHistoryStore {
  /** Throws `HistoryCorruptError` when the stored entry cannot be read. */
  load(signature: string): Promise<RunHistoryEntry | undefined>;
  merge(signature: string, identities: readonly string[], runAt: string): Promise<RunHistoryEntry>;
}

const runHistoryEntrySchema = z.object({
  signature: z.string().min(1),
  runs: z.array(z.string()),
  identities: z.record(
    z.object({
      firstSeenAt: z.string(),
      lastSeenAt: z.string(),
    }),
  ),
});

/**
 * Union of the previous entry and this run's identities. The run log keeps the
 * newest `retentionRuns` runs; identities last seen before the oldest retained
 * run fall out with it.
 */
export function mergeRunHistory(
  previous: RunHistoryEntry | undefined,
  signature: string,
  identities: readonly string[],
  runAt: string,
  retentionRuns: number,
): RunHistoryEntry {
  const runs = [...(previous?.runs ?? []), runAt].slice(-Math.max(1, retentionRuns));
  const merged: Record<string, SeenIdentity> = { ...(previous?.identities ?? {}) };

  for (const identity of identities) {
    const existing = merged[identity];
    merged[identity] = {
      firstSeenAt: existing?.firstSeenAt ?? runAt,
      lastSeenAt: runAt,
    };
  }

  const cutoff = Date.parse(runs[0] ?? runAt);
  for (const [identity, seen] of Object.entries(merged)) {
    if (Date.parse(seen.lastSeenAt) < cutoff) {
      delete merged[identity];
    }
  }

  return { signature, runs, identities: merged };
}

function parseEntry(signature: string, input: unknown): RunHistoryEntry {
  const parsed = runHistoryEntrySchema.safeParse(input);
  if (!parsed.success) {
    throw new HistoryCorruptError(signature, `Run history for ${signature} is malformed`);
  }
  return parsed.data;
}

export class InMemoryRunHistoryStore implements RunHistoryStore {
  protected readonly entries = new Map<string, RunHistoryEntry>();
  protected readonly retentionRuns: number;

  constructor(retentionRuns = env.HISTORY_RETENTION_RUNS) {
    this.retentionRuns = retentionRuns;
  }

  async load(signature: string): Promise<RunHistoryEntry | undefined> {
    return this.entries.get(signature);
  }

  async merge(signature: string, identities: readonly string[], runAt: string): Promise<RunHistoryEntry> {
    const next = mergeRunHistory(this.entries.get(signature), signature, identities, runAt, this.retentionRuns);
    this.entries.set(signature, next);
    return next;
  }
}

const SIGNATURE_KEY = /"([0-9a-f]{16})"\s*:/g;

interface HistoryFileShapeV1 {
  version: 1;
  updatedAt: string;
  entries: Record<string, unknown>;
}

export class FileBackedRunHistoryStore implements RunHistoryStore {
  private readonly historyPath: string;
  private readonly tmpPath: string;
  private readonly retentionRuns: number;

  constructor(historyPath: string, retentionRuns = env.HISTORY_RETENTION_RUNS) {
    const absolute = path.isAbsolute(historyPath) ? historyPath : path.resolve(process.cwd(), historyPath);
    this.historyPath = absolute;
    this.tmpPath = `${absolute}.tmp`;
    this.retentionRuns = retentionRuns;
  }

  private async readFile(): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.historyPath, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") return {};
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new HistoryCorruptError("*", `Run history file ${this.historyPath} is not valid JSON`);
    }
    const entries = z.object({ entries: z.record(z.unknown()) }).safeParse(parsed);
    if (!entries.success) {
      throw new HistoryCorruptError("*", `Run history file ${this.historyPath} has no entries map`);
    }
    return entries.data.entries;
  }

  /**
   * Moves an unreadable file aside before it is replaced and lists the
   * signatures it still names, so the lost entries can be recovered by hand.
   */
  private async preserveCorruptFile(): Promise<{ path: string; signatures: string[] }> {
    const raw = await fs.readFile(this.historyPath, "utf8");
    const signatures = Array.from(raw.matchAll(SIGNATURE_KEY), (match) => match[1] ?? "").filter(Boolean);
    const preservedPath = `${this.historyPath}.corrupt-${Date.now()}`;
    await fs.rename(this.historyPath, preservedPath);
    return { path: preservedPath, signatures: Array.from(new Set(signatures)) };
  }

  async load(signature: string): Promise<RunHistoryEntry | undefined> {
    const entries = await this.readFile();
    const entry = entries[signature];
    return entry === undefined ? undefined : parseEntry(signature, entry);
  }

  async merge(signature: string, identities: readonly string[], runAt: string): Promise<RunHistoryEntry> {
    let entries: Record<string, unknown>;
    try {
      entries = await this.readFile();
    } catch (error) {
      if (!(error instanceof HistoryCorruptError)) throw error;
      const preserved = await this.preserveCorruptFile();
      logger.warn("run_history_reset", {
        path: this.historyPath,
        preservedAs: preserved.path,
        lostSignatures: preserved.signatures,
        error: error.message,
      });
      entries = {};
    }

    let previous: RunHistoryEntry | undefined;
    try {
      previous = entries[signature] === undefined ? undefined : parseEntry(signature, entries[signature]);
    } catch (error) {
      if (!(error instanceof HistoryCorruptError)) throw error;
      logger.warn("run_history_reset", { signature, error: error.message });
    }

    const next = mergeRunHistory(previous, signature, identities, runAt, this.retentionRuns);
    entries[signature] = next;

    await fs.mkdir(path.dirname(this.historyPath), { recursive: true });
    const payload: HistoryFileShapeV1 = {
      version: 1,
      updatedAt: new Date().toISOString(),
      entries,
    };
    await fs.writeFile(this.tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.rename(this.tmpPath, this.historyPath);
    return next;
  }
}

/** The subset of the ioredis client the history store talks to. */
export interface RedisKeyValue {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export class RedisRunHistoryStore implements RunHistoryStore {
  private readonly redis: RedisKeyValue;
  private readonly prefix: string;
  private readonly retentionRuns: number;

  constructor(redis: RedisKeyValue, options: { prefix?: string; retentionRuns?: number } = {}) {
    this.redis = redis;
    this.prefix = options.prefix ?? env.REDIS_PREFIX;
    this.retentionRuns = options.retentionRuns ?? env.HISTORY_RETENTION_RUNS;
  }

  private key(signature: string): string {
    return `${this.prefix}:history:${signature}`;
  }

  async load(signature: string): Promise<RunHistoryEntry | undefined> {
    const raw = await this.redis.get(this.key(signature));
    if (raw === null) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new HistoryCorruptError(signature, `Run history for ${signature} is not valid JSON`);
    }
    return parseEntry(signature, parsed);
  }

  async merge(signature: string, identities: readonly string[], runAt: string): Promise<RunHistoryEntry> {
    let previous: RunHistoryEntry | undefined;
    try {
      previous = await this.load(signature);
    } catch (error) {
      if (!(error instanceof HistoryCorruptError)) throw error;
      logger.warn("run_history_reset", { signature, error: error.message });
    }
    const next = mergeRunHistory(previous, signature, identities, runAt, this.retentionRuns);
    await this.redis.set(this.key(signature), JSON.stringify(next));
    return next;
  }
}

export function createRunHistoryStore(): RunHistoryStore {
  if (env.USE_REDIS && env.REDIS_URL) {
    const redis = new Redis(env.REDIS_URL, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
    });
    redis.connect().catch((error: unknown) => {
      logger.warn("redis_connect_failed", { message: errorMessage(error) });
    });
    return new RedisRunHistoryStore(redis);
  }
  return new FileBackedRunHistoryStore(env.HISTORY_PATH);
}

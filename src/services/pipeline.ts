import { env } from "../config/env.js";
import { aggregateBatches } from "../core/aggregator.js";
import { matchItems } from "../core/matcher.js";
import { reduceRecords } from "../core/reducer.js";
import { computeRunSignature } from "../core/signature.js";
import { ExecutionCancelledError, FetchError } from "../middleware/error-handler.js";
import type { ConfigSnapshot, MatchedBatch, RawItem, RunResult } from "../types/pipeline.js";
import { errorMessage, logger } from "../utils/logger.js";
import type { FetchAdapter } from "./fetch-adapter.js";
import type { RunHistoryStore } from "./run-history.js";

export interface PipelineDeps {
  fetchAdapter: FetchAdapter;
  historyStore: RunHistoryStore;
  rounds?: number;
  roundIntervalMs?: number;
  concurrency?: number;
  fetchTimeoutMs?: number;
  nowFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

type PlatformOutcome =
  | { platform: string; ok: true; items: RawItem[] }
  | { platform: string; ok: false; error: string };

async function runWithConcurrency<T, R>(
  inputs: readonly T[],
  limit: number,
  worker: (input: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(inputs.length);
  let cursor = 0;

  const lanes = Array.from({ length: Math.min(Math.max(1, limit), inputs.length) }, async () => {
    while (cursor < inputs.length) {
      const index = cursor;
      cursor += 1;
      const input = inputs[index];
      if (input === undefined) continue;
      results[index] = await worker(input);
    }
  });

  await Promise.all(lanes);
  return results;
}

async function fetchPlatform(
  adapter: FetchAdapter,
  platform: string,
  round: number,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<PlatformOutcome> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new FetchError(platform, `Fetching ${platform} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    const items = await Promise.race([adapter.fetch(platform, round, controller.signal), timeout]);
    return { platform, ok: true, items };
  } catch (error) {
    return { platform, ok: false, error: errorMessage(error) };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * fetch rounds → match → aggregate → reduce → history merge, for one config
 * passed by value. A failing platform contributes no items and never aborts
 * the run.
 */
export async function runPipeline(
  config: ConfigSnapshot,
  deps: PipelineDeps,
  signal?: AbortSignal,
): Promise<RunResult> {
  const nowFn = deps.nowFn ?? (() => Date.now());
  const sleep = deps.sleep ?? defaultSleep;
  const rounds = Math.max(1, deps.rounds ?? env.FETCH_ROUNDS);
  const roundIntervalMs = deps.roundIntervalMs ?? env.ROUND_INTERVAL_MS;
  const concurrency = deps.concurrency ?? env.FETCH_CONCURRENCY;
  const timeoutMs = deps.fetchTimeoutMs ?? env.FETCH_TIMEOUT_MS;

  const startedAt = nowFn();
  const signature = computeRunSignature(config);
  const batches: MatchedBatch[] = [];
  const succeeded = new Set<string>();
  const failed = new Set<string>();
  let totalRawItems = 0;

  for (let round = 1; round <= rounds; round += 1) {
    if (signal?.aborted) {
      throw new ExecutionCancelledError(`Run cancelled before round ${round}`);
    }

    const start = new Date(nowFn()).toISOString();
    const outcomes = await runWithConcurrency(config.platforms, concurrency, (platform) =>
      fetchPlatform(deps.fetchAdapter, platform, round, timeoutMs, signal),
    );
    const end = new Date(nowFn()).toISOString();

    const roundItems: RawItem[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        succeeded.add(outcome.platform);
        roundItems.push(...outcome.items);
        continue;
      }
      failed.add(outcome.platform);
      logger.warn("platform_fetch_failed", {
        signature,
        platform: outcome.platform,
        round,
        error: outcome.error,
      });
    }

    totalRawItems += roundItems.length;
    batches.push({
      round,
      window: { start, end },
      items: matchItems(roundItems, config.groups, config.filters),
    });

    if (round < rounds && roundIntervalMs > 0) {
      await sleep(roundIntervalMs);
    }
  }

  // Fetches cut short by an abort count as failures; a partial run must not reach history.
  if (signal?.aborted) {
    throw new ExecutionCancelledError("Run cancelled during fetching");
  }

  const aggregated = aggregateBatches(batches);

  let seen: ReadonlySet<string> | null = new Set<string>();
  if (config.mode === "incremental") {
    try {
      const entry = await deps.historyStore.load(signature);
      seen = new Set(Object.keys(entry?.identities ?? {}));
    } catch (error) {
      seen = null;
      logger.warn("run_history_degraded", {
        signature,
        mode: config.mode,
        error: errorMessage(error),
      });
    }
  }

  const reduced = reduceRecords(config.mode, aggregated, { finalRound: rounds, seen });

  try {
    await deps.historyStore.merge(
      signature,
      aggregated.map((record) => record.identity),
      new Date(nowFn()).toISOString(),
    );
  } catch (error) {
    logger.warn("run_history_write_failed", {
      signature,
      error: errorMessage(error),
    });
  }

  return {
    signature,
    mode: config.mode,
    records: reduced.records,
    stats: {
      totalRawItems,
      matchedGroups: new Set(reduced.records.map((record) => record.keyword)).size,
      matchedRecords: reduced.records.length,
      aggregatedRecords: aggregated.length,
      platformsQueried: config.platforms.length,
      platformsSucceeded: succeeded.size,
      failedPlatforms: config.platforms.filter((platform) => failed.has(platform)),
      rounds,
      degraded: reduced.degraded,
    },
    durationMs: nowFn() - startedAt,
  };
}

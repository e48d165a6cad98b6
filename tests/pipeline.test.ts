import { describe, expect, test } from "vitest";
import { computeRunSignature } from "../src/core/signature.js";
import { ExecutionCancelledError, FetchError } from "../src/middleware/error-handler.js";
import type { FetchAdapter } from "../src/services/fetch-adapter.js";
import { runPipeline, type PipelineDeps } from "../src/services/pipeline.js";
import { InMemoryRunHistoryStore, type RunHistoryStore } from "../src/services/run-history.js";
import type { ConfigSnapshot, RawItem } from "../src/types/pipeline.js";

type Board = Record<string, string[]>;

/** Serves `boards["<platform>:<round>"]`, ranked in list order. */
class BoardAdapter implements FetchAdapter {
  readonly calls: string[] = [];

  constructor(
    private readonly boards: Board,
    private readonly failing: Record<string, () => Promise<RawItem[]>> = {},
  ) {}

  async fetch(platformId: string, round: number): Promise<RawItem[]> {
    this.calls.push(`${platformId}:${round}`);
    const failure = this.failing[platformId];
    if (failure) return failure();
    return (this.boards[`${platformId}:${round}`] ?? []).map((title, index) => ({
      title,
      url: `https://example.com/${platformId}/${index + 1}`,
      platform: platformId,
      rank: index + 1,
      fetchedAt: "2026-03-01T08:00:00.000Z",
    }));
  }
}

function clock(): () => number {
  let now = Date.parse("2026-03-01T08:00:00.000Z");
  return () => {
    now += 1000;
    return now;
  };
}

const aiConfig: ConfigSnapshot = {
  groups: [{ label: "AI", terms: ["AI", "人工智能"], expansions: [], expand: false }],
  filters: ["广告"],
  platforms: ["baidu"],
  mode: "daily",
};

function deps(adapter: FetchAdapter, overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    fetchAdapter: adapter,
    historyStore: new InMemoryRunHistoryStore(10),
    rounds: 2,
    roundIntervalMs: 0,
    concurrency: 2,
    fetchTimeoutMs: 1000,
    nowFn: clock(),
    ...overrides,
  };
}

const twoRoundBoards: Board = {
  "baidu:1": ["今日天气", "OpenAI发布AI模型", "人工智能芯片量产"],
  "baidu:2": ["OpenAI发布AI模型", "其他新闻", "AI广告推广"],
};

describe("runPipeline", () => {
  test("reports one record with its rank history for the two-round example", async () => {
    const boards: Board = {
      "baidu:1": ["今日天气", "OpenAI发布AI模型"],
      "baidu:2": ["OpenAI发布AI模型", "其他新闻", "AI广告推广"],
    };

    const result = await runPipeline(aiConfig, deps(new BoardAdapter(boards)));

    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.title).toBe("OpenAI发布AI模型");
    expect(result.records[0]?.keyword).toBe("AI");
    expect(result.records[0]?.observations.map((observation) => observation.rank)).toEqual([2, 1]);
  });

  test("daily mode merges a title across rounds and drops filtered items", async () => {
    const result = await runPipeline(aiConfig, deps(new BoardAdapter(twoRoundBoards)));

    expect(result.records.map((record) => record.title)).toEqual(["OpenAI发布AI模型", "人工智能芯片量产"]);
    expect(result.records[0]?.observations.map((observation) => observation.rank)).toEqual([2, 1]);
    expect(result.records[0]?.keyword).toBe("AI");
    expect(result.stats).toEqual({
      totalRawItems: 6,
      matchedGroups: 1,
      matchedRecords: 2,
      aggregatedRecords: 2,
      platformsQueried: 1,
      platformsSucceeded: 1,
      failedPlatforms: [],
      rounds: 2,
      degraded: false,
    });
  });

  test("current mode keeps only titles on the final board", async () => {
    const result = await runPipeline({ ...aiConfig, mode: "current" }, deps(new BoardAdapter(twoRoundBoards)));

    expect(result.records.map((record) => record.title)).toEqual(["OpenAI发布AI模型"]);
    expect(result.stats.aggregatedRecords).toBe(2);
  });

  test("incremental mode reports nothing new on an unchanged second run", async () => {
    const historyStore = new InMemoryRunHistoryStore(10);
    const config: ConfigSnapshot = { ...aiConfig, mode: "incremental" };
    const adapter = new BoardAdapter(twoRoundBoards);

    const first = await runPipeline(config, deps(adapter, { historyStore }));
    const second = await runPipeline(config, deps(adapter, { historyStore }));

    expect(first.records).toHaveLength(2);
    expect(second.records).toEqual([]);
    expect(second.signature).toBe(first.signature);
  });

  test("a daily run feeds the history an incremental run reads", async () => {
    const historyStore = new InMemoryRunHistoryStore(10);
    const adapter = new BoardAdapter(twoRoundBoards);

    await runPipeline(aiConfig, deps(adapter, { historyStore }));
    const incremental = await runPipeline({ ...aiConfig, mode: "incremental" }, deps(adapter, { historyStore }));

    expect(incremental.records).toEqual([]);
  });

  test("unreadable history degrades incremental mode to every record", async () => {
    const merged: string[][] = [];
    const historyStore: RunHistoryStore = {
      load: async () => {
        throw new Error("history unavailable");
      },
      merge: async (signature, identities, runAt) => {
        merged.push([...identities]);
        return { signature, runs: [runAt], identities: {} };
      },
    };

    const result = await runPipeline(
      { ...aiConfig, mode: "incremental" },
      deps(new BoardAdapter(twoRoundBoards), { historyStore }),
    );

    expect(result.records).toHaveLength(2);
    expect(result.stats.degraded).toBe(true);
    expect(merged).toEqual([["baidu::openai发布ai模型", "baidu::人工智能芯片量产"]]);
  });

  test("a failing history write does not fail the run", async () => {
    const historyStore: RunHistoryStore = {
      load: async () => undefined,
      merge: async () => {
        throw new Error("read-only");
      },
    };

    const result = await runPipeline(aiConfig, deps(new BoardAdapter(twoRoundBoards), { historyStore }));
    expect(result.stats.matchedRecords).toBe(2);
  });

  test("one failing platform leaves the others intact", async () => {
    const adapter = new BoardAdapter(
      { "baidu:1": ["AI新闻"] },
      {
        toutiao: async () => {
          throw new FetchError("toutiao", "Fetching toutiao failed: 502");
        },
      },
    );

    const result = await runPipeline(
      { ...aiConfig, platforms: ["toutiao", "baidu"] },
      deps(adapter, { rounds: 1 }),
    );

    expect(result.records.map((record) => record.identity)).toEqual(["baidu::ai新闻"]);
    expect(result.stats.platformsSucceeded).toBe(1);
    expect(result.stats.failedPlatforms).toEqual(["toutiao"]);
  });

  test("a platform that never answers is cut off by the fetch timeout", async () => {
    const adapter = new BoardAdapter(
      { "baidu:1": ["AI新闻"] },
      { toutiao: () => new Promise<RawItem[]>(() => {}) },
    );

    const result = await runPipeline(
      { ...aiConfig, platforms: ["baidu", "toutiao"] },
      deps(adapter, { rounds: 1, fetchTimeoutMs: 20 }),
    );

    expect(result.stats.failedPlatforms).toEqual(["toutiao"]);
    expect(result.records).toHaveLength(1);
  });

  test("waits between rounds only", async () => {
    const pauses: number[] = [];
    await runPipeline(
      aiConfig,
      deps(new BoardAdapter(twoRoundBoards), {
        rounds: 3,
        roundIntervalMs: 500,
        sleep: async (ms) => {
          pauses.push(ms);
        },
      }),
    );
    expect(pauses).toEqual([500, 500]);
  });

  test("an aborted signal stops the run before fetching", async () => {
    const adapter = new BoardAdapter(twoRoundBoards);
    const controller = new AbortController();
    controller.abort();

    await expect(runPipeline(aiConfig, deps(adapter), controller.signal)).rejects.toBeInstanceOf(
      ExecutionCancelledError,
    );
    expect(adapter.calls).toEqual([]);
  });

  test("an abort during the final round fails the run without touching history", async () => {
    const controller = new AbortController();
    const historyStore = new InMemoryRunHistoryStore(10);
    const adapter: FetchAdapter = {
      fetch: async (platformId) => {
        controller.abort();
        return [
          {
            title: "AI新闻",
            url: "https://example.com/1",
            platform: platformId,
            rank: 1,
            fetchedAt: "2026-03-01T08:00:00.000Z",
          },
        ];
      },
    };

    await expect(
      runPipeline(aiConfig, deps(adapter, { rounds: 1, historyStore }), controller.signal),
    ).rejects.toBeInstanceOf(ExecutionCancelledError);
    expect(await historyStore.load(computeRunSignature(aiConfig))).toBeUndefined();
  });
});

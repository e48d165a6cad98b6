import { describe, expect, test } from "vitest";
import { ConfigWriteError, NotFoundError, ValidationError } from "../src/middleware/error-handler.js";
import { InMemoryConfigResource } from "../src/services/config-resource.js";
import type { FetchAdapter } from "../src/services/fetch-adapter.js";
import { ExecutionIsolationManager } from "../src/services/isolation-manager.js";
import type { ExpansionMap, KeywordExpander } from "../src/services/keyword-expander.js";
import { InMemoryRunHistoryStore } from "../src/services/run-history.js";
import { SearchService } from "../src/services/search-service.js";
import { TaskService } from "../src/services/task-service.js";
import { InMemoryTaskStore } from "../src/services/task-store.js";
import type { ConfigSnapshot, RawItem } from "../src/types/pipeline.js";

class StaticAdapter implements FetchAdapter {
  async fetch(platformId: string): Promise<RawItem[]> {
    return ["库克谈苹果新品", "OpenAI发布AI模型"].map((title, index) => ({
      title,
      url: `https://example.com/${index + 1}`,
      platform: platformId,
      rank: index + 1,
      fetchedAt: "2026-03-01T08:00:00.000Z",
    }));
  }
}

class StubExpander implements KeywordExpander {
  readonly requests: string[][] = [];

  async expand(keywords: readonly string[]): Promise<ExpansionMap> {
    this.requests.push([...keywords]);
    return new Map([["苹果公司", ["库克"]]]);
  }
}

/** Rejects the first write only, so the backup can still be restored. */
class FlakyResource extends InMemoryConfigResource {
  private failed = false;

  override async write(snapshot: ConfigSnapshot): Promise<void> {
    if (!this.failed) {
      this.failed = true;
      throw new Error("disk full");
    }
    await super.write(snapshot);
  }
}

function makeServices(resource = new InMemoryConfigResource(), expander: KeywordExpander = new StubExpander()) {
  const search = new SearchService({
    isolation: new ExecutionIsolationManager(resource),
    fetchAdapter: new StaticAdapter(),
    historyStore: new InMemoryRunHistoryStore(10),
    expander,
    pipeline: { rounds: 1, roundIntervalMs: 0, fetchTimeoutMs: 1000 },
  });
  const store = new InMemoryTaskStore();
  return { search, store, tasks: new TaskService(store, search) };
}

describe("SearchService", () => {
  test("expanded terms widen the match for their group", async () => {
    const expander = new StubExpander();
    const { search } = makeServices(new InMemoryConfigResource(), expander);

    const result = await search.search({ keywords: ["苹果公司"], platforms: ["baidu"] });

    expect(expander.requests).toEqual([["苹果公司"]]);
    expect(result.records.map((record) => [record.title, record.keyword])).toEqual([["库克谈苹果新品", "苹果公司"]]);
  });

  test("expansion is skipped when disabled", async () => {
    const expander = new StubExpander();
    const { search } = makeServices(new InMemoryConfigResource(), expander);

    const result = await search.search({ keywords: ["苹果公司"], platforms: ["baidu"], expandKeywords: false });

    expect(expander.requests).toEqual([]);
    expect(result.records).toEqual([]);
  });

  test("keyword groups can carry their own terms", async () => {
    const { search } = makeServices();

    const result = await search.search({
      keywords: [{ label: "人工智能", terms: ["AI", "OpenAI"] }],
      platforms: ["toutiao"],
      expandKeywords: false,
    });

    expect(result.records.map((record) => record.keyword)).toEqual(["人工智能"]);
  });

  test("a group whose terms are all blank matches on its label", async () => {
    const { search } = makeServices();

    const result = await search.search({
      keywords: [{ label: "OpenAI", terms: [" ", ""] }],
      platforms: ["baidu"],
      expandKeywords: false,
    });

    expect(result.records.map((record) => record.title)).toEqual(["OpenAI发布AI模型"]);
  });

  test("invalid requests never touch the configuration", async () => {
    const resource = new InMemoryConfigResource();
    const { search } = makeServices(resource);

    await expect(search.search({ keywords: "AI" })).rejects.toBeInstanceOf(ValidationError);
    expect(await resource.read()).toEqual({ groups: [], filters: [], platforms: [], mode: "current" });
  });
});

describe("TaskService", () => {
  test("a failed run is recorded and rethrown", async () => {
    const { tasks, store } = makeServices(new FlakyResource());
    const task = await tasks.createTask({ name: "苹果", userId: "user-1", keywords: ["苹果"] });

    await expect(tasks.executeTask(task.id)).rejects.toBeInstanceOf(ConfigWriteError);

    const executions = await store.listExecutions(task.id);
    expect(executions).toHaveLength(1);
    expect(executions[0]).toMatchObject({
      status: "failed",
      matchedCount: 0,
      errorMessage: "Shared configuration override step failed",
    });
  });

  test("executing an unknown task is a NotFoundError", async () => {
    const { tasks } = makeServices();
    await expect(tasks.executeTask("task_missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  test("detail returns the five newest executions", async () => {
    const { tasks, store } = makeServices();
    const task = await tasks.createTask({ name: "AI", userId: "user-1", keywords: ["AI"] });
    for (let index = 0; index < 7; index += 1) {
      await store.recordExecution(task.id, { status: "success", matchedCount: index, durationMs: 1 });
    }

    const detail = await tasks.getTask(task.id);
    expect(detail.executions.map((execution) => execution.id)).toEqual([7, 6, 5, 4, 3]);
  });

  test("new tasks get defaults for optional fields", async () => {
    const { tasks } = makeServices();
    const task = await tasks.createTask({ name: " AI ", userId: "user-1", keywords: ["AI"] });

    expect(task).toMatchObject({
      name: "AI",
      filters: [],
      platforms: [],
      reportMode: "current",
      expandKeywords: true,
      status: "active",
    });
  });
});


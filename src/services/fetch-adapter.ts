import { env } from "../config/env.js";
import type { PlatformId } from "../domain/platforms.js";
import { FetchError } from "../middleware/error-handler.js";
import type { RawItem } from "../types/pipeline.js";
import { errorMessage } from "../utils/logger.js";
import { fetchBaiduHotList } from "./local/baidu.js";
import { fetchToutiaoHotList } from "./local/toutiao.js";
import type { HotListEntry, HotListFetcher } from "./local/types.js";

/**
 * One fetch round for one platform. Implementations must tolerate concurrent
 * calls for distinct platform ids and throw `FetchError` on failure.
 */
export interface FetchAdapter {
  fetch(platformId: string, round: number, signal?: AbortSignal): Promise<RawItem[]>;
}

const LOCAL_FETCHERS: Record<PlatformId, HotListFetcher> = {
  baidu: fetchBaiduHotList,
  toutiao: fetchToutiaoHotList,
};

interface HotListFetchAdapterOptions {
  fetchers?: Partial<Record<string, HotListFetcher>>;
  timeoutMs?: number;
  nowFn?: () => number;
}

export class HotListFetchAdapter implements FetchAdapter {
  private readonly fetchers: Partial<Record<string, HotListFetcher>>;
  private readonly timeoutMs: number;
  private readonly nowFn: () => number;

  constructor(options: HotListFetchAdapterOptions = {}) {
    this.fetchers = options.fetchers ?? LOCAL_FETCHERS;
    this.timeoutMs = options.timeoutMs ?? env.FETCH_TIMEOUT_MS;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  async fetch(platformId: string, _round: number, signal?: AbortSignal): Promise<RawItem[]> {
    const fetcher = this.fetchers[platformId];
    if (!fetcher) {
      throw new FetchError(platformId, `No fetcher registered for platform ${platformId}`);
    }

    let entries: HotListEntry[];
    try {
      entries = await fetcher({ timeoutMs: this.timeoutMs, signal });
    } catch (error) {
      throw new FetchError(platformId, `Fetching ${platformId} failed: ${errorMessage(error)}`, error);
    }

    const fetchedAt = new Date(this.nowFn()).toISOString();
    return entries.map((entry, index) => ({
      title: entry.title,
      url: entry.url,
      mobileUrl: entry.mobileUrl,
      platform: platformId,
      rank: index + 1,
      fetchedAt,
    }));
  }
}

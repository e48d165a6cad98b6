import { BROWSER_USER_AGENT, ensureAbsoluteUrl, requestJson } from "./http.js";
import type { HotListEntry, HotListFetcher } from "./types.js";

interface ToutiaoItem {
  ClusterIdStr?: string;
  Title?: string;
  Url?: string;
}

interface ToutiaoResponse {
  data?: ToutiaoItem[];
}

const BOARD_URL = "https://www.toutiao.com/hot-event/hot-board/?origin=toutiao_pc";

export const fetchToutiaoHotList: HotListFetcher = async ({ timeoutMs, signal }) => {
  const json = await requestJson<ToutiaoResponse>(BOARD_URL, {
    timeoutMs,
    signal,
    headers: {
      accept: "application/json, text/plain, */*",
      "user-agent": BROWSER_USER_AGENT,
      referer: "https://www.toutiao.com/",
    },
  });

  const rows = Array.isArray(json.data) ? json.data : [];
  const entries = rows
    .map((row): HotListEntry | null => {
      const title = typeof row.Title === "string" ? row.Title.trim() : "";
      if (!title) return null;
      const url =
        ensureAbsoluteUrl(row.Url, "https://www.toutiao.com") ??
        `https://www.toutiao.com/search/?keyword=${encodeURIComponent(title)}`;
      const mobileUrl = row.ClusterIdStr
        ? `https://m.toutiao.com/trending/${row.ClusterIdStr}/`
        : undefined;
      return { title, url, mobileUrl };
    })
    .filter((entry): entry is HotListEntry => entry !== null);

  if (entries.length === 0) {
    throw new Error("Toutiao hot board returned empty data");
  }
  return entries;
};

import { BROWSER_USER_AGENT, ensureAbsoluteUrl, requestJson } from "./http.js";
import type { HotListEntry, HotListFetcher } from "./types.js";

interface BaiduBoardResponse {
  success?: boolean;
  data?: {
    cards?: Array<{
      component?: string;
      content?: Array<Record<string, unknown>>;
    }>;
  };
}

const BOARD_URL = "https://top.baidu.com/api/board?tab=realtime";

export const fetchBaiduHotList: HotListFetcher = async ({ timeoutMs, signal }) => {
  const json = await requestJson<BaiduBoardResponse>(BOARD_URL, {
    timeoutMs,
    signal,
    headers: {
      accept: "application/json, text/plain, */*",
      "user-agent": BROWSER_USER_AGENT,
      referer: "https://top.baidu.com/board?tab=realtime",
    },
  });

  const cards = Array.isArray(json.data?.cards) ? json.data.cards : [];
  const rows = cards.flatMap((card) => (Array.isArray(card.content) ? card.content : []));

  const entries = rows
    .map((row): HotListEntry | null => {
      const title = String(row.query ?? row.word ?? row.title ?? "").trim();
      if (!title) return null;
      const url =
        ensureAbsoluteUrl(typeof row.url === "string" ? row.url : undefined, "https://www.baidu.com") ??
        `https://www.baidu.com/s?wd=${encodeURIComponent(title)}`;
      const mobileUrl = ensureAbsoluteUrl(
        typeof row.appUrl === "string" ? row.appUrl : undefined,
        "https://m.baidu.com",
      );
      return { title, url, mobileUrl };
    })
    .filter((entry): entry is HotListEntry => entry !== null);

  if (entries.length === 0) {
    throw new Error("Baidu hot list returned empty data");
  }
  return entries;
};

/** One row of a platform's board, in board order. */
export interface HotListEntry {
  title: string;
  url: string;
  mobileUrl?: string;
}

export interface HotListRequest {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type HotListFetcher = (request: HotListRequest) => Promise<HotListEntry[]>;

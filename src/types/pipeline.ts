export type ReportMode = "daily" | "current" | "incremental";

export interface KeywordGroup {
  /** Surfaced as the record's `keyword`. */
  label: string;
  terms: string[];
  expansions: string[];
  /** Expansion terms only count when this is set. */
  expand: boolean;
}

export type FilterSet = readonly string[];

export interface RawItem {
  title: string;
  url: string;
  mobileUrl?: string;
  platform: string;
  rank: number;
  fetchedAt: string;
}

export interface MatchedItem extends RawItem {
  keyword: string;
}

export interface TimeWindow {
  start: string;
  end: string;
}

export interface MatchedBatch {
  round: number;
  window: TimeWindow;
  items: MatchedItem[];
}

export interface RankObservation {
  rank: number;
  round: number;
  window: TimeWindow;
}

export interface AggregatedRecord {
  identity: string;
  title: string;
  url: string;
  mobileUrl?: string;
  platform: string;
  keyword: string;
  observations: RankObservation[];
  firstSeen: TimeWindow;
  lastSeen: TimeWindow;
}

export interface ConfigSnapshot {
  groups: KeywordGroup[];
  filters: string[];
  platforms: string[];
  mode: ReportMode;
}

export interface RunStats {
  totalRawItems: number;
  matchedGroups: number;
  matchedRecords: number;
  aggregatedRecords: number;
  platformsQueried: number;
  platformsSucceeded: number;
  failedPlatforms: string[];
  rounds: number;
  degraded: boolean;
}

export interface RunResult {
  signature: string;
  mode: ReportMode;
  records: AggregatedRecord[];
  stats: RunStats;
  durationMs: number;
  reportPath?: string;
}

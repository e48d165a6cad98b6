import type { AggregatedRecord, MatchedBatch, TimeWindow } from "../types/pipeline.js";
import { recordIdentity } from "./text.js";

function windowStart(window: TimeWindow): number {
  const ms = Date.parse(window.start);
  return Number.isFinite(ms) ? ms : 0;
}

/**
 * Merges successive rounds into one record per (platform, normalized title).
 * Every re-observation appends a rank, including repeats of the same rank.
 * Records come back in the order they were first observed.
 */
export function aggregateBatches(batches: readonly MatchedBatch[]): AggregatedRecord[] {
  // Array.prototype.sort is stable, so batches sharing a window keep arrival order.
  const ordered = [...batches].sort((a, b) => windowStart(a.window) - windowStart(b.window));
  const records = new Map<string, AggregatedRecord>();

  for (const batch of ordered) {
    const seenThisBatch = new Set<string>();

    for (const item of batch.items) {
      const identity = recordIdentity(item.platform, item.title);
      if (seenThisBatch.has(identity)) continue;
      seenThisBatch.add(identity);

      const observation = { rank: item.rank, round: batch.round, window: batch.window };
      const existing = records.get(identity);

      if (!existing) {
        records.set(identity, {
          identity,
          title: item.title,
          url: item.url,
          mobileUrl: item.mobileUrl,
          platform: item.platform,
          keyword: item.keyword,
          observations: [observation],
          firstSeen: batch.window,
          lastSeen: batch.window,
        });
        continue;
      }

      existing.observations.push(observation);
      if (!existing.url && item.url) existing.url = item.url;
      if (!existing.mobileUrl && item.mobileUrl) existing.mobileUrl = item.mobileUrl;
      if (windowStart(batch.window) < windowStart(existing.firstSeen)) existing.firstSeen = batch.window;
      if (windowStart(batch.window) >= windowStart(existing.lastSeen)) existing.lastSeen = batch.window;
    }
  }

  return Array.from(records.values());
}

export function ranksOf(record: AggregatedRecord): number[] {
  return record.observations.map((observation) => observation.rank);
}

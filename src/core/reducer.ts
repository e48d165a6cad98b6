import type { AggregatedRecord, ReportMode } from "../types/pipeline.js";

export interface ReduceContext {
  /** Round number of the last fetch round of this run. */
  finalRound: number;
  /** Identities already seen for this signature; `null` when history could not be read. */
  seen: ReadonlySet<string> | null;
}

export interface ReduceOutcome {
  records: AggregatedRecord[];
  degraded: boolean;
}

type ModeReducer = (records: AggregatedRecord[], context: ReduceContext) => ReduceOutcome;

const reducers: Record<ReportMode, ModeReducer> = {
  daily: (records) => ({ records: [...records], degraded: false }),

  current: (records, { finalRound }) => ({
    records: records.filter((record) => record.observations.at(-1)?.round === finalRound),
    degraded: false,
  }),

  incremental: (records, { seen }) => {
    if (!seen) {
      return { records: [...records], degraded: true };
    }
    return {
      records: records.filter((record) => !seen.has(record.identity)),
      degraded: false,
    };
  },
};

export function reduceRecords(mode: ReportMode, records: AggregatedRecord[], context: ReduceContext): ReduceOutcome {
  return reducers[mode](records, context);
}

import { hasPendingWork, isExhausted, isFullyProcessed, isInBacklog, isStalled, resetRecord } from "../state";
import { Lease, TrackerStore } from "../store";
import {
  AcquisitionPolicy,
  PARSER_NAMES,
  ParserName,
  ProcessingRecord,
  TRACKED_SOURCES,
  TrackedSource,
  TrackerEvent,
} from "../types";

export const RECORD_FILTERS = [
  "all",
  "backlog",
  "downloaded",
  "not-downloaded",
  "exhausted",
  "fully-processed",
  "stalled",
] as const;
export type RecordFilter = (typeof RECORD_FILTERS)[number];

export function isRecordFilter(value: unknown): value is RecordFilter {
  const filters: readonly unknown[] = RECORD_FILTERS;
  return filters.includes(value);
}

export interface SourceStats {
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface ParserStats {
  success: number;
  failed: number;
  notAttempted: number;
}

export interface TrackerStats {
  total: number;
  downloaded: number;
  notDownloaded: number;
  exhausted: number;
  fullyProcessed: number;
  stalled: number;
  backlog: number;
  contentIngested: number;
  sources: Record<TrackedSource, SourceStats>;
  parsers: Record<ParserName, ParserStats>;
  activeLeases: Lease[];
}

export function matchesFilter(record: ProcessingRecord, filter: RecordFilter, policy: AcquisitionPolicy): boolean {
  switch (filter) {
    case "all":
      return true;
    case "backlog":
      return isInBacklog(record, policy);
    case "downloaded":
      return record.downloaded === "yes";
    case "not-downloaded":
      return record.downloaded !== "yes";
    case "exhausted":
      return isExhausted(record, policy);
    case "fully-processed":
      return isFullyProcessed(record, policy);
    case "stalled":
      return isStalled(record, policy);
  }
}

/** Read side of the tracker plus the administrative reset. */
export class TrackerQueries {
  private readonly store: TrackerStore;
  private readonly policy: AcquisitionPolicy;

  constructor(store: TrackerStore, policy: AcquisitionPolicy) {
    this.store = store;
    this.policy = policy;
  }

  async getStatus(id: string): Promise<{ record: ProcessingRecord; events: TrackerEvent[]; pendingWork: boolean }> {
    const record = await this.store.get(id);
    const events = await this.store.listEvents({ id });
    return { record, events, pendingWork: hasPendingWork(record, this.policy) };
  }

  listByPredicate(filter: RecordFilter, limit?: number): Promise<ProcessingRecord[]> {
    return this.store.query((record) => matchesFilter(record, filter, this.policy), { limit });
  }

  async getStats(): Promise<TrackerStats> {
    const records = await this.store.query(() => true);
    const stats: TrackerStats = {
      total: records.length,
      downloaded: 0,
      notDownloaded: 0,
      exhausted: 0,
      fullyProcessed: 0,
      stalled: 0,
      backlog: 0,
      contentIngested: 0,
      sources: {
        scihub: emptySourceStats(),
        unpaywall: emptySourceStats(),
        arxiv: emptySourceStats(),
        biorxiv: emptySourceStats(),
        europepmc: emptySourceStats(),
        semanticscholar: emptySourceStats(),
        reconciled: emptySourceStats(),
      },
      parsers: {
        fast: emptyParserStats(),
        grobid: emptyParserStats(),
      },
      activeLeases: await this.store.listActiveLeases(),
    };

    for (const record of records) {
      if (record.downloaded === "yes") {
        stats.downloaded += 1;
      } else {
        stats.notDownloaded += 1;
      }
      if (record.contentIngested === "yes") {
        stats.contentIngested += 1;
      }
      if (isExhausted(record, this.policy)) {
        stats.exhausted += 1;
      } else if (isFullyProcessed(record, this.policy)) {
        stats.fullyProcessed += 1;
      } else if (hasPendingWork(record, this.policy)) {
        stats.backlog += 1;
      } else {
        stats.stalled += 1;
      }

      for (const source of TRACKED_SOURCES) {
        const state = record.sources[source];
        if (state.attempted === "yes") {
          stats.sources[source].attempted += 1;
        }
        if (state.succeeded === "yes") {
          stats.sources[source].succeeded += 1;
        } else if (state.succeeded === "no") {
          stats.sources[source].failed += 1;
        }
      }
      for (const parser of PARSER_NAMES) {
        const status = record.parseStages[parser].status;
        if (status === "success") {
          stats.parsers[parser].success += 1;
        } else if (status === "failed") {
          stats.parsers[parser].failed += 1;
        } else {
          stats.parsers[parser].notAttempted += 1;
        }
      }
    }

    return stats;
  }

  /** Puts the record back to its defaults. The event history is kept. */
  async forceReset(id: string, reason = "manual"): Promise<ProcessingRecord> {
    const result = await this.store.applyMutation(id, (current, now) => ({
      record: resetRecord(current, now),
      events: [
        {
          eventType: "reset",
          detail: {
            reason,
            previousRetryCount: current.retryCount,
            previousDownloaded: current.downloaded,
            previousLastError: current.lastError,
          },
        },
      ],
    }));
    return result.record;
  }
}

function emptySourceStats(): SourceStats {
  return { attempted: 0, succeeded: 0, failed: 0 };
}

function emptyParserStats(): ParserStats {
  return { success: 0, failed: 0, notAttempted: 0 };
}

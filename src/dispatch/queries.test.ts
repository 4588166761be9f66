import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyFetchOutcome, applyParseOutcome } from "../state";
import { SqliteTrackerStore } from "../store";
import { AcquisitionPolicy } from "../types";
import { isRecordFilter, TrackerQueries } from "./queries";

const policy: AcquisitionPolicy = {
  sourceOrder: ["unpaywall", "arxiv"],
  requiredParsers: ["fast"],
  maxRetries: 10,
  ingestContent: false,
};

describe("TrackerQueries", () => {
  let store: SqliteTrackerStore;
  let queries: TrackerQueries;

  beforeEach(async () => {
    store = new SqliteTrackerStore(":memory:");
    queries = new TrackerQueries(store, policy);

    await store.ensureRecords(["10.1000/a"]);
    await store.applyMutation("10.1000/b", (current, now) => ({
      record: applyFetchOutcome(current, "arxiv", { kind: "success", path: "/tmp/b.pdf", bytes: 4096 }, now),
    }));
    await store.applyMutation("10.1000/c", (current) => ({ record: { ...current, retryCount: 10 } }));
    await store.applyMutation("10.1000/d", (current, now) => {
      const downloaded = applyFetchOutcome(current, "arxiv", { kind: "success", path: "/tmp/d.pdf", bytes: 4096 }, now);
      return {
        record: applyParseOutcome(
          downloaded,
          "fast",
          { status: "success", outputPath: "/tmp/d_fast.json", content: { parser: "fast", sections: [] } },
          policy,
          now,
        ),
      };
    });
  });

  afterEach(async () => {
    await store.close();
  });

  it("aggregates counts across every record", async () => {
    const stats = await queries.getStats();

    expect(stats.total).toBe(4);
    expect(stats.downloaded).toBe(2);
    expect(stats.notDownloaded).toBe(2);
    expect(stats.exhausted).toBe(1);
    expect(stats.fullyProcessed).toBe(1);
    expect(stats.backlog).toBe(2);
    expect(stats.stalled).toBe(0);
    expect(stats.sources.arxiv).toEqual({ attempted: 2, succeeded: 2, failed: 0 });
    expect(stats.parsers.fast).toEqual({ success: 1, failed: 0, notAttempted: 3 });
    expect(stats.activeLeases).toEqual([]);
  });

  it("lists records matching a named filter", async () => {
    const backlog = await queries.listByPredicate("backlog");
    expect(backlog.map((record) => record.id).sort()).toEqual(["10.1000/a", "10.1000/b"]);

    const exhausted = await queries.listByPredicate("exhausted");
    expect(exhausted.map((record) => record.id)).toEqual(["10.1000/c"]);

    expect(await queries.listByPredicate("all", 3)).toHaveLength(3);
  });

  it("returns a record with its events and pending work", async () => {
    const status = await queries.getStatus("10.1000/b");

    expect(status.record.downloadSource).toBe("arxiv");
    expect(status.events).toEqual([]);
    expect(status.pendingWork).toBe(true);
  });

  it("resets a record and keeps its history", async () => {
    await store.applyMutation("10.1000/a", (current) => ({
      record: { ...current, retryCount: 3, lastError: "unpaywall: HTTP 404" },
      events: [{ eventType: "source-failure", detail: { source: "unpaywall" } }],
    }));

    const record = await queries.forceReset("10.1000/a");

    expect(record.retryCount).toBe(0);
    expect(record.lastError).toBeNull();
    const events = await store.listEvents({ id: "10.1000/a" });
    expect(events.map((event) => event.eventType)).toEqual(["source-failure", "reset"]);
    expect(events[1].detail).toEqual({
      reason: "manual",
      previousRetryCount: 3,
      previousDownloaded: "unknown",
      previousLastError: "unpaywall: HTTP 404",
    });
  });
});

describe("isRecordFilter", () => {
  it("accepts only known filter names", () => {
    expect(isRecordFilter("stalled")).toBe(true);
    expect(isRecordFilter("pending")).toBe(false);
    expect(isRecordFilter(undefined)).toBe(false);
  });
});

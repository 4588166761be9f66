import { describe, expect, it } from "vitest";
import { AcquisitionPolicy } from "../types";
import { exhaustionEvents } from "./events";
import { reconcileRecord } from "./reconcileRules";
import {
  applyFetchOutcome,
  applyIngestOutcome,
  applyParseOutcome,
  createDefaultRecord,
  hasPendingWork,
  isExhausted,
  isFullyProcessed,
  isIngestPending,
  isInBacklog,
  isStalled,
  nextSourceToTry,
} from "./stateModel";

const NOW = "2026-01-01T00:00:00.000Z";
const LATER = "2026-01-01T00:05:00.000Z";

const policy: AcquisitionPolicy = {
  sourceOrder: ["unpaywall", "arxiv"],
  requiredParsers: ["fast"],
  maxRetries: 10,
  ingestContent: false,
};

describe("state model", () => {
  describe("fetch transitions", () => {
    it("marks the first source as the download source on success", () => {
      const record = createDefaultRecord("10.1000/a", NOW);
      expect(nextSourceToTry(record, policy.sourceOrder)).toBe("unpaywall");

      const next = applyFetchOutcome(record, "unpaywall", { kind: "success", path: "/tmp/a.pdf", bytes: 2048 }, LATER);

      expect(next.sources.unpaywall).toEqual({ attempted: "yes", succeeded: "yes" });
      expect(next.downloaded).toBe("yes");
      expect(next.downloadSource).toBe("unpaywall");
      expect(next.downloadTimestamp).toBe(LATER);
      expect(next.retryCount).toBe(0);
      expect(nextSourceToTry(next, policy.sourceOrder)).toBeNull();
    });

    it("moves to the next source after a definitive miss", () => {
      const record = createDefaultRecord("10.1000/a", NOW);
      const next = applyFetchOutcome(record, "unpaywall", { kind: "not-found", reason: "no oa location" }, LATER);

      expect(next.sources.unpaywall).toEqual({ attempted: "yes", succeeded: "no" });
      expect(next.downloaded).toBe("no");
      expect(next.retryCount).toBe(1);
      expect(next.lastError).toBe("unpaywall: no oa location");
      expect(nextSourceToTry(next, policy.sourceOrder)).toBe("arxiv");
    });

    it("leaves the source eligible after a transient error", () => {
      const record = createDefaultRecord("10.1000/a", NOW);
      const next = applyFetchOutcome(record, "unpaywall", { kind: "transient-error", error: "HTTP 503" }, LATER);

      expect(next.sources.unpaywall).toEqual({ attempted: "unknown", succeeded: "unknown" });
      expect(next.downloaded).toBe("unknown");
      expect(next.retryCount).toBe(1);
      expect(nextSourceToTry(next, policy.sourceOrder)).toBe("unpaywall");
    });

    it("does not alias the input record", () => {
      const record = createDefaultRecord("10.1000/a", NOW);
      applyFetchOutcome(record, "unpaywall", { kind: "success", path: "/tmp/a.pdf", bytes: 2048 }, LATER);
      expect(record.sources.unpaywall.attempted).toBe("unknown");
    });
  });

  describe("exhaustion", () => {
    it("is reached when every configured source was tried without a download", () => {
      let record = createDefaultRecord("10.1000/a", NOW);
      record = applyFetchOutcome(record, "unpaywall", { kind: "not-found", reason: "missing" }, LATER);
      expect(isExhausted(record, policy)).toBe(false);

      const before = record;
      record = applyFetchOutcome(record, "arxiv", { kind: "invalid-content", error: "missing %PDF- header" }, LATER);
      expect(isExhausted(record, policy)).toBe(true);
      expect(exhaustionEvents(before, record, policy, { cause: "source-failure" })).toEqual([
        {
          eventType: "exhausted",
          detail: { cause: "source-failure", retryCount: 2, maxRetries: 10, reason: "sources-exhausted" },
        },
      ]);
    });

    it("is reached at the retry ceiling even with sources left", () => {
      const strict: AcquisitionPolicy = { ...policy, maxRetries: 2 };
      let record = createDefaultRecord("10.1000/a", NOW);
      record = applyFetchOutcome(record, "unpaywall", { kind: "transient-error", error: "timeout" }, LATER);
      expect(isExhausted(record, strict)).toBe(false);

      record = applyFetchOutcome(record, "unpaywall", { kind: "transient-error", error: "timeout" }, LATER);
      expect(record.retryCount).toBe(2);
      expect(isExhausted(record, strict)).toBe(true);
      expect(record.sources.unpaywall.attempted).toBe("unknown");
      expect(isInBacklog(record, strict)).toBe(false);
    });

    it("emits nothing when the record was already exhausted", () => {
      const strict: AcquisitionPolicy = { ...policy, maxRetries: 1 };
      const before = { ...createDefaultRecord("10.1000/a", NOW), retryCount: 1 };
      const after = { ...before, retryCount: 2 };
      expect(exhaustionEvents(before, after, strict, {})).toEqual([]);
    });
  });

  describe("parse transitions", () => {
    const downloaded = applyFetchOutcome(
      createDefaultRecord("10.1000/a", NOW),
      "unpaywall",
      { kind: "success", path: "/tmp/a.pdf", bytes: 2048 },
      NOW,
    );

    it("records a successful parse and completes the record", () => {
      expect(hasPendingWork(downloaded, policy)).toBe(true);
      const next = applyParseOutcome(
        downloaded,
        "fast",
        { status: "success", outputPath: "/tmp/a_fast.json", content: { parser: "fast", sections: [] } },
        policy,
        LATER,
      );

      expect(next.parseStages.fast).toEqual({ status: "success", timestamp: LATER });
      expect(isFullyProcessed(next, policy)).toBe(true);
      expect(hasPendingWork(next, policy)).toBe(false);
    });

    it("keeps a failed parser retryable below the ceiling", () => {
      const next = applyParseOutcome(downloaded, "fast", { status: "failed", error: "bad xref" }, policy, LATER);

      expect(next.parseStages.fast).toEqual({ status: "not_attempted", timestamp: LATER });
      expect(next.retryCount).toBe(1);
      expect(next.lastError).toBe("fast: bad xref");
      expect(isInBacklog(next, policy)).toBe(true);
    });

    it("marks the parser failed once the ceiling is reached", () => {
      const nearCeiling = { ...downloaded, retryCount: 9 };
      const next = applyParseOutcome(nearCeiling, "fast", { status: "failed", error: "bad xref" }, policy, LATER);

      expect(next.parseStages.fast.status).toBe("failed");
      expect(isExhausted(next, policy)).toBe(true);
    });

    it("never overwrites a success", () => {
      const parsed = applyParseOutcome(
        downloaded,
        "fast",
        { status: "success", outputPath: "/tmp/a_fast.json", content: { parser: "fast", sections: [] } },
        policy,
        NOW,
      );
      const next = applyParseOutcome(parsed, "fast", { status: "failed", error: "late failure" }, policy, LATER);
      expect(next).toBe(parsed);
    });

    it("reports a record whose parser failed outside exhaustion as stalled", () => {
      const failed = {
        ...downloaded,
        retryCount: 3,
        parseStages: { ...downloaded.parseStages, fast: { status: "failed" as const, timestamp: NOW } },
      };
      expect(isStalled(failed, policy)).toBe(true);
      expect(isInBacklog(failed, policy)).toBe(false);
    });
  });

  describe("content ingestion", () => {
    const ingestPolicy: AcquisitionPolicy = { ...policy, ingestContent: true };
    const parsed = applyParseOutcome(
      applyFetchOutcome(createDefaultRecord("10.1000/a", NOW), "arxiv", { kind: "success", path: "/tmp/a.pdf", bytes: 2048 }, NOW),
      "fast",
      { status: "success", outputPath: "/tmp/a_fast.json", content: { parser: "fast", sections: [] } },
      ingestPolicy,
      NOW,
    );

    it("is pending once every required parser settled", () => {
      expect(isIngestPending(parsed, ingestPolicy)).toBe(true);
      expect(isFullyProcessed(parsed, ingestPolicy)).toBe(false);
    });

    it("completes the record when the hand-off is confirmed", () => {
      const next = applyIngestOutcome(parsed, null);
      expect(next.contentIngested).toBe("yes");
      expect(isFullyProcessed(next, ingestPolicy)).toBe(true);
    });

    it("counts a failed hand-off against the retry budget", () => {
      const next = applyIngestOutcome(parsed, "disk full");
      expect(next.contentIngested).toBe("no");
      expect(next.retryCount).toBe(1);
      expect(next.lastError).toBe("ingest: disk full");
      expect(isIngestPending(next, ingestPolicy)).toBe(true);
    });
  });
});

describe("reconcileRecord", () => {
  it("adopts a valid file no fetch recorded", () => {
    const record = createDefaultRecord("10.1000/a", NOW);
    const { record: next, changes } = reconcileRecord(
      record,
      { validFile: true, invalidFile: false, parserOutputs: ["fast"] },
      LATER,
    );

    expect(next.downloaded).toBe("yes");
    expect(next.downloadSource).toBe("reconciled");
    expect(next.sources.reconciled).toEqual({ attempted: "yes", succeeded: "yes" });
    expect(next.parseStages.fast).toEqual({ status: "success", timestamp: LATER });
    expect(changes).toEqual([
      { field: "downloaded", from: "unknown", to: "yes" },
      { field: "downloadSource", from: null, to: "reconciled" },
      { field: "fastStatus", from: "not_attempted", to: "success" },
    ]);
  });

  it("clears a download whose file is gone and reopens every source", () => {
    let record = createDefaultRecord("10.1000/a", NOW);
    record = applyFetchOutcome(record, "unpaywall", { kind: "not-found", reason: "missing" }, NOW);
    record = applyFetchOutcome(record, "arxiv", { kind: "success", path: "/tmp/a.pdf", bytes: 2048 }, NOW);

    const { record: next } = reconcileRecord(record, { validFile: false, invalidFile: false, parserOutputs: [] }, LATER);

    expect(next.downloaded).toBe("no");
    expect(next.downloadSource).toBeNull();
    expect(next.sources.arxiv).toEqual({ attempted: "unknown", succeeded: "no" });
    expect(next.sources.unpaywall).toEqual({ attempted: "unknown", succeeded: "no" });
    expect(next.retryCount).toBe(1);
    expect(nextSourceToTry(next, policy.sourceOrder)).toBe("unpaywall");
  });

  it("reports no changes when the record already agrees", () => {
    const record = createDefaultRecord("10.1000/a", NOW);
    const { changes } = reconcileRecord(record, { validFile: false, invalidFile: false, parserOutputs: [] }, LATER);
    expect(changes).toEqual([]);
  });

  it("only touches content flags when the content store was consulted", () => {
    const record = { ...createDefaultRecord("10.1000/a", NOW), contentIngested: "yes" as const };
    expect(reconcileRecord(record, { validFile: false, invalidFile: false, parserOutputs: [] }, LATER).changes).toEqual([]);
    expect(
      reconcileRecord(record, { validFile: false, invalidFile: false, parserOutputs: [], inContentStore: false }, LATER).changes,
    ).toEqual([{ field: "contentIngested", from: "yes", to: "no" }]);
  });
});

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FileLayout } from "../core/layout";
import { ParseStageController } from "../extract/parseStages";
import { Logger, MetricsRegistry } from "../observability";
import { SqliteTrackerStore } from "../store";
import { AcquisitionPolicy, FetchOutcome, ParseOutcome } from "../types";
import { AcquisitionOrchestrator, AttemptFetch, didPassWork } from "./orchestrator";

const DOI = "10.1000/xyz.1";

describe("AcquisitionOrchestrator", () => {
  let tmpDir: string;
  let layout: FileLayout;
  let store: SqliteTrackerStore;
  let metrics: MetricsRegistry;
  const logger = new Logger({ component: "test", runId: "test-run", minLevel: "error" });

  const policy: AcquisitionPolicy = {
    sourceOrder: ["unpaywall", "arxiv"],
    requiredParsers: ["fast"],
    maxRetries: 10,
    ingestContent: false,
  };

  const parseOk = vi.fn(
    async (doi: string): Promise<ParseOutcome> => ({
      status: "success",
      outputPath: layout.parserOutputPath(doi, "fast"),
      content: { parser: "fast", sections: [] },
    }),
  );

  function build(attemptFetch: AttemptFetch, overrides: Partial<AcquisitionPolicy> = {}, attemptTimeoutMs = 1_000) {
    const effective = { ...policy, ...overrides };
    const parseStages = new ParseStageController({
      store,
      policy: effective,
      layout,
      attemptParse: parseOk,
      parseTimeoutMs: 1_000,
      logger,
      metrics,
    });
    return new AcquisitionOrchestrator({
      store,
      policy: effective,
      attemptFetch,
      parseStages,
      attemptTimeoutMs,
      logger,
      metrics,
    });
  }

  async function writePdf(doi: string): Promise<string> {
    const target = layout.pdfPath(doi);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, Buffer.concat([Buffer.from("%PDF-1.7\n"), Buffer.alloc(2048, 32)]));
    return target;
  }

  async function eventTypes(): Promise<string[]> {
    return (await store.listEvents({ id: DOI })).map((event) => event.eventType);
  }

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "orchestrator-"));
    layout = new FileLayout({ pdf: path.join(tmpDir, "pdfs"), parsed: path.join(tmpDir, "parsed") });
    store = new SqliteTrackerStore(":memory:");
    metrics = new MetricsRegistry();
    parseOk.mockClear();
  });

  afterEach(async () => {
    await store.close();
    await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  it("downloads from the first source and runs the parser in the same pass", async () => {
    const attemptFetch = vi.fn<AttemptFetch>(async (doi: string): Promise<FetchOutcome> => {
      const target = await writePdf(doi);
      return { kind: "success", path: target, bytes: 2057 };
    });
    const orchestrator = build(attemptFetch);

    const result = await orchestrator.processIdentifier(DOI);

    expect(result).toEqual({
      action: "fetched",
      id: DOI,
      source: "unpaywall",
      outcome: "success",
      exhausted: false,
      parse: { parsed: ["fast"], failed: [], ingested: false, pdfMissing: false },
    });
    expect(attemptFetch).toHaveBeenCalledTimes(1);
    expect(attemptFetch.mock.calls[0][1]).toBe("unpaywall");

    const record = await store.get(DOI);
    expect(record.downloaded).toBe("yes");
    expect(record.downloadSource).toBe("unpaywall");
    expect(record.parseStages.fast.status).toBe("success");
    expect(await eventTypes()).toEqual(["source-attempt", "source-success", "parse-attempt", "parse-success"]);
    expect(metrics.getCounter("fetch_ok")).toBe(1);
  });

  it("does nothing for a fully processed record", async () => {
    const attemptFetch = vi.fn(async (doi: string): Promise<FetchOutcome> => {
      const target = await writePdf(doi);
      return { kind: "success", path: target, bytes: 2057 };
    });
    const orchestrator = build(attemptFetch);
    await orchestrator.processIdentifier(DOI);
    const eventsBefore = await store.listEvents({ id: DOI });

    const result = await orchestrator.processIdentifier(DOI);

    expect(result).toEqual({ action: "noop", id: DOI, reason: "fully-processed" });
    expect(didPassWork(result)).toBe(false);
    expect(attemptFetch).toHaveBeenCalledTimes(1);
    expect(parseOk).toHaveBeenCalledTimes(1);
    expect(await store.listEvents({ id: DOI })).toEqual(eventsBefore);
  });

  it("walks the source order one fetch per pass", async () => {
    const attemptFetch = vi.fn(async (doi: string, source: string): Promise<FetchOutcome> => {
      if (source === "unpaywall") {
        return { kind: "not-found", reason: "no oa location" };
      }
      const target = await writePdf(doi);
      return { kind: "success", path: target, bytes: 2057 };
    });
    const orchestrator = build(attemptFetch);

    const first = await orchestrator.processIdentifier(DOI);
    expect(first).toEqual({ action: "fetched", id: DOI, source: "unpaywall", outcome: "not-found", exhausted: false });

    const second = await orchestrator.processIdentifier(DOI);
    expect(second.action).toBe("fetched");

    const record = await store.get(DOI);
    expect(record.sources.unpaywall).toEqual({ attempted: "yes", succeeded: "no" });
    expect(record.sources.arxiv).toEqual({ attempted: "yes", succeeded: "yes" });
    expect(record.downloadSource).toBe("arxiv");
    expect(record.retryCount).toBe(1);
  });

  it("exhausts a record at the retry ceiling after repeated transient errors", async () => {
    const attemptFetch = vi.fn(async (): Promise<FetchOutcome> => ({ kind: "transient-error", error: "HTTP 503" }));
    const orchestrator = build(attemptFetch, { maxRetries: 2 });

    await orchestrator.processIdentifier(DOI);
    await orchestrator.processIdentifier(DOI);
    const third = await orchestrator.processIdentifier(DOI);

    expect(third).toEqual({ action: "noop", id: DOI, reason: "exhausted" });
    expect(attemptFetch).toHaveBeenCalledTimes(2);

    const record = await store.get(DOI);
    expect(record.retryCount).toBe(2);
    expect(record.sources.unpaywall).toEqual({ attempted: "unknown", succeeded: "unknown" });
    expect(record.lastError).toBe("unpaywall: HTTP 503");

    const events = await store.listEvents({ id: DOI });
    expect(events.map((event) => event.eventType)).toEqual([
      "source-attempt",
      "source-failure",
      "source-attempt",
      "source-failure",
      "exhausted",
    ]);
    expect(events[4].detail).toEqual({
      cause: "source-failure",
      source: "unpaywall",
      retryCount: 2,
      maxRetries: 2,
      reason: "retry-ceiling",
    });
  });

  it("exhausts a record once every source missed", async () => {
    const attemptFetch = vi.fn(async (): Promise<FetchOutcome> => ({ kind: "not-found", reason: "HTTP 404" }));
    const orchestrator = build(attemptFetch);

    await orchestrator.processIdentifier(DOI);
    const second = await orchestrator.processIdentifier(DOI);

    expect(second).toEqual({ action: "fetched", id: DOI, source: "arxiv", outcome: "not-found", exhausted: true });
    const exhausted = await store.listEvents({ id: DOI, eventType: "exhausted" });
    expect(exhausted).toHaveLength(1);
    expect(exhausted[0].detail.reason).toBe("sources-exhausted");
    expect(await orchestrator.processIdentifier(DOI)).toEqual({ action: "noop", id: DOI, reason: "exhausted" });
  });

  it("treats a fetch that outlives its deadline as transient", async () => {
    const attemptFetch = vi.fn((): Promise<FetchOutcome> => new Promise<FetchOutcome>(() => undefined));
    const orchestrator = build(attemptFetch, {}, 20);

    const result = await orchestrator.processIdentifier(DOI);

    expect(result).toEqual({ action: "fetched", id: DOI, source: "unpaywall", outcome: "transient-error", exhausted: false });
    const record = await store.get(DOI);
    expect(record.retryCount).toBe(1);
    expect(record.sources.unpaywall.attempted).toBe("unknown");
    expect(record.lastError).toBe("unpaywall: fetch unpaywall timed out after 20ms");
  });

  it("turns a thrown fetch error into a transient outcome", async () => {
    const attemptFetch = vi.fn(async (): Promise<FetchOutcome> => {
      throw new Error("socket hang up");
    });
    const orchestrator = build(attemptFetch);

    await orchestrator.processIdentifier(DOI);

    expect((await store.get(DOI)).lastError).toBe("unpaywall: socket hang up");
  });

  it("runs pending parsers for a downloaded record without fetching", async () => {
    const attemptFetch = vi.fn(async (): Promise<FetchOutcome> => ({ kind: "not-found", reason: "unused" }));
    await writePdf(DOI);
    await store.applyMutation(DOI, (current) => ({
      record: { ...current, sources: { ...current.sources, reconciled: { attempted: "yes", succeeded: "yes" } } },
    }));

    const result = await build(attemptFetch).processIdentifier(DOI);

    expect(result).toEqual({
      action: "parsed",
      id: DOI,
      parse: { parsed: ["fast"], failed: [], ingested: false, pdfMissing: false },
    });
    expect(attemptFetch).not.toHaveBeenCalled();
  });
});

import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger } from "./logger";
import { MetricsRegistry } from "./metrics";
import { createRunId } from "./runId";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line with the run context", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    new Logger({ component: "dispatch", runId: "run-1" }).child("orchestrator").info("fetch_attempt_start", {
      doi: "10.1000/a",
      source: "arxiv",
    });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: "info",
      msg: "fetch_attempt_start",
      component: "orchestrator",
      runId: "run-1",
      doi: "10.1000/a",
      source: "arxiv",
    });
  });

  it("drops lines below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger({ component: "test", runId: "run-1", minLevel: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown");

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("stamps child bindings on every line through a custom writer", () => {
    const lines: string[] = [];
    const root = new Logger({
      component: "poll",
      runId: "run-2",
      writer: (_level, line) => lines.push(line),
    });
    const child = root.child("poll_iteration", { iteration: 3 });

    child.warn("poll_iteration_failed", { error: "boom" });
    child.child("dispatch").info("dispatch_complete");

    expect(lines.map((line): unknown => JSON.parse(line))).toEqual([
      expect.objectContaining({ component: "poll_iteration", iteration: 3, error: "boom", level: "warn" }),
      expect.objectContaining({ component: "dispatch", iteration: 3, msg: "dispatch_complete" }),
    ]);
  });
});

describe("MetricsRegistry", () => {
  it("counts and summarizes timings", async () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("passes");
    metrics.incrementCounter("passes", 2);
    await metrics.time("pass_ms", async () => undefined);

    expect(metrics.getCounter("passes")).toBe(3);
    expect(metrics.getCounters().fetch_ok).toBe(0);
    expect(metrics.getTimerSummaries().pass_ms.count).toBe(1);
  });
});

describe("createRunId", () => {
  it("stamps the start time and a random suffix", () => {
    expect(createRunId(new Date("2026-03-04T05:06:07.890Z"), () => 0.5)).toBe("20260304T050607Z-i00000");
  });
});

import { errorMessage } from "../core/errors";
import { withTimeout } from "../core/timeout";
import { didParseWork, ParseStageController, ParseSummary } from "../extract/parseStages";
import { Logger, MetricsRegistry } from "../observability";
import {
  applyFetchOutcome,
  exhaustionEvents,
  hasPendingWork,
  isExhausted,
  isFullyProcessed,
  nextSourceToTry,
} from "../state";
import { TrackerStore } from "../store";
import { AcquisitionPolicy, FetchOutcome, PendingEvent, SourceName } from "../types";

export type AttemptFetch = (doi: string, source: SourceName, signal: AbortSignal) => Promise<FetchOutcome>;

export interface OrchestratorDeps {
  store: TrackerStore;
  policy: AcquisitionPolicy;
  attemptFetch: AttemptFetch;
  parseStages: ParseStageController;
  attemptTimeoutMs: number;
  logger: Logger;
  metrics: MetricsRegistry;
}

export type NoopReason = "fully-processed" | "exhausted" | "no-pending-work" | "claimed-elsewhere";

export type PassResult =
  | { action: "noop"; id: string; reason: NoopReason }
  | {
      action: "fetched";
      id: string;
      source: SourceName;
      outcome: FetchOutcome["kind"];
      /** The outcome used up the record's last chance. */
      exhausted: boolean;
      parse?: ParseSummary;
    }
  | { action: "parsed"; id: string; parse: ParseSummary };

/** One pass over one identifier: at most one fetch, then any parse work the download unlocks. */
export class AcquisitionOrchestrator {
  private readonly deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  async processIdentifier(id: string): Promise<PassResult> {
    const { store, policy, logger } = this.deps;
    const record = await store.get(id);

    if (isFullyProcessed(record, policy)) {
      return { action: "noop", id, reason: "fully-processed" };
    }
    if (isExhausted(record, policy)) {
      return { action: "noop", id, reason: "exhausted" };
    }

    if (record.downloaded === "yes") {
      if (!hasPendingWork(record, policy)) {
        return { action: "noop", id, reason: "no-pending-work" };
      }
      return { action: "parsed", id, parse: await this.deps.parseStages.run(id) };
    }

    // not downloaded and not exhausted, so some source in the order is still open
    const source = nextSourceToTry(record, policy.sourceOrder);
    if (!source) {
      return { action: "noop", id, reason: "exhausted" };
    }

    const claim = await store.applyMutation(id, (current) => {
      if (current.downloaded === "yes" || isExhausted(current, policy) || nextSourceToTry(current, policy.sourceOrder) !== source) {
        return null;
      }
      return { record: current, events: [{ eventType: "source-attempt", detail: { source } }] };
    });
    if (!claim.changed) {
      return { action: "noop", id, reason: "claimed-elsewhere" };
    }

    this.deps.metrics.incrementCounter("fetch_attempts");
    logger.info("fetch_attempt_start", { doi: id, source });
    const outcome = await this.fetch(id, source);
    const exhausted = await this.recordFetchOutcome(id, source, outcome);

    if (outcome.kind !== "success") {
      return { action: "fetched", id, source, outcome: outcome.kind, exhausted };
    }
    return { action: "fetched", id, source, outcome: outcome.kind, exhausted, parse: await this.deps.parseStages.run(id) };
  }

  private async fetch(id: string, source: SourceName): Promise<FetchOutcome> {
    const { attemptFetch, attemptTimeoutMs, metrics } = this.deps;
    try {
      return await metrics.time("fetch_ms", () =>
        withTimeout(`fetch ${source}`, attemptTimeoutMs, (signal) => attemptFetch(id, source, signal)),
      );
    } catch (error) {
      return { kind: "transient-error", error: errorMessage(error) };
    }
  }

  private async recordFetchOutcome(id: string, source: SourceName, outcome: FetchOutcome): Promise<boolean> {
    const { store, policy, logger, metrics } = this.deps;

    const result = await store.applyMutation(id, (current, now) => {
      const next = applyFetchOutcome(current, source, outcome, now);
      const events: PendingEvent[] = [
        outcome.kind === "success"
          ? { eventType: "source-success", detail: { source, path: outcome.path, bytes: outcome.bytes, url: outcome.url } }
          : {
              eventType: "source-failure",
              detail: {
                source,
                outcome: outcome.kind,
                error: outcome.kind === "not-found" ? outcome.reason : outcome.error,
                retryCount: next.retryCount,
              },
            },
        ...exhaustionEvents(current, next, policy, { cause: "source-failure", source }),
      ];
      return { record: next, events };
    });

    if (outcome.kind === "success") {
      metrics.incrementCounter("fetch_ok");
      logger.info("fetch_attempt_ok", { doi: id, source, bytes: outcome.bytes });
    } else {
      metrics.incrementCounter("fetch_failed");
      logger.warn("fetch_attempt_failed", {
        doi: id,
        source,
        outcome: outcome.kind,
        error: outcome.kind === "not-found" ? outcome.reason : outcome.error,
        retryCount: result.record.retryCount,
      });
    }

    const exhausted = result.events.some((event) => event.eventType === "exhausted");
    if (exhausted) {
      metrics.incrementCounter("exhausted");
      logger.warn("identifier_exhausted", { doi: id, retryCount: result.record.retryCount });
    }
    return exhausted;
  }
}

export function didPassWork(result: PassResult): boolean {
  switch (result.action) {
    case "noop":
      return false;
    case "fetched":
      return true;
    case "parsed":
      return didParseWork(result.parse);
  }
}

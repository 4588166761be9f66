import fs from "node:fs";
import { ContentStore } from "../content";
import { errorMessage, TransientParseError } from "../core/errors";
import { FileLayout } from "../core/layout";
import { withTimeout } from "../core/timeout";
import { Logger, MetricsRegistry } from "../observability";
import { applyIngestOutcome, applyParseOutcome, exhaustionEvents, isExhausted, isIngestPending } from "../state";
import { TrackerStore } from "../store";
import { AcquisitionPolicy, ExtractedContent, ParseOutcome, ParserName, PendingEvent } from "../types";
import { readParsedContent } from "./parsedContent";

export type AttemptParse = (doi: string, pdfPath: string, parser: ParserName, signal: AbortSignal) => Promise<ParseOutcome>;

export interface ParseStageDeps {
  store: TrackerStore;
  policy: AcquisitionPolicy;
  layout: FileLayout;
  attemptParse: AttemptParse;
  contentStore?: ContentStore;
  parseTimeoutMs: number;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface ParseSummary {
  parsed: ParserName[];
  failed: ParserName[];
  ingested: boolean;
  pdfMissing: boolean;
}

export function didParseWork(summary: ParseSummary): boolean {
  return summary.parsed.length > 0 || summary.failed.length > 0 || summary.ingested;
}

/**
 * Runs every required parser that has not settled yet, each on its own, then
 * hands the combined output to the content store once all of them settled.
 */
export class ParseStageController {
  private readonly deps: ParseStageDeps;

  constructor(deps: ParseStageDeps) {
    this.deps = deps;
  }

  async run(id: string): Promise<ParseSummary> {
    const { layout, logger } = this.deps;
    const summary: ParseSummary = { parsed: [], failed: [], ingested: false, pdfMissing: false };

    const pdfPath = layout.pdfPath(id);
    if (!fs.existsSync(pdfPath)) {
      logger.warn("parse_pdf_missing", { doi: id, pdfPath });
      summary.pdfMissing = true;
      return summary;
    }

    for (const parser of this.deps.policy.requiredParsers) {
      const outcome = await this.runParser(id, pdfPath, parser);
      if (outcome === "success") {
        summary.parsed.push(parser);
      } else if (outcome === "failed") {
        summary.failed.push(parser);
      }
    }

    summary.ingested = await this.ingest(id);
    return summary;
  }

  private async runParser(id: string, pdfPath: string, parser: ParserName): Promise<"success" | "failed" | "skipped"> {
    const { store, policy, logger, metrics } = this.deps;

    const claim = await store.applyMutation(id, (current) => {
      if (current.parseStages[parser].status !== "not_attempted" || isExhausted(current, policy)) {
        return null;
      }
      return { record: current, events: [{ eventType: "parse-attempt", detail: { parser } }] };
    });
    if (!claim.changed) {
      return "skipped";
    }

    logger.info("parse_attempt_start", { doi: id, parser });
    const outcome = await this.invoke(id, pdfPath, parser);

    const result = await store.applyMutation(id, (current, now) => {
      const next = applyParseOutcome(current, parser, outcome, policy, now);
      const events: PendingEvent[] = [
        outcome.status === "success"
          ? { eventType: "parse-success", detail: { parser, outputPath: outcome.outputPath } }
          : {
              eventType: "parse-failure",
              detail: { parser, error: outcome.error, status: next.parseStages[parser].status, retryCount: next.retryCount },
            },
        ...exhaustionEvents(current, next, policy, { cause: "parse-failure", parser }),
      ];
      return { record: next, events };
    });

    if (result.events.some((event) => event.eventType === "exhausted")) {
      metrics.incrementCounter("exhausted");
      logger.warn("identifier_exhausted", { doi: id, parser, retryCount: result.record.retryCount });
    }

    if (outcome.status === "success") {
      metrics.incrementCounter("parse_ok");
      logger.info("parse_attempt_ok", { doi: id, parser, outputPath: outcome.outputPath });
      return "success";
    }

    metrics.incrementCounter("parse_failed");
    logger.warn("parse_attempt_failed", {
      doi: id,
      parser,
      error: outcome.error,
      status: result.record.parseStages[parser].status,
    });
    return "failed";
  }

  private async invoke(id: string, pdfPath: string, parser: ParserName): Promise<ParseOutcome> {
    const { attemptParse, parseTimeoutMs, metrics, logger } = this.deps;
    try {
      return await metrics.time("parse_ms", () =>
        withTimeout(`parse ${parser}`, parseTimeoutMs, (signal) => attemptParse(id, pdfPath, parser, signal)),
      );
    } catch (error) {
      logger.debug("parse_attempt_error", {
        doi: id,
        parser,
        transient: error instanceof TransientParseError,
        error: errorMessage(error),
      });
      return { status: "failed", error: errorMessage(error) };
    }
  }

  private async ingest(id: string): Promise<boolean> {
    const { store, policy, layout, contentStore, logger, metrics } = this.deps;

    const record = await store.get(id);
    if (!isIngestPending(record, policy)) {
      return false;
    }

    let error: string | null = null;
    if (!contentStore) {
      error = "no content store configured";
    } else {
      try {
        const contents: ExtractedContent[] = [];
        const unreadable: ParserName[] = [];
        for (const parser of policy.requiredParsers) {
          if (record.parseStages[parser].status !== "success") {
            continue;
          }
          const content = await readParsedContent(layout.parserOutputPath(id, parser));
          if (content) {
            contents.push(content);
          } else {
            unreadable.push(parser);
          }
        }

        if (contents.length === 0) {
          error = `no readable parse output on disk (${unreadable.join(", ")})`;
        } else if (!(await contentStore.ingest(id, contents))) {
          error = "content store did not confirm the write";
        }
      } catch (ingestError) {
        error = errorMessage(ingestError);
      }
    }

    const result = await store.applyMutation(id, (current) => {
      if (current.contentIngested === "yes") {
        return null;
      }
      const next = applyIngestOutcome(current, error);
      const events: PendingEvent[] =
        error === null ? [{ eventType: "content-ingested", detail: { parsers: [...policy.requiredParsers] } }] : [];
      events.push(...exhaustionEvents(current, next, policy, { cause: "ingest-failure" }));
      return { record: next, events };
    });

    if (error !== null) {
      logger.warn("content_ingest_failed", { doi: id, error });
      if (result.events.some((event) => event.eventType === "exhausted")) {
        metrics.incrementCounter("exhausted");
      }
      return false;
    }

    metrics.incrementCounter("ingest_ok");
    logger.info("content_ingest_ok", { doi: id });
    return result.changed;
  }
}

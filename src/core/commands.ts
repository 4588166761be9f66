import { AppConfig } from "../config";
import { ContentStore } from "../content";
import { createSourceFetchers, SourceFetcher } from "../download/sources";
import { AcquisitionOrchestrator, AttemptFetch } from "../download/orchestrator";
import { RecordFilter, seedFromFile, TrackerQueries, WorkerDispatcher } from "../dispatch";
import { AttemptParse, createParseEngines, ParseEngine, ParseStageController } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import { FilesystemEvidenceScanner, Reconciler } from "../reconcile";
import { TrackerStore } from "../store";
import { AcquisitionPolicy, ParserName, SourceName } from "../types";
import { normalizeDoi } from "./doi";
import { ConfigError, errorMessage } from "./errors";
import { FileLayout } from "./layout";
import { sleep } from "./timeout";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: TrackerStore;
  contentStore?: ContentStore;
  logger: Logger;
  metrics: MetricsRegistry;
  /** Overrides for the network-backed collaborators. */
  fetchers?: Record<SourceName, SourceFetcher>;
  engines?: Record<ParserName, ParseEngine>;
}

export function policyFromConfig(config: AppConfig): AcquisitionPolicy {
  return {
    sourceOrder: config.sourceOrder,
    requiredParsers: config.requiredParsers,
    maxRetries: config.maxRetries,
    ingestContent: config.ingestContent,
  };
}

export function createOrchestrator(ctx: CommandContext): AcquisitionOrchestrator {
  const { config, store, logger, metrics } = ctx;
  const layout = new FileLayout(config.outputDirs);
  const policy = policyFromConfig(config);
  const fetchers = ctx.fetchers ?? createSourceFetchers(config, logger);
  const engines = ctx.engines ?? createParseEngines(config, layout);

  const attemptFetch: AttemptFetch = (doi, source, signal) => fetchers[source].fetch(doi, layout.pdfPath(doi), signal);
  const attemptParse: AttemptParse = (doi, pdfPath, parser, signal) => engines[parser].parse(doi, pdfPath, signal);

  const parseStages = new ParseStageController({
    store,
    policy,
    layout,
    attemptParse,
    contentStore: ctx.contentStore,
    parseTimeoutMs: config.parseTimeoutMs,
    logger: logger.child("parse_stages"),
    metrics,
  });

  return new AcquisitionOrchestrator({
    store,
    policy,
    attemptFetch,
    parseStages,
    attemptTimeoutMs: config.attemptTimeoutMs,
    logger: logger.child("orchestrator"),
    metrics,
  });
}

function requireDoi(raw: string | undefined): string {
  const doi = raw ? normalizeDoi(raw) : undefined;
  if (!doi) {
    throw new ConfigError(`A valid DOI is required, got: ${raw ?? "(none)"}`);
  }
  return doi;
}

export async function runSeed(ctx: CommandContext, inputPath: string): Promise<void> {
  ctx.logger.info("seed_start", { inputPath });
  const summary = await seedFromFile(ctx.store, inputPath, ctx.logger);
  ctx.logger.info("seed_complete", { ...summary });
}

export async function runDispatch(ctx: CommandContext, maxDocs?: number, maxPasses?: number): Promise<void> {
  const { config } = ctx;
  ctx.logger.info("dispatch_start", { maxDocs, maxPasses: maxPasses ?? config.maxPasses, workers: config.workers });
  const dispatcher = new WorkerDispatcher({
    store: ctx.store,
    policy: policyFromConfig(config),
    orchestrator: createOrchestrator(ctx),
    runId: ctx.runId,
    workers: config.workers,
    leaseTtlMs: config.leaseTtlMs,
    passDelayMs: config.passDelayMs,
    logger: ctx.logger,
    metrics: ctx.metrics,
  });
  await dispatcher.run({ maxDocs, maxPasses: maxPasses ?? config.maxPasses });
}

export async function runReconcile(ctx: CommandContext): Promise<void> {
  ctx.logger.info("reconcile_start");
  const reconciler = new Reconciler({
    store: ctx.store,
    scanner: new FilesystemEvidenceScanner(new FileLayout(ctx.config.outputDirs), ctx.config.minPdfBytes, ctx.contentStore),
    logger: ctx.logger,
    metrics: ctx.metrics,
  });
  await reconciler.run();
}

export async function runStatus(ctx: CommandContext, filter?: RecordFilter): Promise<void> {
  ctx.logger.info("status_start");
  const queries = new TrackerQueries(ctx.store, policyFromConfig(ctx.config));
  const stats = await queries.getStats();
  ctx.logger.info("status_complete", { stats });
  if (filter) {
    const records = await queries.listByPredicate(filter);
    ctx.logger.info("status_records", { filter, count: records.length, ids: records.map((record) => record.id) });
  }
}

export async function runShow(ctx: CommandContext, rawDoi: string | undefined): Promise<void> {
  const doi = requireDoi(rawDoi);
  const status = await new TrackerQueries(ctx.store, policyFromConfig(ctx.config)).getStatus(doi);
  ctx.logger.info("show_record", { doi, ...status });
}

export async function runReset(ctx: CommandContext, rawDoi: string | undefined): Promise<void> {
  const doi = requireDoi(rawDoi);
  const record = await new TrackerQueries(ctx.store, policyFromConfig(ctx.config)).forceReset(doi);
  ctx.logger.info("reset_complete", { doi, lastUpdated: record.lastUpdated });
}

/** Reconcile, then dispatch, repeated with a pause. Not a scheduler. */
export async function runPoll(ctx: CommandContext, maxDocs?: number, iterations?: number): Promise<void> {
  let runCount = 0;
  ctx.logger.info("poll_start", {
    maxDocs,
    iterations: iterations ?? "infinite",
    pollIntervalMinutes: ctx.config.pollIntervalMinutes,
  });

  while (iterations === undefined || runCount < iterations) {
    runCount += 1;
    const iterationContext: CommandContext = {
      ...ctx,
      runId: `${ctx.runId}_poll_${runCount}`,
      logger: ctx.logger.child("poll_iteration", { iteration: runCount }),
    };

    try {
      await runReconcile(iterationContext);
      await runDispatch(iterationContext, maxDocs);
    } catch (error) {
      iterationContext.logger.error("poll_iteration_failed", { error: errorMessage(error) });
    }

    if (iterations !== undefined && runCount >= iterations) {
      break;
    }

    await sleep(Math.max(1, ctx.config.pollIntervalMinutes) * 60 * 1000);
  }

  ctx.logger.info("poll_complete", { iterationsExecuted: runCount });
}
